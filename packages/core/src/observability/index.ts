export {
  GeoSyncLogger,
  createLogger,
  isDebugMode,
  noopLogger,
  resolveLogger,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerConfig,
  type LoggerOption,
} from './logger.js';
