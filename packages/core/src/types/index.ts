export * from './connection.js';
export * from './feature.js';
export * from './space.js';
