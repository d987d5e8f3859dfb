export {
  FeaturePager,
  type FeaturePagerConfig,
  type PagedEndpoint,
  type PagerPage,
} from './feature-pager.js';

export {
  HubClient,
  STATISTICS_TIMEOUT,
  createHubClient,
  type FeaturePage,
  type FeatureQuery,
  type FetchInit,
  type FetchLike,
  type FetchResponse,
  type HubClientConfig,
  type HubCompletion,
  type HubReply,
  type HubResult,
  type PagedFeatureQuery,
  type SpaceCount,
  type SpaceStatistics,
} from './hub-client.js';

export {
  InFlightReply,
  type AbortCause,
  type ReplyHandle,
  type ReplyState,
} from './in-flight-reply.js';

export {
  contextOf,
  correlate,
  createRequestContext,
  type Correlated,
  type KnownReplyTag,
  type RequestContext,
} from './reply-correlator.js';

export {
  buildRequest,
  resolveEndpoint,
  serializeBody,
  serializeQuery,
  type BodyMode,
  type HttpMethod,
  type HubRequest,
  type QueryParams,
  type QueryValue,
  type RequestOptions,
} from './request-factory.js';
