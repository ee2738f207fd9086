// Service
export type { TweetsService, TweetsGates, TweetsServiceSettings } from './service.js';
export { TweetsServiceImpl } from './service.js';

// Types
export type {
  Tweet,
  PostOptions,
  SearchOptions,
  EngagementOptions,
  MetricsOptions,
  PublicMetrics,
  CreateTweetRequest,
  CreateTweetResponse,
  SearchResponse,
  PublicMetricsResponse,
} from './types.js';

export {
  MAX_MEDIA_PER_POST,
  MIN_SEARCH_RESULTS,
  MAX_SEARCH_RESULTS,
  createTweetResponseSchema,
  searchResponseSchema,
  likeResponseSchema,
  retweetResponseSchema,
  publicMetricsResponseSchema,
} from './types.js';
