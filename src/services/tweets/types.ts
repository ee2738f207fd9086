import { z } from 'zod';

/**
 * A post as returned by search
 */
export interface Tweet {
  id: string;
  text: string;
  authorId?: string;
  createdAt?: string;
}

export interface PostOptions {
  /** Media ids from an earlier upload; at most four */
  mediaIds?: readonly string[];
  /** Id of the post this one replies to */
  inReplyTo?: string;
  signal?: AbortSignal;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

export interface EngagementOptions {
  signal?: AbortSignal;
}

export interface MetricsOptions {
  signal?: AbortSignal;
}

/**
 * Engagement counts of one post.
 * The platform reports impressions only to the post's author; otherwise they read as 0.
 */
export interface PublicMetrics {
  impressionCount: number;
  likeCount: number;
  retweetCount: number;
  replyCount: number;
}

/**
 * Body of POST /2/tweets
 */
export interface CreateTweetRequest {
  text: string;
  media?: { media_ids: string[] };
  reply?: { in_reply_to_tweet_id: string };
}

export const MAX_MEDIA_PER_POST = 4;

/** Bounds the search endpoint puts on max_results */
export const MIN_SEARCH_RESULTS = 10;
export const MAX_SEARCH_RESULTS = 100;

export const createTweetResponseSchema = z.object({
  data: z.object({
    id: z.string(),
    text: z.string(),
  }),
});

export const searchResponseSchema = z.object({
  data: z
    .array(
      z.object({
        id: z.string(),
        text: z.string(),
        author_id: z.string().optional(),
        created_at: z.string().optional(),
      }),
    )
    .optional(),
  meta: z.object({ result_count: z.number() }).passthrough().optional(),
});

export const likeResponseSchema = z.object({
  data: z.object({ liked: z.boolean() }),
});

export const retweetResponseSchema = z.object({
  data: z.object({ retweeted: z.boolean() }),
});

export const publicMetricsResponseSchema = z.object({
  data: z.object({
    id: z.string(),
    public_metrics: z
      .object({
        impression_count: z.number().int().nonnegative().default(0),
        like_count: z.number().int().nonnegative(),
        retweet_count: z.number().int().nonnegative(),
        reply_count: z.number().int().nonnegative(),
      })
      .passthrough(),
  }),
});

export type CreateTweetResponse = z.infer<typeof createTweetResponseSchema>;
export type SearchResponse = z.infer<typeof searchResponseSchema>;
export type PublicMetricsResponse = z.infer<typeof publicMetricsResponseSchema>;
