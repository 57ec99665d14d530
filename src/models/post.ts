import { z } from 'zod';

export const PlatformTypeSchema = z.enum(['twitter', 'reddit', 'other']);
export type PlatformType = z.infer<typeof PlatformTypeSchema>;

/**
 * Social post as handed over by the discovery pipeline.
 * `extraData` is platform specific; for twitter it may carry
 * `is_quote_tweet` and `quoted_status_id`.
 */
export const PostSchema = z.object({
  postId: z.string().min(1),
  content: z.string(),
  platformType: PlatformTypeSchema,
  accountId: z.string().default(''),
  extraData: z.record(z.unknown()).default({}),
  topics: z.array(z.string()).default([])
});

export type Post = z.infer<typeof PostSchema>;

/**
 * Quote-tweet reference carried in a twitter post's extraData, if any.
 */
export function getQuotedStatusId(post: Post): string | null {
  if (post.extraData['is_quote_tweet'] !== true) {
    return null;
  }
  const quotedStatusId = post.extraData['quoted_status_id'];
  return typeof quotedStatusId === 'string' && quotedStatusId.length > 0 ? quotedStatusId : null;
}
