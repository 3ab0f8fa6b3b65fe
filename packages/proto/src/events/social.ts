import { z } from 'zod';

export const POST_LIKED = 'POST_LIKED' as const;
export const POST_COMMENTED = 'POST_COMMENTED' as const;
export const USER_FOLLOWED = 'USER_FOLLOWED' as const;
export const USER_MENTIONED = 'USER_MENTIONED' as const;

export const PostLikedPayload = z.object({
  postId: z.string(),
  postAuthorId: z.string(),
  userId: z.string(),
});

export const PostCommentedPayload = z.object({
  postId: z.string(),
  postAuthorId: z.string(),
  commentId: z.string(),
  userId: z.string(),
});

export const UserFollowedPayload = z.object({
  followerId: z.string(),
  followeeId: z.string(),
});

export const UserMentionedPayload = z.object({
  postId: z.string(),
  commentId: z.string().optional(),
  mentionedUserId: z.string(),
  userId: z.string(),
});

export type PostLiked = z.infer<typeof PostLikedPayload>;
export type PostCommented = z.infer<typeof PostCommentedPayload>;
export type UserFollowed = z.infer<typeof UserFollowedPayload>;
export type UserMentioned = z.infer<typeof UserMentionedPayload>;
