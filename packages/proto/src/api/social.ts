import { z } from 'zod';

export const CommentContentSchema = z
  .string()
  .trim()
  .min(1, 'Comment cannot be empty')
  .max(2000, 'Comment must be at most 2000 characters');

export const CreateCommentRequestSchema = z.object({
  postId: z.string().min(1),
  content: CommentContentSchema,
});

export type CreateCommentRequest = z.infer<typeof CreateCommentRequestSchema>;
