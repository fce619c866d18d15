import { z } from "zod";
import { createPaginationSchema } from "./common";

export const createPostInputSchema = z.object({
  title: z.string().trim().min(1).max(200),
  content: z.string().trim().min(1),
  coverImageUrl: z.string().trim().max(2048).default(""),
  publish: z.boolean().default(false)
});

export const updatePostInputSchema = createPostInputSchema.omit({ publish: true }).partial();

export const postListQuerySchema = createPaginationSchema(20).extend({
  search: z.string().trim().min(1).max(200).optional().catch(undefined)
});

export const commentTargetTypeSchema = z.string().trim().min(1).max(50);

export const createCommentInputSchema = z.object({
  targetType: commentTargetTypeSchema,
  targetId: z.string().trim().min(1),
  parentId: z.string().trim().min(1).optional(),
  content: z.string().trim().min(1).max(2000)
});

export const updateCommentInputSchema = createCommentInputSchema.pick({ content: true });

export const commentListQuerySchema = createPaginationSchema(50);

export const postSchema = z.object({
  id: z.string(),
  authorId: z.string(),
  title: z.string(),
  slug: z.string(),
  content: z.string(),
  coverImageUrl: z.string(),
  isPublished: z.boolean(),
  publishedAt: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export const commentSchema = z.object({
  id: z.string(),
  authorId: z.string(),
  targetType: z.string(),
  targetId: z.string(),
  parentId: z.string().nullable(),
  content: z.string(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export type CreatePostInput = z.infer<typeof createPostInputSchema>;
export type UpdatePostInput = z.infer<typeof updatePostInputSchema>;
export type PostListQuery = z.infer<typeof postListQuerySchema>;
export type CreateCommentInput = z.infer<typeof createCommentInputSchema>;
export type UpdateCommentInput = z.infer<typeof updateCommentInputSchema>;
export type Post = z.infer<typeof postSchema>;
export type Comment = z.infer<typeof commentSchema>;
