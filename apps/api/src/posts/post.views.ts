import type { Comment, Post } from "@runfund/types";
import type { CommentRecord, PostRecord } from "./post.types";

export const toPostView = ({ publishedAt, createdAt, updatedAt, ...post }: PostRecord): Post => ({
  ...post,
  publishedAt: publishedAt ? publishedAt.toISOString() : null,
  createdAt: createdAt.toISOString(),
  updatedAt: updatedAt.toISOString()
});

export const toCommentView = ({ createdAt, updatedAt, ...comment }: CommentRecord): Comment => ({
  ...comment,
  createdAt: createdAt.toISOString(),
  updatedAt: updatedAt.toISOString()
});
