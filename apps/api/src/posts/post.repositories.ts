import type { Range } from "../common/pagination";
import type { CommentPatch, CommentRecord, PostPatch, PostRecord } from "./post.types";

export const POST_REPOSITORY = Symbol("POST_REPOSITORY");
export const COMMENT_REPOSITORY = Symbol("COMMENT_REPOSITORY");

export interface PublishedPostFilter extends Range {
  search?: string;
}

export interface PostRepository {
  create(post: PostRecord): Promise<PostRecord>;
  findById(id: string): Promise<PostRecord | null>;
  findBySlug(slug: string): Promise<PostRecord | null>;
  update(id: string, patch: PostPatch): Promise<PostRecord | null>;
  delete(id: string): Promise<boolean>;
  /** Newest publication first; `search` matches title or content case-insensitively. */
  listPublished(filter: PublishedPostFilter): Promise<PostRecord[]>;
  listByAuthor(authorId: string): Promise<PostRecord[]>;
}

export interface CommentTargetFilter extends Range {
  targetType: string;
  targetId: string;
}

export interface CommentRepository {
  create(comment: CommentRecord): Promise<CommentRecord>;
  findById(id: string): Promise<CommentRecord | null>;
  update(id: string, patch: CommentPatch): Promise<CommentRecord | null>;
  delete(id: string): Promise<boolean>;
  /** Top-level comments only, oldest first. */
  listByTarget(filter: CommentTargetFilter): Promise<CommentRecord[]>;
  listReplies(parentId: string): Promise<CommentRecord[]>;
}
