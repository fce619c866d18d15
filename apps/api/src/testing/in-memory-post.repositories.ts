import type {
  CommentRepository,
  CommentTargetFilter,
  PostRepository,
  PublishedPostFilter
} from "../posts/post.repositories";
import type { CommentPatch, CommentRecord, PostPatch, PostRecord } from "../posts/post.types";
import { InMemoryCollection, matchesText, paginate } from "./in-memory-collection";

const timeOf = (value: Date | null): number => (value ? value.getTime() : 0);

export class InMemoryPostRepository implements PostRepository {
  readonly posts = new InMemoryCollection<PostRecord>(["slug"]);

  async create(post: PostRecord): Promise<PostRecord> {
    return this.posts.insert(post);
  }

  async findById(id: string): Promise<PostRecord | null> {
    return this.posts.get(id);
  }

  async findBySlug(slug: string): Promise<PostRecord | null> {
    return this.posts.findOne((post) => post.slug === slug);
  }

  async update(id: string, patch: PostPatch): Promise<PostRecord | null> {
    return this.posts.update(id, (current) => ({ ...current, ...patch }));
  }

  async delete(id: string): Promise<boolean> {
    return this.posts.delete(id);
  }

  async listPublished({ search, offset, limit }: PublishedPostFilter): Promise<PostRecord[]> {
    const matches = this.posts
      .filter((post) => post.isPublished && (!search || matchesText(search, post.title, post.content)))
      .reverse()
      .sort((left, right) => timeOf(right.publishedAt) - timeOf(left.publishedAt));
    return paginate(matches, offset, limit);
  }

  async listByAuthor(authorId: string): Promise<PostRecord[]> {
    return this.posts
      .filter((post) => post.authorId === authorId)
      .reverse()
      .sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime());
  }
}

export class InMemoryCommentRepository implements CommentRepository {
  readonly comments = new InMemoryCollection<CommentRecord>();

  async create(comment: CommentRecord): Promise<CommentRecord> {
    return this.comments.insert(comment);
  }

  async findById(id: string): Promise<CommentRecord | null> {
    return this.comments.get(id);
  }

  async update(id: string, patch: CommentPatch): Promise<CommentRecord | null> {
    return this.comments.update(id, (current) => ({ ...current, ...patch }));
  }

  async delete(id: string): Promise<boolean> {
    return this.comments.delete(id);
  }

  async listByTarget({ targetType, targetId, offset, limit }: CommentTargetFilter): Promise<CommentRecord[]> {
    const matches = this.comments.filter(
      (comment) => comment.targetType === targetType && comment.targetId === targetId && comment.parentId === null
    );
    return paginate(matches, offset, limit);
  }

  async listReplies(parentId: string): Promise<CommentRecord[]> {
    return this.comments.filter((comment) => comment.parentId === parentId);
  }
}
