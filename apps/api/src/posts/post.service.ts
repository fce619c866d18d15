import { ForbiddenException, Inject, Injectable, NotFoundException } from "@nestjs/common";
import type { AuthUser, CreatePostInput, Page, Pagination, UpdatePostInput } from "@runfund/types";
import { CLOCK, ID_GENERATOR, type Clock, type IdGenerator } from "../common/identity";
import { toPage, toRange } from "../common/pagination";
import { omitUndefined } from "../common/records";
import { createSlug } from "../common/slug";
import { createModuleLogger } from "../observability/logger";
import { POST_REPOSITORY, type PostRepository } from "./post.repositories";
import type { PostPatch, PostRecord } from "./post.types";

@Injectable()
export class PostService {
  private readonly logger = createModuleLogger("PostService");

  constructor(
    @Inject(POST_REPOSITORY) private readonly posts: PostRepository,
    @Inject(ID_GENERATOR) private readonly generateId: IdGenerator,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  /** Drafts unless `publish` is set, in which case the post goes live immediately. */
  async createPost(authorId: string, { publish, ...input }: CreatePostInput): Promise<PostRecord> {
    const id = this.generateId();
    const now = this.clock();

    const post = await this.posts.create({
      ...input,
      id,
      authorId,
      slug: createSlug(input.title, id),
      isPublished: publish,
      publishedAt: publish ? now : null,
      createdAt: now,
      updatedAt: now
    });

    this.logger.info({ event: "post.created", postId: id, authorId, published: publish }, "Post created");

    return post;
  }

  async getPostById(id: string): Promise<PostRecord> {
    const post = await this.posts.findById(id);

    if (!post) {
      throw new NotFoundException("Post not found.");
    }

    return post;
  }

  /** A new title gets a new slug; the id suffix keeps it unique. */
  async updatePost(id: string, input: UpdatePostInput): Promise<PostRecord> {
    const current = await this.getPostById(id);
    const patch: PostPatch = { ...omitUndefined(input), updatedAt: this.clock() };

    if (input.title !== undefined && input.title !== current.title) {
      patch.slug = createSlug(input.title, current.id);
    }

    return this.applyPatch(id, patch);
  }

  async publishPost(id: string): Promise<PostRecord> {
    await this.getPostById(id);
    const now = this.clock();
    const post = await this.applyPatch(id, { isPublished: true, publishedAt: now, updatedAt: now });
    this.logger.info({ event: "post.published", postId: id }, "Post published");
    return post;
  }

  async unpublishPost(id: string): Promise<PostRecord> {
    await this.getPostById(id);
    return this.applyPatch(id, { isPublished: false, publishedAt: null, updatedAt: this.clock() });
  }

  async deletePost(actor: AuthUser, id: string): Promise<void> {
    const post = await this.getPostById(id);

    if (post.authorId !== actor.id && !actor.isStaff) {
      throw new ForbiddenException("Only the author or staff can delete this post.");
    }

    if (!(await this.posts.delete(id))) {
      throw new NotFoundException("Post not found.");
    }

    this.logger.info({ event: "post.deleted", postId: id, actorId: actor.id }, "Post deleted");
  }

  async getPublishedBySlug(slug: string): Promise<PostRecord> {
    const post = await this.posts.findBySlug(slug);

    if (!post || !post.isPublished) {
      throw new NotFoundException("Post not found.");
    }

    return post;
  }

  async listPublished(pagination: Pagination): Promise<Page<PostRecord>> {
    const posts = await this.posts.listPublished(toRange(pagination));
    return toPage(posts, pagination);
  }

  async searchPublished(search: string, pagination: Pagination): Promise<Page<PostRecord>> {
    const posts = await this.posts.listPublished({ ...toRange(pagination), search });
    return toPage(posts, pagination);
  }

  listByAuthor(authorId: string): Promise<PostRecord[]> {
    return this.posts.listByAuthor(authorId);
  }

  private async applyPatch(id: string, patch: PostPatch): Promise<PostRecord> {
    const updated = await this.posts.update(id, patch);

    if (!updated) {
      throw new NotFoundException("Post not found.");
    }

    return updated;
  }
}
