import { BadRequestException, Inject, Injectable, NotFoundException } from "@nestjs/common";
import type { CreateCommentInput, Page, Pagination, UpdateCommentInput } from "@runfund/types";
import { CLOCK, ID_GENERATOR, type Clock, type IdGenerator } from "../common/identity";
import { toPage, toRange } from "../common/pagination";
import { assertOwnership } from "../common/records";
import { createModuleLogger } from "../observability/logger";
import { COMMENT_REPOSITORY, type CommentRepository } from "./post.repositories";
import type { CommentRecord } from "./post.types";

@Injectable()
export class CommentService {
  private readonly logger = createModuleLogger("CommentService");

  constructor(
    @Inject(COMMENT_REPOSITORY) private readonly comments: CommentRepository,
    @Inject(ID_GENERATOR) private readonly generateId: IdGenerator,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  /** Replies must sit on the same target as the comment they answer. */
  async createComment(authorId: string, input: CreateCommentInput): Promise<CommentRecord> {
    if (input.parentId !== undefined) {
      const parent = await this.comments.findById(input.parentId);

      if (!parent) {
        throw new NotFoundException("Parent comment not found.");
      }

      if (parent.targetType !== input.targetType || parent.targetId !== input.targetId) {
        throw new BadRequestException("A reply must target the same item as its parent comment.");
      }
    }

    const now = this.clock();
    const comment = await this.comments.create({
      id: this.generateId(),
      authorId,
      targetType: input.targetType,
      targetId: input.targetId,
      parentId: input.parentId ?? null,
      content: input.content,
      createdAt: now,
      updatedAt: now
    });

    this.logger.debug(
      { event: "comment.created", commentId: comment.id, targetType: input.targetType, targetId: input.targetId },
      "Comment created"
    );

    return comment;
  }

  async getComment(id: string): Promise<CommentRecord> {
    const comment = await this.comments.findById(id);

    if (!comment) {
      throw new NotFoundException("Comment not found.");
    }

    return comment;
  }

  async updateComment(actorId: string, id: string, input: UpdateCommentInput): Promise<CommentRecord> {
    const comment = await this.getComment(id);
    assertOwnership(actorId, comment.authorId, "Only the author can change this comment.");

    const updated = await this.comments.update(id, { content: input.content, updatedAt: this.clock() });

    if (!updated) {
      throw new NotFoundException("Comment not found.");
    }

    return updated;
  }

  /** Replies are left in place. */
  async deleteComment(actorId: string, id: string): Promise<void> {
    const comment = await this.getComment(id);
    assertOwnership(actorId, comment.authorId, "Only the author can delete this comment.");

    if (!(await this.comments.delete(id))) {
      throw new NotFoundException("Comment not found.");
    }
  }

  async listByTarget(targetType: string, targetId: string, pagination: Pagination): Promise<Page<CommentRecord>> {
    const comments = await this.comments.listByTarget({ targetType, targetId, ...toRange(pagination) });
    return toPage(comments, pagination);
  }

  async listReplies(parentId: string): Promise<CommentRecord[]> {
    await this.getComment(parentId);
    return this.comments.listReplies(parentId);
  }
}
