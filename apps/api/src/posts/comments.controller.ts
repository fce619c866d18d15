import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Patch, Post, Query } from "@nestjs/common";
import {
  commentListQuerySchema,
  createCommentInputSchema,
  updateCommentInputSchema,
  type AuthUser,
  type Comment,
  type Page
} from "@runfund/types";
import { AllowAnonymous, CurrentUser } from "../auth/auth.decorators";
import { parseInput } from "../common/validation";
import { CommentService } from "./comment.service";
import { toCommentView } from "./post.views";

@Controller("api/comments")
export class CommentsController {
  constructor(@Inject(CommentService) private readonly commentService: CommentService) {}

  @Get(":id/replies")
  @AllowAnonymous()
  async listReplies(@Param("id") id: string): Promise<Comment[]> {
    const replies = await this.commentService.listReplies(id);
    return replies.map(toCommentView);
  }

  @Get(":targetType/:targetId")
  @AllowAnonymous()
  async listByTarget(
    @Param("targetType") targetType: string,
    @Param("targetId") targetId: string,
    @Query() query: unknown
  ): Promise<Page<Comment>> {
    const page = await this.commentService.listByTarget(targetType, targetId, parseInput(commentListQuerySchema, query));
    return { ...page, items: page.items.map(toCommentView) };
  }

  @Post()
  @HttpCode(201)
  async create(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<Comment> {
    const input = parseInput(createCommentInputSchema, body);
    return toCommentView(await this.commentService.createComment(caller.id, input));
  }

  @Patch(":id")
  async update(@CurrentUser() caller: AuthUser, @Param("id") id: string, @Body() body: unknown): Promise<Comment> {
    const input = parseInput(updateCommentInputSchema, body);
    return toCommentView(await this.commentService.updateComment(caller.id, id, input));
  }

  @Delete(":id")
  @HttpCode(204)
  async remove(@CurrentUser() caller: AuthUser, @Param("id") id: string): Promise<void> {
    await this.commentService.deleteComment(caller.id, id);
  }
}
