import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Patch, Post, Query } from "@nestjs/common";
import {
  createPostInputSchema,
  postListQuerySchema,
  updatePostInputSchema,
  type AuthUser,
  type Page,
  type Post as PostView
} from "@runfund/types";
import { AllowAnonymous, CurrentUser, StaffOnly } from "../auth/auth.decorators";
import { parseInput } from "../common/validation";
import { PostService } from "./post.service";
import { toPostView } from "./post.views";

@Controller("api/posts")
export class PostsController {
  constructor(@Inject(PostService) private readonly postService: PostService) {}

  @Get()
  @AllowAnonymous()
  async list(@Query() query: unknown): Promise<Page<PostView>> {
    const { search, ...pagination } = parseInput(postListQuerySchema, query);
    const page = search
      ? await this.postService.searchPublished(search, pagination)
      : await this.postService.listPublished(pagination);
    return { ...page, items: page.items.map(toPostView) };
  }

  @Get("author/:authorId")
  @StaffOnly()
  async listByAuthor(@Param("authorId") authorId: string): Promise<PostView[]> {
    const posts = await this.postService.listByAuthor(authorId);
    return posts.map(toPostView);
  }

  @Get(":slug")
  @AllowAnonymous()
  async getBySlug(@Param("slug") slug: string): Promise<PostView> {
    return toPostView(await this.postService.getPublishedBySlug(slug));
  }

  @Post()
  @HttpCode(201)
  @StaffOnly()
  async create(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<PostView> {
    const input = parseInput(createPostInputSchema, body);
    return toPostView(await this.postService.createPost(caller.id, input));
  }

  @Patch(":id")
  @StaffOnly()
  async update(@Param("id") id: string, @Body() body: unknown): Promise<PostView> {
    const input = parseInput(updatePostInputSchema, body);
    return toPostView(await this.postService.updatePost(id, input));
  }

  @Post(":id/publish")
  @HttpCode(200)
  @StaffOnly()
  async publish(@Param("id") id: string): Promise<PostView> {
    return toPostView(await this.postService.publishPost(id));
  }

  @Post(":id/unpublish")
  @HttpCode(200)
  @StaffOnly()
  async unpublish(@Param("id") id: string): Promise<PostView> {
    return toPostView(await this.postService.unpublishPost(id));
  }

  @Delete(":id")
  @HttpCode(204)
  async remove(@CurrentUser() caller: AuthUser, @Param("id") id: string): Promise<void> {
    await this.postService.deletePost(caller, id);
  }
}
