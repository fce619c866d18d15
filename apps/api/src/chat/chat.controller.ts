import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Patch, Post, Query } from "@nestjs/common";
import {
  addChatMemberInputSchema,
  chatGroupListQuerySchema,
  chatGroupSearchQuerySchema,
  chatMessageListQuerySchema,
  createChatGroupInputSchema,
  sendChatMessageInputSchema,
  updateChatGroupInputSchema,
  type AuthUser,
  type ChatGroup,
  type ChatMessage,
  type Page
} from "@runfund/types";
import { CurrentUser, StaffOnly } from "../auth/auth.decorators";
import { parseInput } from "../common/validation";
import { ChatService } from "./chat.service";
import { toChatGroupView, toChatMessageView } from "./chat.views";

@Controller("api/chat")
export class ChatController {
  constructor(@Inject(ChatService) private readonly chatService: ChatService) {}

  @Post("groups")
  @HttpCode(201)
  async createGroup(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<ChatGroup> {
    const input = parseInput(createChatGroupInputSchema, body);
    return toChatGroupView(await this.chatService.createGroup(caller.id, input));
  }

  @Get("groups")
  async listMine(@CurrentUser() caller: AuthUser, @Query() query: unknown): Promise<Page<ChatGroup>> {
    const page = await this.chatService.listGroupsForUser(caller.id, parseInput(chatGroupListQuerySchema, query));
    return { ...page, items: page.items.map(toChatGroupView) };
  }

  @Get("groups/search")
  @StaffOnly()
  async search(@Query() query: unknown): Promise<ChatGroup[]> {
    const { q } = parseInput(chatGroupSearchQuerySchema, query);
    const groups = await this.chatService.searchGroups(q);
    return groups.map(toChatGroupView);
  }

  @Get("groups/:slug")
  async getGroup(@CurrentUser() caller: AuthUser, @Param("slug") slug: string): Promise<ChatGroup> {
    return toChatGroupView(await this.chatService.getGroupBySlug(caller.id, slug));
  }

  @Patch("groups/:slug")
  async updateGroup(
    @CurrentUser() caller: AuthUser,
    @Param("slug") slug: string,
    @Body() body: unknown
  ): Promise<ChatGroup> {
    const input = parseInput(updateChatGroupInputSchema, body);
    return toChatGroupView(await this.chatService.updateGroup(caller.id, slug, input));
  }

  @Delete("groups/:slug")
  @HttpCode(204)
  async deleteGroup(@CurrentUser() caller: AuthUser, @Param("slug") slug: string): Promise<void> {
    await this.chatService.deleteGroup(caller.id, slug);
  }

  @Post("groups/:slug/join")
  @HttpCode(200)
  async join(@CurrentUser() caller: AuthUser, @Param("slug") slug: string): Promise<ChatGroup> {
    return toChatGroupView(await this.chatService.joinGroup(caller.id, slug));
  }

  @Post("groups/:slug/leave")
  @HttpCode(200)
  async leave(@CurrentUser() caller: AuthUser, @Param("slug") slug: string): Promise<ChatGroup> {
    return toChatGroupView(await this.chatService.leaveGroup(caller.id, slug));
  }

  @Post("groups/:slug/members")
  @HttpCode(200)
  async addMember(
    @CurrentUser() caller: AuthUser,
    @Param("slug") slug: string,
    @Body() body: unknown
  ): Promise<ChatGroup> {
    const { userId } = parseInput(addChatMemberInputSchema, body);
    return toChatGroupView(await this.chatService.addMember(caller.id, slug, userId));
  }

  @Delete("groups/:slug/members/:userId")
  async removeMember(
    @CurrentUser() caller: AuthUser,
    @Param("slug") slug: string,
    @Param("userId") userId: string
  ): Promise<ChatGroup> {
    return toChatGroupView(await this.chatService.removeMember(caller.id, slug, userId));
  }

  @Get("groups/:slug/members/:userId/messages")
  async listMessagesBySender(
    @CurrentUser() caller: AuthUser,
    @Param("slug") slug: string,
    @Param("userId") userId: string,
    @Query() query: unknown
  ): Promise<Page<ChatMessage>> {
    const pagination = parseInput(chatMessageListQuerySchema, query);
    const page = await this.chatService.listMessagesBySender(caller.id, slug, userId, pagination);
    return { ...page, items: page.items.map(toChatMessageView) };
  }

  @Post("groups/:slug/messages")
  @HttpCode(201)
  async sendMessage(
    @CurrentUser() caller: AuthUser,
    @Param("slug") slug: string,
    @Body() body: unknown
  ): Promise<ChatMessage> {
    const { content } = parseInput(sendChatMessageInputSchema, body);
    return toChatMessageView(await this.chatService.sendMessage(caller.id, slug, content));
  }

  @Get("groups/:slug/messages")
  async listMessages(
    @CurrentUser() caller: AuthUser,
    @Param("slug") slug: string,
    @Query() query: unknown
  ): Promise<Page<ChatMessage>> {
    const page = await this.chatService.listMessages(caller.id, slug, parseInput(chatMessageListQuerySchema, query));
    return { ...page, items: page.items.map(toChatMessageView) };
  }

  @Patch("messages/:id")
  async updateMessage(
    @CurrentUser() caller: AuthUser,
    @Param("id") id: string,
    @Body() body: unknown
  ): Promise<ChatMessage> {
    const { content } = parseInput(sendChatMessageInputSchema, body);
    return toChatMessageView(await this.chatService.updateMessage(caller.id, id, content));
  }

  @Delete("messages/:id")
  @HttpCode(204)
  async deleteMessage(@CurrentUser() caller: AuthUser, @Param("id") id: string): Promise<void> {
    await this.chatService.deleteMessage(caller.id, id);
  }
}
