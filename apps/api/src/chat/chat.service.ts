import { BadRequestException, ForbiddenException, Inject, Injectable, NotFoundException } from "@nestjs/common";
import type { CreateChatGroupInput, Page, Pagination, UpdateChatGroupInput } from "@runfund/types";
import { CLOCK, ID_GENERATOR, type Clock, type IdGenerator } from "../common/identity";
import { toPage, toRange } from "../common/pagination";
import { assertOwnership, omitUndefined } from "../common/records";
import { createSlug } from "../common/slug";
import { createModuleLogger } from "../observability/logger";
import { UserService } from "../users/user.service";
import {
  CHAT_GROUP_REPOSITORY,
  CHAT_MESSAGE_REPOSITORY,
  type ChatGroupRepository,
  type ChatMessageRepository
} from "./chat.repositories";
import type { ChatGroupRecord, ChatMessageRecord } from "./chat.types";

const isMember = (group: ChatGroupRecord, userId: string): boolean => group.members.includes(userId);

const requireMember = (group: ChatGroupRecord, userId: string, message: string): void => {
  if (!isMember(group, userId)) {
    throw new ForbiddenException(message);
  }
};

@Injectable()
export class ChatService {
  private readonly logger = createModuleLogger("ChatService");

  constructor(
    @Inject(CHAT_GROUP_REPOSITORY) private readonly groups: ChatGroupRepository,
    @Inject(CHAT_MESSAGE_REPOSITORY) private readonly messages: ChatMessageRepository,
    @Inject(UserService) private readonly userService: UserService,
    @Inject(ID_GENERATOR) private readonly generateId: IdGenerator,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  /** Every id in `memberIds` must belong to an existing user. */
  async createGroup(creatorId: string, input: CreateChatGroupInput): Promise<ChatGroupRecord> {
    const invited = [...new Set(input.memberIds)].filter((userId) => userId !== creatorId);
    const known = await this.userService.getUsersByIds(invited);
    const unknown = invited.filter((userId) => !known.has(userId));

    if (unknown.length > 0) {
      throw new NotFoundException(`Unknown group members: ${unknown.join(", ")}.`);
    }

    const id = this.generateId();
    const now = this.clock();

    const group = await this.groups.create({
      id,
      name: input.name,
      slug: createSlug(input.name, id),
      description: input.description,
      image: input.image,
      creatorId,
      members: [creatorId, ...invited],
      createdAt: now,
      updatedAt: now
    });

    this.logger.info(
      { event: "chat.group_created", groupId: id, creatorId, memberCount: group.members.length },
      "Chat group created"
    );

    return group;
  }

  async getGroupBySlug(actorId: string, slug: string): Promise<ChatGroupRecord> {
    const group = await this.findGroup(slug);
    requireMember(group, actorId, "Only group members can view this group.");
    return group;
  }

  async listGroupsForUser(userId: string, pagination: Pagination): Promise<Page<ChatGroupRecord>> {
    const groups = await this.groups.listForMember({ userId, ...toRange(pagination) });
    return toPage(groups, pagination);
  }

  searchGroups(query: string): Promise<ChatGroupRecord[]> {
    return this.groups.searchByName(query.trim());
  }

  /** The slug stays as created. */
  async updateGroup(actorId: string, slug: string, input: UpdateChatGroupInput): Promise<ChatGroupRecord> {
    const group = await this.findGroup(slug);
    assertOwnership(actorId, group.creatorId, "Only the group creator can change it.");

    return this.expectGroup(await this.groups.update(group.id, { ...omitUndefined(input), updatedAt: this.clock() }));
  }

  async deleteGroup(actorId: string, slug: string): Promise<void> {
    const group = await this.findGroup(slug);
    assertOwnership(actorId, group.creatorId, "Only the group creator can delete it.");

    if (!(await this.groups.delete(group.id))) {
      throw new NotFoundException("Chat group not found.");
    }

    this.logger.info({ event: "chat.group_deleted", groupId: group.id }, "Chat group deleted");
  }

  async joinGroup(userId: string, slug: string): Promise<ChatGroupRecord> {
    const group = await this.findGroup(slug);
    return this.expectGroup(await this.groups.addMember(group.id, userId, this.clock()));
  }

  async leaveGroup(userId: string, slug: string): Promise<ChatGroupRecord> {
    const group = await this.findGroup(slug);

    if (group.creatorId === userId) {
      throw new BadRequestException("The group creator cannot leave the group.");
    }

    return this.expectGroup(await this.groups.removeMember(group.id, userId, this.clock()));
  }

  /** Any member may invite; the invited user must have a profile. */
  async addMember(actorId: string, slug: string, userId: string): Promise<ChatGroupRecord> {
    const group = await this.findGroup(slug);
    requireMember(group, actorId, "Only group members can add members.");
    await this.userService.getUserById(userId);

    const updated = this.expectGroup(await this.groups.addMember(group.id, userId, this.clock()));
    this.logger.info({ event: "chat.member_added", groupId: group.id, userId, actorId }, "Chat member added");
    return updated;
  }

  async removeMember(actorId: string, slug: string, userId: string): Promise<ChatGroupRecord> {
    const group = await this.findGroup(slug);

    if (actorId !== group.creatorId && actorId !== userId) {
      throw new ForbiddenException("Only the group creator can remove other members.");
    }

    if (userId === group.creatorId) {
      throw new BadRequestException("The group creator cannot leave the group.");
    }

    return this.expectGroup(await this.groups.removeMember(group.id, userId, this.clock()));
  }

  async sendMessage(senderId: string, slug: string, content: string): Promise<ChatMessageRecord> {
    const group = await this.findGroup(slug);
    requireMember(group, senderId, "Only group members can send messages.");

    const now = this.clock();
    return this.messages.create({
      id: this.generateId(),
      groupId: group.id,
      senderId,
      content,
      createdAt: now,
      updatedAt: now
    });
  }

  async listMessages(actorId: string, slug: string, pagination: Pagination): Promise<Page<ChatMessageRecord>> {
    const group = await this.findGroup(slug);
    requireMember(group, actorId, "Only group members can read messages.");

    const messages = await this.messages.listByGroup({ groupId: group.id, ...toRange(pagination) });
    return toPage(messages, pagination);
  }

  async listMessagesBySender(
    actorId: string,
    slug: string,
    senderId: string,
    pagination: Pagination
  ): Promise<Page<ChatMessageRecord>> {
    const group = await this.findGroup(slug);
    requireMember(group, actorId, "Only group members can read messages.");

    const messages = await this.messages.listByGroup({ groupId: group.id, senderId, ...toRange(pagination) });
    return toPage(messages, pagination);
  }

  async updateMessage(actorId: string, id: string, content: string): Promise<ChatMessageRecord> {
    const message = await this.findMessage(id);
    assertOwnership(actorId, message.senderId, "Only the sender can change this message.");

    const updated = await this.messages.update(id, { content, updatedAt: this.clock() });

    if (!updated) {
      throw new NotFoundException("Message not found.");
    }

    return updated;
  }

  /** The sender or the creator of the group can delete a message. */
  async deleteMessage(actorId: string, id: string): Promise<void> {
    const message = await this.findMessage(id);

    if (message.senderId !== actorId) {
      const group = await this.groups.findById(message.groupId);

      if (!group || group.creatorId !== actorId) {
        throw new ForbiddenException("Only the sender or the group creator can delete this message.");
      }
    }

    if (!(await this.messages.delete(id))) {
      throw new NotFoundException("Message not found.");
    }
  }

  private async findGroup(slug: string): Promise<ChatGroupRecord> {
    return this.expectGroup(await this.groups.findBySlug(slug));
  }

  private expectGroup(group: ChatGroupRecord | null): ChatGroupRecord {
    if (!group) {
      throw new NotFoundException("Chat group not found.");
    }

    return group;
  }

  private async findMessage(id: string): Promise<ChatMessageRecord> {
    const message = await this.messages.findById(id);

    if (!message) {
      throw new NotFoundException("Message not found.");
    }

    return message;
  }
}
