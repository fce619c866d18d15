import type { Range } from "../common/pagination";
import type { ChatGroupPatch, ChatGroupRecord, ChatMessagePatch, ChatMessageRecord } from "./chat.types";

export const CHAT_GROUP_REPOSITORY = Symbol("CHAT_GROUP_REPOSITORY");
export const CHAT_MESSAGE_REPOSITORY = Symbol("CHAT_MESSAGE_REPOSITORY");

export const GROUP_SEARCH_LIMIT = 20;

export interface MemberGroupFilter extends Range {
  userId: string;
}

export interface ChatGroupRepository {
  create(group: ChatGroupRecord): Promise<ChatGroupRecord>;
  findById(id: string): Promise<ChatGroupRecord | null>;
  findBySlug(slug: string): Promise<ChatGroupRecord | null>;
  update(id: string, patch: ChatGroupPatch): Promise<ChatGroupRecord | null>;
  addMember(id: string, userId: string, updatedAt: Date): Promise<ChatGroupRecord | null>;
  removeMember(id: string, userId: string, updatedAt: Date): Promise<ChatGroupRecord | null>;
  delete(id: string): Promise<boolean>;
  /** Most recently created first. */
  listForMember(filter: MemberGroupFilter): Promise<ChatGroupRecord[]>;
  /** Case-insensitive name match, at most {@link GROUP_SEARCH_LIMIT} results. */
  searchByName(query: string): Promise<ChatGroupRecord[]>;
}

export interface GroupMessageFilter extends Range {
  groupId: string;
  senderId?: string;
}

export interface ChatMessageRepository {
  create(message: ChatMessageRecord): Promise<ChatMessageRecord>;
  findById(id: string): Promise<ChatMessageRecord | null>;
  update(id: string, patch: ChatMessagePatch): Promise<ChatMessageRecord | null>;
  delete(id: string): Promise<boolean>;
  /** Newest first. */
  listByGroup(filter: GroupMessageFilter): Promise<ChatMessageRecord[]>;
}
