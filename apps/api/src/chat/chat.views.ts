import type { ChatGroup, ChatMessage } from "@runfund/types";
import type { ChatGroupRecord, ChatMessageRecord } from "./chat.types";

export const toChatGroupView = ({ createdAt, updatedAt, ...group }: ChatGroupRecord): ChatGroup => ({
  ...group,
  createdAt: createdAt.toISOString(),
  updatedAt: updatedAt.toISOString()
});

export const toChatMessageView = ({ createdAt, updatedAt, ...message }: ChatMessageRecord): ChatMessage => ({
  ...message,
  createdAt: createdAt.toISOString(),
  updatedAt: updatedAt.toISOString()
});
