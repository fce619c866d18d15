export interface ChatGroupRecord {
  id: string;
  name: string;
  slug: string;
  description: string;
  image: string;
  creatorId: string;
  members: string[];
  createdAt: Date;
  updatedAt: Date;
}

export type ChatGroupPatch = Partial<Pick<ChatGroupRecord, "name" | "description" | "image" | "updatedAt">>;

export interface ChatMessageRecord {
  id: string;
  groupId: string;
  senderId: string;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

export type ChatMessagePatch = Partial<Pick<ChatMessageRecord, "content" | "updatedAt">>;
