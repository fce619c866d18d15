import { z } from "zod";
import { createPaginationSchema } from "./common";

export const createChatGroupInputSchema = z.object({
  name: z.string().trim().min(1).max(20),
  description: z.string().trim().max(500).default(""),
  image: z.string().trim().max(2048).default(""),
  /** Users added alongside the creator. */
  memberIds: z.array(z.string().trim().min(1)).max(100).default([])
});

export const updateChatGroupInputSchema = createChatGroupInputSchema.omit({ memberIds: true }).partial();

export const addChatMemberInputSchema = z.object({
  userId: z.string().trim().min(1)
});

export const sendChatMessageInputSchema = z.object({
  content: z.string().trim().min(1).max(2000)
});

export const chatGroupSearchQuerySchema = z.object({
  q: z.string().trim().min(1).max(20)
});

export const chatGroupListQuerySchema = createPaginationSchema(10);
export const chatMessageListQuerySchema = createPaginationSchema(20);

export const chatGroupSchema = z.object({
  id: z.string(),
  name: z.string(),
  slug: z.string(),
  description: z.string(),
  image: z.string(),
  creatorId: z.string(),
  members: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string()
});

export const chatMessageSchema = z.object({
  id: z.string(),
  groupId: z.string(),
  senderId: z.string(),
  content: z.string(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export type CreateChatGroupInput = z.infer<typeof createChatGroupInputSchema>;
export type UpdateChatGroupInput = z.infer<typeof updateChatGroupInputSchema>;
export type ChatGroup = z.infer<typeof chatGroupSchema>;
export type ChatMessage = z.infer<typeof chatMessageSchema>;
