import { z } from "zod";
import { createPaginationSchema } from "./common";

const USERNAME_PATTERN = /^[a-zA-Z0-9_.-]+$/;

const bodyMeasure = () => z.number().finite().nonnegative().max(1000).default(0);

export const registerProfileInputSchema = z.object({
  username: z.string().trim().min(3).max(30).regex(USERNAME_PATTERN, "Usernames may only contain letters, numbers, dots, dashes and underscores."),
  email: z.string().trim().toLowerCase().email(),
  firstName: z.string().trim().max(100).default(""),
  lastName: z.string().trim().max(100).default(""),
  height: bodyMeasure(),
  weight: bodyMeasure(),
  profileImageUrl: z.string().trim().max(2048).default("")
});

export const updateProfileInputSchema = registerProfileInputSchema.partial();

export const userListQuerySchema = createPaginationSchema(20).extend({
  search: z.string().trim().min(1).max(100).optional().catch(undefined)
});

export const setFlagInputSchema = z.object({
  value: z.boolean()
});

export const publicUserSchema = z.object({
  id: z.string(),
  username: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  profileImageUrl: z.string(),
  dateJoined: z.string()
});

export const userProfileSchema = publicUserSchema.extend({
  email: z.string(),
  height: z.number(),
  weight: z.number(),
  isStaff: z.boolean(),
  isActive: z.boolean(),
  isVerified: z.boolean(),
  lastLogin: z.string().nullable()
});

export const userStatsSchema = z.object({
  total: z.number().int().nonnegative(),
  active: z.number().int().nonnegative(),
  staff: z.number().int().nonnegative(),
  verified: z.number().int().nonnegative()
});

export type RegisterProfileInput = z.infer<typeof registerProfileInputSchema>;
export type UpdateProfileInput = z.infer<typeof updateProfileInputSchema>;
export type UserListQuery = z.infer<typeof userListQuerySchema>;
export type PublicUser = z.infer<typeof publicUserSchema>;
export type UserProfile = z.infer<typeof userProfileSchema>;
export type UserStats = z.infer<typeof userStatsSchema>;
