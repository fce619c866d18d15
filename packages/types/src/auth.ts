import { z } from "zod";

/**
 * Identity forwarded by the gateway in the `x-runfund-user` header once it has
 * authenticated the caller.
 */
export const authUserSchema = z.object({
  id: z.string().trim().min(1),
  username: z.string().trim().min(1),
  isStaff: z.boolean().default(false)
});

export type AuthUser = z.infer<typeof authUserSchema>;
