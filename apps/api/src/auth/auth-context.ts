import { Buffer } from "node:buffer";
import type { IncomingHttpHeaders } from "node:http";
import { authUserSchema, type AuthUser } from "@runfund/types";
import type { Logger } from "pino";
import { z } from "zod";

export const AUTH_USER_HEADER = "x-runfund-user";

const encodedUserSchema = z
  .string()
  .min(1)
  .transform((value, ctx) => {
    try {
      const decoded: unknown = JSON.parse(Buffer.from(value, "base64url").toString("utf8"));
      return decoded;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "INVALID_BASE64_JSON" });
      return z.NEVER;
    }
  })
  .pipe(authUserSchema);

export const encodeAuthUser = (user: AuthUser): string =>
  Buffer.from(JSON.stringify(user), "utf8").toString("base64url");

/**
 * Reads the caller forwarded by the gateway. A missing or malformed header
 * yields an anonymous caller rather than an error.
 */
export const resolveAuthUser = (headers: IncomingHttpHeaders, logger: Logger): AuthUser | null => {
  const raw = headers[AUTH_USER_HEADER];

  if (typeof raw !== "string" || raw.length === 0) {
    return null;
  }

  const parsed = encodedUserSchema.safeParse(raw);

  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? "invalid auth header";
    logger.warn({ event: "auth.header_rejected", reason }, "Rejected malformed user payload from auth header");
    return null;
  }

  return parsed.data;
};
