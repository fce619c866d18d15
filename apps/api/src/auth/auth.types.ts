import type { AuthUser } from "@runfund/types";
import type { FastifyRequest } from "fastify";

export interface AuthenticatedRequest extends FastifyRequest {
  authUser?: AuthUser | null;
}
