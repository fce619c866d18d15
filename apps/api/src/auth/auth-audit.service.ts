import { Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import { authFailureCounter } from "../observability/telemetry";

interface AuditFailurePayload {
  requestId: string;
  operation: string;
  reason: "missing_user" | "staff_required";
  logger: Logger;
  userId?: string;
  ipAddress?: string;
}

@Injectable()
export class AuthAuditService {
  recordAuthorizationFailure(payload: AuditFailurePayload) {
    const { logger, ...details } = payload;
    authFailureCounter.add(1, { reason: details.reason });
    logger.warn({ event: "auth.authorization_failure", ...details }, "Authorization failure detected");
  }
}
