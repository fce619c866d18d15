import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from "@nestjs/common";
import { errorIssueSchema, type ErrorCode, type ErrorEnvelope, type ErrorIssue } from "@runfund/types";
import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { createRequestLogger } from "./logger";

const MONGO_DUPLICATE_KEY = 11000;

const STATUS_CODES: Readonly<Record<number, ErrorCode>> = {
  [HttpStatus.BAD_REQUEST]: "INVALID_INPUT",
  [HttpStatus.UNAUTHORIZED]: "UNAUTHORIZED",
  [HttpStatus.FORBIDDEN]: "FORBIDDEN",
  [HttpStatus.NOT_FOUND]: "NOT_FOUND",
  [HttpStatus.CONFLICT]: "CONFLICT",
  [HttpStatus.SERVICE_UNAVAILABLE]: "UNAVAILABLE"
};

const exceptionBodySchema = z.object({
  message: z.union([z.string(), z.array(z.string())]).optional(),
  issues: z.array(errorIssueSchema).optional()
});

export interface ResolvedHttpError {
  status: number;
  code: ErrorCode;
  message: string;
  issues?: ErrorIssue[];
}

const codeForStatus = (status: number): ErrorCode =>
  STATUS_CODES[status] ?? (status >= HttpStatus.INTERNAL_SERVER_ERROR ? "INTERNAL" : "INVALID_INPUT");

const fromHttpException = (exception: HttpException): ResolvedHttpError => {
  const status = exception.getStatus();
  const body = exceptionBodySchema.safeParse(exception.getResponse());
  const bodyMessage = body.success ? body.data.message : undefined;
  const message = Array.isArray(bodyMessage) ? bodyMessage.join("; ") : bodyMessage ?? exception.message;

  return {
    status,
    code: codeForStatus(status),
    message,
    ...(body.success && body.data.issues ? { issues: body.data.issues } : {})
  };
};

/**
 * Maps anything thrown while handling a request onto a status and envelope
 * code. Unknown failures never leak their message.
 */
export const resolveHttpError = (exception: unknown): ResolvedHttpError => {
  if (exception instanceof HttpException) {
    return fromHttpException(exception);
  }

  if (typeof exception === "object" && exception !== null) {
    if ("code" in exception && exception.code === MONGO_DUPLICATE_KEY) {
      return { status: HttpStatus.CONFLICT, code: "CONFLICT", message: "A record with the same unique value already exists." };
    }

    if (
      "statusCode" in exception &&
      typeof exception.statusCode === "number" &&
      exception.statusCode >= 400 &&
      exception.statusCode < 500 &&
      exception instanceof Error
    ) {
      return { status: exception.statusCode, code: codeForStatus(exception.statusCode), message: exception.message };
    }
  }

  return { status: HttpStatus.INTERNAL_SERVER_ERROR, code: "INTERNAL", message: "Internal server error." };
};

export const buildErrorEnvelope = (resolved: ResolvedHttpError, requestId: string, now: Date): ErrorEnvelope => ({
  code: resolved.code,
  message: resolved.message,
  requestId,
  timestamp: now.toISOString(),
  ...(resolved.issues ? { issues: resolved.issues } : {})
});

@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const http = host.switchToHttp();
    const request = http.getRequest<FastifyRequest>();
    const reply = http.getResponse<FastifyReply>();
    const requestId = String(request.id);
    const resolved = resolveHttpError(exception);
    const logger = createRequestLogger(requestId);

    if (resolved.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      logger.error({ err: exception, event: "http.unhandled_error", url: request.url }, "Request failed");
    } else {
      logger.debug({ event: "http.request_rejected", code: resolved.code, url: request.url }, resolved.message);
    }

    reply.status(resolved.status).send(buildErrorEnvelope(resolved, requestId, new Date()));
  }
}
