import { randomUUID } from "node:crypto";
import type { IncomingMessage } from "node:http";
import cors, { type FastifyCorsOptions } from "@fastify/cors";
import helmet, { type FastifyHelmetOptions } from "@fastify/helmet";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, type NestFastifyApplication } from "@nestjs/platform-fastify";
import { AppModule } from "./app.module";
import { loadApiConfig, normalizeOrigin, type ApiConfig } from "./config/api.config";
import { apiLogger } from "./observability/logger";
import { PinoLoggerService } from "./observability/pino-logger.service";

const REQUEST_ID_HEADER = "x-request-id";

type OriginCallback = (error: Error | null, allow: boolean) => void;

/** Fastify answers with `statusCode` when a plugin rejects the request. */
export class OriginNotAllowedError extends Error {
  readonly statusCode = 403;

  constructor(readonly origin: string) {
    super("Origin not allowed");
    this.name = "OriginNotAllowedError";
  }
}

/** Requests without an Origin header come from servers and tools, not browsers, and pass. */
export const createOriginCheck = (allowedOrigins: readonly string[]) => {
  const allowed = new Set(allowedOrigins);

  return (requestOrigin: string | undefined, done: OriginCallback): void => {
    if (!requestOrigin || allowed.has(normalizeOrigin(requestOrigin))) {
      done(null, true);
      return;
    }

    apiLogger.warn({ event: "cors.blocked", origin: requestOrigin }, "Origin not allowed");
    done(new OriginNotAllowedError(requestOrigin), false);
  };
};

export const createCorsOptions = ({ allowedOrigins }: Pick<ApiConfig, "allowedOrigins">): FastifyCorsOptions => ({
  origin: createOriginCheck(allowedOrigins),
  credentials: true
});

export const createHelmetOptions = ({
  hstsMaxAgeSeconds,
  referrerPolicy
}: Pick<ApiConfig, "hstsMaxAgeSeconds" | "referrerPolicy">): FastifyHelmetOptions => ({
  hsts: hstsMaxAgeSeconds > 0 ? { maxAge: hstsMaxAgeSeconds, includeSubDomains: true } : false,
  frameguard: { action: "deny" },
  referrerPolicy: { policy: referrerPolicy },
  crossOriginEmbedderPolicy: false
});

export const resolveRequestId = (header: string | string[] | undefined): string => {
  const forwarded = (Array.isArray(header) ? header[0] : header)?.trim();
  return forwarded || randomUUID();
};

export const createApiApp = async (config: ApiConfig = loadApiConfig()): Promise<NestFastifyApplication> => {
  const adapter = new FastifyAdapter({
    logger: apiLogger,
    genReqId: (request: IncomingMessage) => resolveRequestId(request.headers[REQUEST_ID_HEADER]),
    requestIdHeader: REQUEST_ID_HEADER,
    requestIdLogLabel: "requestId"
  });

  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter, { bufferLogs: true });
  app.useLogger(new PinoLoggerService(apiLogger));

  app.getHttpAdapter().getInstance().addHook("onRequest", (request, reply, done) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    done();
  });

  await app.register(helmet, createHelmetOptions(config));
  await app.register(cors, createCorsOptions(config));

  apiLogger.info(
    { event: "security.configured", origins: config.allowedOrigins, hstsMaxAgeSeconds: config.hstsMaxAgeSeconds },
    "Configured CORS allowlist and security headers"
  );

  return app;
};
