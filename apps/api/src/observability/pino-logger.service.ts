import type { LoggerService } from "@nestjs/common";
import type { Logger } from "pino";

export const formatLogMessage = (message: unknown): string => {
  if (typeof message === "string") {
    return message;
  }

  if (message instanceof Error) {
    return message.message;
  }

  return JSON.stringify(message) ?? String(message);
};

/**
 * Bridges Nest's LoggerService contract with our pino instance so
 * framework logs flow through the same structured sink.
 */
export class PinoLoggerService implements LoggerService {
  constructor(private readonly logger: Logger) {}

  log(message: unknown, context?: string) {
    this.logger.info({ context }, formatLogMessage(message));
  }

  error(message: unknown, trace?: string, context?: string) {
    this.logger.error({ context, trace }, formatLogMessage(message));
  }

  warn(message: unknown, context?: string) {
    this.logger.warn({ context }, formatLogMessage(message));
  }

  debug(message: unknown, context?: string) {
    this.logger.debug({ context }, formatLogMessage(message));
  }

  verbose(message: unknown, context?: string) {
    this.logger.trace({ context }, formatLogMessage(message));
  }
}
