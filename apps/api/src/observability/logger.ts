import pino from "pino";

/**
 * Root pino logger for the API. Output is JSON with ISO timestamps and the
 * level label so log shippers can index it without extra parsing.
 */
export const apiLogger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "runfund-api" },
  formatters: {
    level: (label) => ({ level: label })
  },
  timestamp: pino.stdTimeFunctions.isoTime
});

export const createModuleLogger = (module: string) => apiLogger.child({ module });

export const createRequestLogger = (requestId: string) => apiLogger.child({ requestId });
