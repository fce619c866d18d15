import "reflect-metadata";
import { createApiApp } from "./bootstrap";
import { loadApiConfig } from "./config/api.config";
import { apiLogger } from "./observability/logger";

const bootstrap = async () => {
  const config = loadApiConfig();
  const app = await createApiApp(config);

  await app.listen({ port: config.port, host: config.host });
  apiLogger.info({ event: "bootstrap.complete", port: config.port, host: config.host }, "API running");
};

bootstrap().catch((error: unknown) => {
  apiLogger.fatal({ err: error, event: "bootstrap.failed" }, "API failed to start");
  process.exitCode = 1;
});
