import { config } from "./config/index.js";
import { createApp } from "./app.js";
import { logger } from "./utils/logger.js";

const app = createApp();

const server = app.listen(config.app.port, () => {
  logger.info(
    {
      env: config.app.env,
      port: config.app.port,
      capcornBaseUrl: config.capcorn.baseUrl,
      hotelId: config.capcorn.hotelId,
    },
    `${config.app.name} v${config.app.version} listening`
  );
});
server.keepAliveTimeout = config.resilience.timeouts.keepAlive;

const shutdown = (signal: string): void => {
  logger.info(`${signal} received, shutting down gracefully...`);
  server.close(() => {
    logger.info("HTTP server closed");
    process.exit(0);
  });
  setTimeout(() => {
    logger.error("Forced shutdown after timeout");
    process.exit(1);
  }, 30000).unref();
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
