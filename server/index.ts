import "dotenv/config";
import { createApp, errorHandler } from "./app";
import { ConfigError, loadConfig } from "./config";
import { registerRoutes } from "./routes";
import { createServices } from "./services";
import logger from "./utils/logger";

async function main() {
  const config = loadConfig();
  const app = createApp();
  const server = await registerRoutes(app, createServices(config));
  app.use(errorHandler);

  server.listen(config.port, "0.0.0.0", () => {
    logger.info(`serving on port ${config.port}`, { env: config.env });
  });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message);
  } else {
    logger.error("Failed to start server", { error: error instanceof Error ? error.message : String(error) });
  }
  process.exit(1);
});
