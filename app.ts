import "dotenv/config";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import { requestLogger } from "./src/middlewares/logger.middleware";
import { rateLimiter, validateContentType } from "./src/middlewares/validation.middleware";
import { errorMiddleware } from "./src/middlewares/error.middleware";
import { loadConfig } from "./src/configs/environment";
import { logger } from "./src/utils/logger";
import { FitnessApplication } from "./src/main";
import routes from "./src/routes";

export const createApp = () => {
  const config = loadConfig();
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.api.cors.origin }));
  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(validateContentType);
  app.use(rateLimiter);
  app.use(requestLogger);

  app.use("/", routes);

  // Error middleware should be last
  app.use(errorMiddleware);
  return app;
};

async function start() {
  const fitnessApp = new FitnessApplication();
  await fitnessApp.initialize();

  const port = loadConfig().port;
  const server = createApp().listen(port, () =>
    logger.info(`Fitness tracking API listening on port ${port}`)
  );

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      fitnessApp
        .shutdown()
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error("Shutdown failed", error);
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
  start().catch((error) => {
    logger.error("Failed to start server", error);
    process.exit(1);
  });
}
