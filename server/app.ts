import express, { type Express, type NextFunction, type Request, type Response } from "express";
import logger from "./utils/logger";

export function createApp(): Express {
  const app = express();
  app.use(express.json({ limit: "100kb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        logger.info(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  return app;
}

// Registered after the routes; catches body-parser failures such as malformed JSON.
export function errorHandler(
  err: Error & { status?: number; statusCode?: number },
  _req: Request,
  res: Response,
  _next: NextFunction,
) {
  const status = err.status || err.statusCode || 500;
  logger.error("Unhandled request error", { status, error: err.message });
  res.status(status).json({ success: false, error: status === 500 ? "Internal server error" : err.message });
}
