import express from "express";
import helmet from "helmet";
import cors from "cors";
import { createRouter, type RouterDeps } from "./routes/index.js";
import { apiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler } from "./middlewares/errorHandler.js";

/**
 * Builds the Express application.
 * Serves the download API, the SSE progress stream and the file browser.
 */
export function createApp(deps: RouterDeps): express.Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS for cross-origin requests. */
  app.use(cors());
  /** Parses JSON request bodies. */
  app.use(express.json({ limit: "100kb" }));

  /** Rate limiting for all routes. */
  app.use(apiLimiter);

  /** Application routes. */
  app.use(createRouter(deps));

  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}
