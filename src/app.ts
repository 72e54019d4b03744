import express, { type Express } from "express";
import helmet from "helmet";
import cors from "cors";
import type { AppConfig } from "./config/env.js";
import { createRouter } from "./routes/index.js";
import { createApiLimiter } from "./middlewares/rateLimiting.js";
import { createErrorHandler } from "./middlewares/errorHandler.js";
import { createYtDlpExtractor, type AudioExtractor } from "./services/business/extractionService.js";

export interface AppOptions {
  config: AppConfig;
  /** Defaults to the yt-dlp extractor built from config. */
  extractor?: AudioExtractor;
}

/**
 * Builds the Express application.
 * Configures global middleware and routes.
 */
export function createApp({ config, extractor }: AppOptions): Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS; "*" allows any origin. Content-Disposition is exposed so callers can read file names. */
  app.use(
    cors(
      config.frontendOrigin === "*"
        ? { origin: "*", exposedHeaders: ["Content-Disposition"] }
        : { origin: [config.frontendOrigin], credentials: true, exposedHeaders: ["Content-Disposition"] }
    )
  );
  /** Parses JSON request bodies. */
  app.use(express.json({ limit: "1mb" }));

  /** Rate limiting for all routes. */
  app.use(createApiLimiter(config.rateLimit));

  /** Application routes. */
  app.use(
    createRouter({
      extractor:
        extractor ??
        createYtDlpExtractor({
          binaryPath: config.ytdlpPath,
          timeoutMs: config.extractionTimeoutMs,
          cookiesPath: config.cookiesPath,
        }),
      tmpDir: config.tmpDir,
      maxUrls: config.maxUrls,
      cookiesPath: config.cookiesPath,
    })
  );

  /** Global error handler - MUST be last. */
  app.use(createErrorHandler(config.nodeEnv));

  return app;
}
