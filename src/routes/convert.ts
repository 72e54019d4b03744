/**
 * Conversion Routes
 * Synchronous download and SSE progress endpoints.
 */

import { Router } from "express";
import { createConvertController } from "../controllers/convertController.js";
import { createStreamController } from "../controllers/streamController.js";
import { validateBody } from "../middlewares/validation.js";
import { createConvertSchema } from "../middlewares/schemas/convertSchema.js";
import type { AudioExtractor } from "../services/business/extractionService.js";

export interface ConvertRouterDeps {
  extractor: AudioExtractor;
  tmpDir: string;
  maxUrls: number;
}

export function createConvertRouter(deps: ConvertRouterDeps): Router {
  const convertRouter = Router();
  const convertSchema = createConvertSchema(deps.maxUrls);

  /** Convert and download: one MP3, or a zip for several */
  convertRouter.post("/convert", validateBody(convertSchema), createConvertController(deps));

  /** Convert while streaming yt-dlp progress (SSE) */
  convertRouter.post("/convert/stream", validateBody(convertSchema), createStreamController(deps));

  return convertRouter;
}
