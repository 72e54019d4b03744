/**
 * Stream Controller
 * POST /api/convert/stream: relays conversion progress as Server-Sent Events.
 */

import type { Request, Response, NextFunction } from "express";
import type { AudioExtractor } from "../services/business/extractionService.js";
import { formatSseMessage, streamConversionProgress } from "../services/business/progressStreamService.js";
import type { ConvertRequest } from "../middlewares/schemas/convertSchema.js";
import { errorMessage } from "../utils/errors.js";

export interface StreamControllerDeps {
  extractor: AudioExtractor;
  tmpDir: string;
}

export function createStreamController(deps: StreamControllerDeps) {
  return async function streamConvert(
    req: Request<Record<string, string>, unknown, ConvertRequest>,
    res: Response,
    _next: NextFunction
  ): Promise<void> {
    const { urls } = req.body;
    const abort = new AbortController();

    console.log(`[sse] Client connected for ${urls.length} URL(s)`);

    // Set SSE headers
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering
    res.flushHeaders(); // Establish SSE connection

    // Stop relaying when the client goes away
    res.on("close", () => {
      if (!res.writableFinished) {
        console.log("[sse] Client disconnected");
        abort.abort();
      }
    });

    try {
      await streamConversionProgress(urls, res, {
        extractor: deps.extractor,
        tmpDir: deps.tmpDir,
        signal: abort.signal,
      });
    } catch (error) {
      console.error("[sse] Error streaming conversion:", error);
      if (!res.writableEnded) {
        res.write(formatSseMessage({ type: "error", url: "", message: errorMessage(error) }));
        res.write(formatSseMessage({ type: "end" }));
        res.end();
      }
    }
  };
}
