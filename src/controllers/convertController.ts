/**
 * Convert Controller
 * POST /api/convert: converts every URL and answers with one MP3, a zip, or a failure report.
 */

import type { Request, Response, NextFunction } from "express";
import path from "path";
import type { AudioExtractor } from "../services/business/extractionService.js";
import {
  ALL_FAILED_MESSAGE,
  assertAllowedUrls,
  convertUrls,
  decideDelivery,
} from "../services/business/conversionService.js";
import { ARCHIVE_NAME, createZipArchive } from "../services/business/archiveService.js";
import type { ConvertRequest } from "../middlewares/schemas/convertSchema.js";
import { createJobDirectory, removeJobDirectory } from "../utils/jobDirectory.js";

export interface ConvertControllerDeps {
  extractor: AudioExtractor;
  tmpDir: string;
}

/**
 * Sends a file as an attachment and resolves once the transfer is over.
 * Express percent-encodes non-ASCII names into `filename*`.
 */
function sendDownload(res: Response, filePath: string, fileName: string, contentType: string): Promise<void> {
  return new Promise((resolve, reject) => {
    res.type(contentType);
    res.download(filePath, fileName, (error?: Error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

export function createConvertController(deps: ConvertControllerDeps) {
  return async function convert(
    req: Request<Record<string, string>, unknown, ConvertRequest>,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    let jobDir: string | null = null;

    const abort = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        abort.abort();
      }
    });

    try {
      const { urls } = req.body;
      assertAllowedUrls(urls);

      jobDir = await createJobDirectory(deps.tmpDir, "convert-");
      console.log(`[convert] Converting ${urls.length} URL(s) in ${path.basename(jobDir)}`);

      const outcomes = await convertUrls(urls, jobDir, deps.extractor, abort.signal);
      const delivery = decideDelivery(outcomes);

      switch (delivery.kind) {
        case "failed":
          res.status(500).json({ detail: ALL_FAILED_MESSAGE, results: delivery.results });
          break;
        case "single":
          await sendDownload(res, delivery.audioPath, path.basename(delivery.audioPath), "audio/mpeg");
          break;
        case "archive": {
          const zipPath = await createZipArchive(delivery.audioPaths, path.join(jobDir, ARCHIVE_NAME));
          await sendDownload(res, zipPath, ARCHIVE_NAME, "application/zip");
          break;
        }
      }
    } catch (error) {
      if (res.headersSent) {
        console.error("[convert] Download interrupted:", error);
      } else {
        next(error);
      }
    } finally {
      if (jobDir) {
        await removeJobDirectory(jobDir);
      }
    }
  };
}
