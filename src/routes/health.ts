/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";
import { access, constants } from "fs/promises";

/** True when a cookie file is configured and readable. */
export async function cookiesAvailable(cookiesPath: string | null): Promise<boolean> {
  if (!cookiesPath) {
    return false;
  }
  try {
    await access(cookiesPath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

export function createHealthRouter(cookiesPath: string | null): Router {
  const healthRouter = Router();

  /** Simple health check endpoint, also reporting cookie availability. */
  healthRouter.get(["/api/health", "/health"], (_req, res, next) => {
    cookiesAvailable(cookiesPath)
      .then((cookies) => {
        res.json({ status: "ok", cookies });
      })
      .catch(next);
  });

  return healthRouter;
}
