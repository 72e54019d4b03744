/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router } from "express";
import { createHealthRouter } from "./health.js";
import { createConvertRouter, type ConvertRouterDeps } from "./convert.js";

export interface RouterDeps extends ConvertRouterDeps {
  cookiesPath: string | null;
}

export function createRouter(deps: RouterDeps): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(deps.cookiesPath));
  router.use("/api", createConvertRouter(deps));

  return router;
}
