/**
 * Rate Limiting Middleware
 * Prevents API abuse by limiting request rates.
 */

import rateLimit from "express-rate-limit";
import type { AppConfig } from "../config/env.js";

/**
 * General API rate limiter, sized from config.
 * Built per app instance so each one keeps its own counters.
 */
export function createApiLimiter(config: AppConfig["rateLimit"]) {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.limit,
    message: { detail: "Too many requests from this IP, please try again later." },
    standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
    legacyHeaders: false, // Disable `X-RateLimit-*` headers
  });
}
