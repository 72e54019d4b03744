/**
 * Validation Middleware
 * Validates request bodies against Zod schemas.
 */

import type { Request, Response, NextFunction } from "express";
import { ZodError, type ZodTypeAny } from "zod";

/**
 * Validates request body against a Zod schema.
 * Returns 400 with the first issue as `detail` if invalid.
 */
export function validateBody(schema: ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const [issue] = error.issues;
        res.status(400).json({
          detail: issue ? issue.message : "Invalid request body",
        });
      } else {
        next(error);
      }
    }
  };
}
