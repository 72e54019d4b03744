/**
 * Conversion Request Schema
 * Zod schema for `{ "urls": [...] }` bodies.
 */

import { z } from "zod";

export const DEFAULT_MAX_URLS = 10;

export function createConvertSchema(maxUrls: number = DEFAULT_MAX_URLS) {
  return z.object(
    {
      urls: z
        .array(z.string({ invalid_type_error: "Each URL must be a string" }), {
          required_error: "No URLs provided",
          invalid_type_error: "urls must be an array of strings",
        })
        .min(1, "No URLs provided")
        .max(maxUrls, `At most ${maxUrls} URLs per request`),
    },
    {
      required_error: "Request body must be a JSON object",
      invalid_type_error: "Request body must be a JSON object",
    }
  );
}

export type ConvertRequest = z.infer<ReturnType<typeof createConvertSchema>>;
