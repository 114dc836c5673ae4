import rateLimit from "express-rate-limit";
import type { Request, Response } from "express";

/**
 * Rate limiting for import submissions
 *
 * Each accepted upload occupies a worker slot, so submissions are limited
 * per client IP. The per-minute limit comes from
 * IMPORT_RATE_LIMIT_PER_MINUTE.
 */

const WINDOW_MS = 60 * 1000; // 1 minute window

export function createImportRateLimiter(limitPerMinute: number) {
  return rateLimit({
    windowMs: WINDOW_MS,
    limit: limitPerMinute,
    keyGenerator: (req: Request): string => `ip:${req.ip ?? "unknown"}`,
    standardHeaders: true,
    legacyHeaders: false,
    validate: { xForwardedForHeader: false },
    handler: (_req: Request, res: Response) => {
      res.status(429).json({
        error: "Too many requests",
        message: `Rate limit exceeded. Max ${limitPerMinute} imports per minute.`,
        retryAfter: Math.ceil(WINDOW_MS / 1000),
      });
    },
  });
}
