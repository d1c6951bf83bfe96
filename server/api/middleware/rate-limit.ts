import rateLimit from "express-rate-limit";
import { sendError } from "../types";

export function createLimiter(windowMs: number, max: number) {
  return rateLimit({
    windowMs,
    limit: max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res, _next, options) => {
      sendError(
        res,
        options.statusCode,
        "RATE_LIMITED",
        `Too many requests. Limit: ${max} per ${windowMs / 60000} minute(s).`,
      );
    },
  });
}
