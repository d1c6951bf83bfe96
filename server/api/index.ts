import { Router } from "express";
import { apiCors } from "./middleware/cors";
import { createLimiter } from "./middleware/rate-limit";
import { apiErrorHandler } from "./middleware/error-handler";
import { sendError } from "./types";

import statusRouter from "./routes/status";
import filesRouter from "./routes/files";
import gavRouter from "./routes/gav";

export interface ApiRouterOptions {
  /** Per-IP requests allowed per minute */
  rateLimitPerMinute: number;
}

export function createApiRouter({ rateLimitPerMinute }: ApiRouterOptions): Router {
  const router = Router();

  router.use(apiCors);
  router.use(createLimiter(60_000, rateLimitPerMinute));

  router.use("/", statusRouter);
  router.use("/", filesRouter);
  router.use("/", gavRouter);

  router.use((req, res) => {
    sendError(res, 404, "NOT_FOUND", `No route for ${req.method} ${req.baseUrl}${req.path}`);
  });

  // Error handler (must be last)
  router.use(apiErrorHandler);

  return router;
}
