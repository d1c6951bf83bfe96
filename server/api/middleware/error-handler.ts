import type { Request, Response, NextFunction } from "express";
import { HttpError, MAINTENANCE_MESSAGE, isDatabaseUnavailable } from "../../errors";
import { closeDatabase } from "../../db";
import { errorBody } from "../types";

const STATUS_CODES: Record<number, string> = {
  400: "BAD_REQUEST",
  404: "NOT_FOUND",
  413: "PAYLOAD_TOO_LARGE",
  422: "VALIDATION_ERROR",
  429: "RATE_LIMITED",
  500: "INTERNAL_ERROR",
  503: "SERVICE_UNAVAILABLE",
};

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (typeof err === "object" && err !== null) {
    const candidate = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof candidate === "number" && candidate >= 400 && candidate < 600) return candidate;
  }
  return 500;
}

export function apiErrorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(err);
  }

  if (isDatabaseUnavailable(err)) {
    console.error("Database unavailable:", err);
    closeDatabase();
    res.status(503).json(errorBody("SERVICE_UNAVAILABLE", MAINTENANCE_MESSAGE));
    return;
  }

  const status = statusOf(err);
  const code = STATUS_CODES[status] || "INTERNAL_ERROR";
  const message = status < 500 && err instanceof Error && err.message ? err.message : "Internal Server Error";

  if (status >= 500) {
    console.error("API error:", err);
  }

  res.status(status).json(errorBody(code, message));
}
