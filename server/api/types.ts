import type { Response } from "express";
import type { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { HttpError, MAINTENANCE_MESSAGE, isDatabaseUnavailable } from "../errors";
import { closeDatabase } from "../db";

export interface ApiErrorBody {
  error: { code: string; message: string };
  meta: { timestamp: string };
}

export function errorBody(code: string, message: string): ApiErrorBody {
  return {
    error: { code, message },
    meta: { timestamp: new Date().toISOString() },
  };
}

export function sendError(res: Response, status: number, code: string, message: string): void {
  res.status(status).json(errorBody(code, message));
}

/**
 * Parse route params or query against a schema. On failure the 422 response
 * has already been sent and null is returned.
 */
export function validate<T extends z.ZodTypeAny>(res: Response, schema: T, input: unknown): z.output<T> | null {
  const result = schema.safeParse(input);
  if (result.success) return result.data;
  sendError(res, 422, "VALIDATION_ERROR", fromZodError(result.error).message);
  return null;
}

export function handleRouteError(res: Response, error: unknown, fallbackMessage: string): void {
  if (isDatabaseUnavailable(error)) {
    console.error("Database unavailable:", error);
    // Drop the handle so the next request reopens the file.
    closeDatabase();
    return sendError(res, 503, "SERVICE_UNAVAILABLE", MAINTENANCE_MESSAGE);
  }
  if (error instanceof HttpError) {
    return sendError(res, error.status, error.code, error.message);
  }
  console.error(`${fallbackMessage}:`, error);
  sendError(res, 500, "INTERNAL_ERROR", fallbackMessage);
}
