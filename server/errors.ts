import Database from "better-sqlite3";

export const MAINTENANCE_MESSAGE =
  "Database is under maintenance and not available. try again after 2 hours.";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "HttpError";
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, "BAD_REQUEST", message);
    this.name = "BadRequestError";
  }
}

/** The database file is missing, being replaced or unreadable. */
export class DatabaseUnavailableError extends HttpError {
  constructor(cause?: unknown) {
    super(503, "SERVICE_UNAVAILABLE", MAINTENANCE_MESSAGE, { cause });
    this.name = "DatabaseUnavailableError";
  }
}

// SQLite primary result codes that mean the file cannot be read right now.
const UNAVAILABLE_CODES = new Set([
  "SQLITE_CANTOPEN",
  "SQLITE_NOTADB",
  "SQLITE_CORRUPT",
  "SQLITE_BUSY",
  "SQLITE_IOERR",
]);

export function isDatabaseUnavailable(err: unknown): boolean {
  if (err instanceof DatabaseUnavailableError) return true;
  if (!(err instanceof Database.SqliteError)) return false;
  // Extended codes (SQLITE_IOERR_READ) share their primary code's prefix.
  const primary = err.code.split("_").slice(0, 2).join("_");
  return UNAVAILABLE_CODES.has(primary);
}
