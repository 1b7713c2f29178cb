/**
 * `INVALID_QUERY` marks a full-text MATCH expression SQLite could not parse;
 * recall passes user input to FTS5 verbatim, so that one is a usage problem.
 */
export type DatabaseErrorCode =
  | "CONSTRAINT"
  | "BUSY"
  | "INVALID_QUERY"
  | "SQL_ERROR"
  | "NOT_FOUND"
  | "UNKNOWN";

export interface DatabaseErrorOptions {
  sql?: string;
  cause?: unknown;
}

export class DatabaseError extends Error {
  readonly code: DatabaseErrorCode;
  readonly sql?: string;

  constructor(message: string, code: DatabaseErrorCode, options: DatabaseErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "DatabaseError";
    this.code = code;
    this.sql = options.sql;
  }
}

export class NotFoundError extends DatabaseError {
  readonly memoryId: number;

  constructor(memoryId: number, options: DatabaseErrorOptions = {}) {
    super(`Memory ${memoryId} not found`, "NOT_FOUND", options);
    this.name = "NotFoundError";
    this.memoryId = memoryId;
  }
}

export function isDatabaseError(error: unknown): error is DatabaseError {
  return error instanceof DatabaseError;
}

// FTS5 reports bad MATCH input as a plain SQLITE_ERROR; only the message tells.
const FTS_QUERY_MESSAGE = /^(fts5: |unterminated string|no such column)/;

export function normalizeSQLiteError(error: unknown, sql?: string): DatabaseError {
  if (error instanceof DatabaseError) {
    return error;
  }

  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return new DatabaseError(error.message, classify(code, error.message), { sql, cause: error });
  }

  return new DatabaseError("Unknown SQLite error", "UNKNOWN", { sql, cause: error });
}

// better-sqlite3 reports extended result codes (SQLITE_CONSTRAINT_CHECK, SQLITE_BUSY_SNAPSHOT)
function classify(code: string | undefined, message: string): DatabaseErrorCode {
  switch (code?.match(/^SQLITE_[A-Z]+/)?.[0]) {
    case "SQLITE_CONSTRAINT":
      return "CONSTRAINT";
    case "SQLITE_BUSY":
    case "SQLITE_LOCKED":
      return "BUSY";
    case "SQLITE_ERROR":
      return FTS_QUERY_MESSAGE.test(message) ? "INVALID_QUERY" : "SQL_ERROR";
    default:
      return "UNKNOWN";
  }
}
