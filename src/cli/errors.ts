import { ZodError } from "zod";
import { isDatabaseError } from "../database/errors";

export type CliErrorCode = "CliError" | "UsageError" | "NotFound" | "DatabaseError" | "UnknownError";

export interface CliErrorOptions {
  exitCode?: number;
  cause?: unknown;
}

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly exitCode: number;

  constructor(message: string, code: CliErrorCode = "CliError", options: CliErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = options.exitCode ?? 1;
  }
}

/** Bad flags, arguments or input files. Exits with status 2. */
export class UsageError extends CliError {
  constructor(message: string, options: Omit<CliErrorOptions, "exitCode"> = {}) {
    super(message, "UsageError", { ...options, exitCode: 2 });
  }
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof ZodError) {
    return new UsageError(formatZodError(error), { cause: error });
  }
  if (isDatabaseError(error)) {
    if (error.code === "INVALID_QUERY") {
      return new UsageError(`Invalid search query: ${error.message}`, { cause: error });
    }
    const code = error.code === "NOT_FOUND" ? "NotFound" : "DatabaseError";
    return new CliError(error.message, code, { cause: error });
  }
  if (error instanceof Error) {
    return new CliError(error.message, "UnknownError", { cause: error });
  }
  return new CliError(String(error), "UnknownError", { cause: error });
}
