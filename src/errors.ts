import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";

export type AppErrorCode =
  | "INVALID_REQUEST"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "PAYLOAD_TOO_LARGE"
  | "CONVERSION_FAILURE"
  | "MERGE_FAILURE"
  | "TIMEOUT"
  | "DELIVERY_FAILURE"
  | "INTERNAL";

const STATUS_BY_CODE: Record<AppErrorCode, number> = {
  INVALID_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  PAYLOAD_TOO_LARGE: 413,
  CONVERSION_FAILURE: 422,
  MERGE_FAILURE: 422,
  TIMEOUT: 504,
  DELIVERY_FAILURE: 503,
  INTERNAL: 500,
};

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: AppErrorCode;
  public readonly details?: unknown;

  constructor(opts: { code: AppErrorCode; message: string; details?: unknown; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "AppError";
    this.code = opts.code;
    this.statusCode = STATUS_BY_CODE[opts.code];
    this.details = opts.details;
  }
}

export const invalidRequest = (message: string, details?: unknown) =>
  new AppError({ code: "INVALID_REQUEST", message, details });

export const notFound = (message: string) => new AppError({ code: "NOT_FOUND", message });

export const forbidden = (message: string) => new AppError({ code: "FORBIDDEN", message });

/**
 * Errors raised while executing a task that describe the task's inputs rather
 * than the health of the worker. They end the task in FAILURE instead of
 * being retried.
 */
const EXECUTION_FAILURE_CODES: ReadonlySet<AppErrorCode> = new Set<AppErrorCode>([
  "CONVERSION_FAILURE",
  "MERGE_FAILURE",
  "NOT_FOUND",
  "FORBIDDEN",
  "INVALID_REQUEST",
  "TIMEOUT",
]);

export function isExecutionFailure(err: unknown): err is AppError {
  return err instanceof AppError && EXECUTION_FAILURE_CODES.has(err.code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function assertUnreachable(x: never): never {
  throw new AppError({ code: "INTERNAL", message: `Unreachable: ${String(x)}` });
}

interface BodyParserError {
  type: string;
  status?: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return typeof err === "object" && err !== null && "type" in err && typeof err.type === "string";
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      error: { code: err.code, message: err.message, details: err.details },
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: { code: "INVALID_REQUEST", message: "Invalid request", details: err.issues },
    });
    return;
  }

  if (isBodyParserError(err)) {
    if (err.type === "entity.too.large") {
      res.status(413).json({ error: { code: "PAYLOAD_TOO_LARGE", message: "Request body too large" } });
      return;
    }
    if (err.type === "entity.parse.failed") {
      res.status(400).json({ error: { code: "INVALID_REQUEST", message: "Malformed JSON body" } });
      return;
    }
  }

  console.error("[HTTP] unhandled error:", err);
  res.status(500).json({ error: { code: "INTERNAL", message: "Internal server error" } });
}
