// Centralised error handling for the CLI

export type AppErrorCode =
  | "INPUT_CLOSED"
  | "RETRY_LIMIT_EXCEEDED"
  | "INVALID_CONFIG"
  | "INVALID_CATALOG";

export class AppError extends Error {
  exitCode: number;
  isOperational: boolean;
  code: AppErrorCode | null;
  details: unknown;

  constructor(
    message: string,
    options?: { exitCode?: number; isOperational?: boolean; code?: AppErrorCode; details?: unknown }
  ) {
    super(message);
    this.name = "AppError";
    this.exitCode = options?.exitCode ?? 1;
    this.isOperational = options?.isOperational ?? true;
    this.code = options?.code ?? null;
    this.details = options?.details ?? null;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isAppError(err: unknown, code?: AppErrorCode): err is AppError {
  if (!(err instanceof AppError)) return false;
  return code === undefined || err.code === code;
}

/**
 * Logs an error that escaped the session loop and returns the exit code
 * the process should finish with.
 */
export function reportFatalError(err: unknown, nodeEnv: string = process.env.NODE_ENV ?? "production"): number {
  if (isAppError(err, "INPUT_CLOSED")) return 0;

  if (err instanceof AppError) {
    console.error(`Error: ${err.message}${err.code ? ` [${err.code}]` : ""}`);
    if (err.details) console.error("Details:", err.details);
    if (nodeEnv === "development" && err.stack) console.error(err.stack);
    return err.exitCode;
  }

  if (err instanceof Error) {
    // filesystem failures (EACCES, ENOSPC, ...) end up here
    if (nodeEnv === "development") {
      console.error("Error:", err);
    } else {
      console.error("Error:", err.message);
    }
    return 1;
  }

  console.error("Error:", String(err));
  return 1;
}
