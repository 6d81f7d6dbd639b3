import type { ErrorKind } from "@sitedocs/types";

export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  kind?: ErrorKind;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    statusCode,
    code,
    kind = "Internal",
    isOperational = true,
    details,
    cause,
  }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.kind = kind;
    this.isOperational = isOperational;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}

/**
 * Kind of an arbitrary thrown value. Anything that is not an AppError is
 * reported as `Internal`.
 */
export function errorKindOf(err: unknown): ErrorKind {
  return AppError.isAppError(err) ? err.kind : "Internal";
}

export function errorMessageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
