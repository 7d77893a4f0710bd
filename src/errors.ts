export type AppErrorKind =
  | "validation"
  | "not_found"
  | "conflict"
  | "unavailable"
  | "upstream"
  | "execution"
  | "unknown";

export interface AppErrorMetadata {
  readonly kind: AppErrorKind;
  readonly path?: string;
  readonly code?: string;
  readonly details?: Record<string, unknown>;
}

export interface AppErrorOptions {
  path?: string;
  code?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  readonly kind: AppErrorKind;
  readonly path?: string;
  readonly code?: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, kind: AppErrorKind, options?: AppErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.kind = kind;
    this.path = options?.path;
    this.code = options?.code;
    this.details = options?.details;
  }

  toMetadata(): AppErrorMetadata {
    return {
      kind: this.kind,
      ...(this.path !== undefined ? { path: this.path } : {}),
      ...(this.code !== undefined ? { code: this.code } : {}),
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: Omit<AppErrorOptions, "code">) {
    super(message, "validation", options);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "not_found", options);
  }
}

export class UnavailableError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "unavailable", options);
  }
}

export class UpstreamError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "upstream", options);
  }
}

/** Server-side failure while carrying out an otherwise valid request. */
export class ExecutionError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "execution", options);
  }
}

const STATUS_BY_KIND: Record<AppErrorKind, number> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  unavailable: 503,
  upstream: 502,
  execution: 500,
  unknown: 500,
};

export function httpStatusFor(error: unknown): number {
  if (error instanceof AppError) {
    return STATUS_BY_KIND[error.kind];
  }
  return 500;
}

/** Message as shown to API clients; validation paths are appended when known. */
export function describeError(error: unknown): string {
  if (error instanceof AppError) {
    return error.path ? `${error.message} (at ${error.path})` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return Boolean(error && typeof error === "object" && "code" in error);
}
