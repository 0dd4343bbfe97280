import type { CollectionResult, CollectorErrorKind } from "./types.js";

export class AppError extends Error {
  constructor(message: string, public readonly statusCode: number = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, statusCode = 400) {
    super(message, statusCode);
  }
}

export class CollectorError extends AppError {
  constructor(
    public readonly kind: CollectorErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, 502, options);
  }

  get retryable(): boolean {
    return this.kind === "network_error" || this.kind === "rate_limited";
  }
}

export type CacheErrorKind = "corrupt" | "io_failure";

export class CacheError extends AppError {
  constructor(
    public readonly kind: CacheErrorKind,
    message: string,
    public readonly file?: string,
    options?: { cause?: unknown },
  ) {
    super(message, 500, options);
  }
}

export class NormalizationError extends AppError {
  constructor(message: string, public readonly field: string) {
    super(message, 422);
  }
}

export class NoPlatformsAvailableError extends AppError {
  constructor(public readonly result: CollectionResult) {
    super(`No platforms available for keyword "${result.keyword.raw}"`, 503);
  }
}

export class NotifiedStateError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, options);
  }
}
