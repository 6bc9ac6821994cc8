/**
 * Error taxonomy for the ingest pipeline.
 *
 * Every rejection a gate can produce is one of these classes; the HTTP layer
 * maps them to a status code and a stable `code` string so devices and
 * operators can tell "back off" apart from "upgrade plan" or "fix payload".
 */

export interface FieldIssue {
  field: string;
  message: string;
}

export abstract class IngestError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: number;
  abstract readonly retryable: boolean;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Unknown serial, wrong secret, expired or malformed credential: always reported the same way. */
export class AuthenticationFailure extends IngestError {
  readonly code = "INVALID_DEVICE_CREDENTIALS";
  readonly httpStatus = 401;
  readonly retryable = false;

  constructor() {
    super("Invalid device credentials");
  }
}

export class RateLimitExceeded extends IngestError {
  readonly code = "RATE_LIMIT_EXCEEDED";
  readonly httpStatus = 429;
  readonly retryable = true;

  constructor(readonly retryAfterSeconds: number) {
    super("Too many requests. Please try again later.");
  }
}

export class QuotaExceeded extends IngestError {
  readonly code = "STORAGE_LIMIT_EXCEEDED";
  readonly httpStatus = 403;
  readonly retryable = false;

  constructor(readonly usageBytes: number, readonly limitBytes: number) {
    super("Storage limit reached. Please delete old telemetry data or upgrade your plan.");
  }
}

export class ValidationFailure extends IngestError {
  readonly code = "VALIDATION_ERROR";
  readonly httpStatus = 400;
  readonly retryable = false;

  constructor(readonly details: FieldIssue[], message = "Invalid request data") {
    super(message);
  }
}

export class StorageUnavailable extends IngestError {
  readonly code = "STORAGE_UNAVAILABLE";
  readonly httpStatus = 503;
  readonly retryable = true;
  readonly retryAfterSeconds = 30;

  constructor(cause?: unknown) {
    super("Storage temporarily unavailable", cause);
  }
}

/** Logged only; never surfaced to the ingesting device. */
export class NotificationDispatchFailure extends IngestError {
  readonly code = "NOTIFICATION_DISPATCH_FAILED";
  readonly httpStatus = 502;
  readonly retryable = false;

  constructor(readonly deviceSerial: string, cause?: unknown) {
    super(`Failed to dispatch alert notification for device ${deviceSerial}`, cause);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs a repository call and converts any infrastructure fault into
 * StorageUnavailable. Errors that are already part of the taxonomy pass through.
 */
export async function guardStorage<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (err instanceof IngestError) throw err;
    throw new StorageUnavailable(err);
  }
}
