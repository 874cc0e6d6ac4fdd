/**
 * Base error for everything this package throws.
 * `details` carries the inputs that identify the failed request; the
 * underlying failure, when there is one, is kept as the standard `cause`.
 */
export class EsaError extends Error {
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EsaError";
    this.details = details;
    // Restore prototype chain (required when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── HTTP collaborator errors ───────────────────────────────────────────

export class HttpStatusError extends EsaError {
  public readonly statusCode: number;
  public readonly statusText: string;

  constructor(url: string, statusCode: number, statusText: string) {
    super(`POST ${url} responded ${statusCode} ${statusText}`, {
      url,
      statusCode,
    });
    this.name = "HttpStatusError";
    this.statusCode = statusCode;
    this.statusText = statusText;
  }
}

export class MalformedResponseError extends EsaError {
  constructor(url: string, cause: unknown) {
    super(
      `POST ${url} returned a body that is not valid JSON`,
      { url },
      { cause },
    );
    this.name = "MalformedResponseError";
  }
}

// ── Upload stage errors ────────────────────────────────────────────────

export type UploadStage = "inspect" | "policy" | "upload";

export abstract class UploadStageError extends EsaError {
  public abstract readonly stage: UploadStage;
}

/** Local file could not be opened or fully read. */
export class FileError extends UploadStageError {
  public readonly stage = "inspect";

  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, details, options);
    this.name = "FileError";
  }
}

/** Policy endpoint failed at the transport, status, parse or schema level. */
export class PolicyError extends UploadStageError {
  public readonly stage = "policy";

  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, details, options);
    this.name = "PolicyError";
  }
}

/** Object storage rejected the upload or could not be reached. */
export class UploadError extends UploadStageError {
  public readonly stage = "upload";

  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, details, options);
    this.name = "UploadError";
  }
}

export const STAGE_ERRORS = {
  inspect: FileError,
  policy: PolicyError,
  upload: UploadError,
} as const;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
