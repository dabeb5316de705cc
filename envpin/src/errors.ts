import { describeLocator, type SourceLocator } from "./types/locator.js";

export type ErrorCode =
  | "FETCH_FAILED"
  | "INTEGRITY_MISMATCH"
  | "PARSE_FAILED"
  | "NOT_FOUND"
  | "CONFLICT"
  | "TIMEOUT"
  | "WRITE_FAILED"
  | "CANCELLED";

/** Base class for every failure the resolver surfaces. */
export class EnvpinError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EnvpinError";
  }
}

export class FetchError extends EnvpinError {
  constructor(readonly locator: SourceLocator, detail: string, cause?: unknown) {
    super(`Fetch failed for ${describeLocator(locator)}: ${detail}`, "FETCH_FAILED", { cause });
    this.name = "FetchError";
  }
}

/** Fetched or cached bytes do not hash to what was declared. Never retried. */
export class IntegrityError extends EnvpinError {
  constructor(
    readonly locator: SourceLocator,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(
      `Integrity check failed for ${describeLocator(locator)}: expected sha256 ${expected}, got ${actual}`,
      "INTEGRITY_MISMATCH",
    );
    this.name = "IntegrityError";
  }
}

export class ParseError extends EnvpinError {
  constructor(message: string, readonly source?: string, cause?: unknown) {
    super(source ? `${message} (${source})` : message, "PARSE_FAILED", { cause });
    this.name = "ParseError";
  }
}

export class NotFoundError extends EnvpinError {
  constructor(readonly specifier: string, readonly requiredBy?: string) {
    super(
      requiredBy ? `Package not found: ${specifier} (required by ${requiredBy})` : `Package not found: ${specifier}`,
      "NOT_FOUND",
    );
    this.name = "NotFoundError";
  }
}

export class ConflictError extends EnvpinError {
  constructor(
    readonly packageName: string,
    readonly existingVersion: string,
    readonly incomingVersion: string,
    detail?: string,
  ) {
    super(
      detail ?? `Conflicting versions of ${packageName}: ${existingVersion} and ${incomingVersion}`,
      "CONFLICT",
    );
    this.name = "ConflictError";
  }
}

export class TimeoutError extends EnvpinError {
  constructor(readonly stage: string, readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms during ${stage}`, "TIMEOUT");
    this.name = "TimeoutError";
  }
}

export class WriteError extends EnvpinError {
  constructor(readonly destination: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${destination}: ${detail}`, "WRITE_FAILED", { cause });
    this.name = "WriteError";
  }
}

export class CancelledError extends EnvpinError {
  constructor(readonly stage: string) {
    super(`Cancelled during ${stage}`, "CANCELLED");
    this.name = "CancelledError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Stable code of an EnvpinError, or "INTERNAL" for anything else. */
export function errorCodeOf(err: unknown): string {
  return err instanceof EnvpinError ? err.code : "INTERNAL";
}
