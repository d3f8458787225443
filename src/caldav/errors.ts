import { HttpError, isAbortError } from "../http.js";

export type CalDavPhase = "discovery" | "query" | "sync" | "backfill" | "object" | "update";

export class CalDavError extends Error {
  readonly phase: CalDavPhase;

  constructor(phase: CalDavPhase, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CalDavError";
    this.phase = phase;
  }

  /** HTTP status of the underlying failure, when there is one. */
  get status(): number | null {
    return this.cause instanceof HttpError ? this.cause.status : null;
  }
}

export class PreconditionFailedError extends CalDavError {
  readonly path: string;

  constructor(path: string, cause: HttpError) {
    super("object", `Precondition failed for ${path}: entity tag mismatch or conflict`, cause);
    this.name = "PreconditionFailedError";
    this.path = path;
  }
}

export class InvalidTimeRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTimeRangeError";
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Attaches the failing phase to an error. Cancellations and errors that
 * already carry a phase pass through untouched.
 */
export function toCalDavError(phase: CalDavPhase, context: string, error: unknown): unknown {
  if (error instanceof CalDavError || error instanceof InvalidTimeRangeError || isAbortError(error)) {
    return error;
  }
  return new CalDavError(phase, `${context}: ${describe(error)}`, error);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof HttpError && error.status === 404;
}
