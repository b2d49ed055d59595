/**
 * Error model for the panchang engine.
 *
 * Every failure carries a `kind` discriminant and enough context
 * (instant, location, system, body) to reproduce the call.
 */

export type PanchangErrorKind =
  | "InvalidCoordinate"
  | "InvalidInstant"
  | "UnknownAyanamshaSystem"
  | "EphemerisUnavailable"
  | "NoRiseOrSet"
  | "EmptySearchWindow"
  | "InvalidRequest";

export type ErrorContext = {
  instant?: string;
  location?: { latitude: number; longitude: number; elevation_m?: number };
  system?: string;
  body?: string;
  [key: string]: unknown;
};

export abstract class PanchangEngineError extends Error {
  abstract readonly kind: PanchangErrorKind;

  constructor(message: string, public readonly context: ErrorContext = {}) {
    super(message);
  }
}

export class InvalidCoordinateError extends PanchangEngineError {
  readonly kind = "InvalidCoordinate" as const;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = "InvalidCoordinateError";
  }
}

export class InvalidInstantError extends PanchangEngineError {
  readonly kind = "InvalidInstant" as const;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = "InvalidInstantError";
  }
}

export class UnknownAyanamshaSystemError extends PanchangEngineError {
  readonly kind = "UnknownAyanamshaSystem" as const;

  constructor(public readonly tag: string) {
    super(`Unknown ayanamsha system: ${tag}`, { system: tag });
    this.name = "UnknownAyanamshaSystemError";
  }
}

export class EphemerisUnavailableError extends PanchangEngineError {
  readonly kind = "EphemerisUnavailable" as const;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, context);
    this.name = "EphemerisUnavailableError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class NoRiseOrSetError extends PanchangEngineError {
  readonly kind = "NoRiseOrSet" as const;

  constructor(
    public readonly event: "sunrise" | "sunset" | "moonrise" | "moonset",
    message: string,
    context: ErrorContext = {}
  ) {
    super(message, context);
    this.name = "NoRiseOrSetError";
  }
}

export class EmptySearchWindowError extends PanchangEngineError {
  readonly kind = "EmptySearchWindow" as const;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = "EmptySearchWindowError";
  }
}

export class InvalidRequestError extends PanchangEngineError {
  readonly kind = "InvalidRequest" as const;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = "InvalidRequestError";
  }
}

export function isPanchangEngineError(e: unknown): e is PanchangEngineError {
  return e instanceof PanchangEngineError;
}

/**
 * Result envelope returned by the public engine operations.
 */
export type EngineResult<T> =
  | { status: "ok"; value: T }
  | { status: "error"; error: PanchangEngineError };

export function ok<T>(value: T): EngineResult<T> {
  return { status: "ok", value };
}

export function failed<T>(error: PanchangEngineError): EngineResult<T> {
  return { status: "error", error };
}

/**
 * Run `fn`, mapping engine errors into an error result.
 * Anything that is not a PanchangEngineError is a bug and is rethrown.
 */
export async function captureEngineErrors<T>(
  fn: () => Promise<T>
): Promise<EngineResult<T>> {
  try {
    return ok(await fn());
  } catch (e) {
    if (isPanchangEngineError(e)) {
      return failed(e);
    }
    throw e;
  }
}
