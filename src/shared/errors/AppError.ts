/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * A transform run meets two kinds of errors:
 *
 *   1. Operational errors — expected problems with the data or its neighbours:
 *      an unparseable payload, nulls in the value column, an empty bucket, a
 *      warehouse table with the wrong columns. They carry a stable `code` and a
 *      structured `details` object, and the entry point reports them as-is.
 *
 *   2. Programmer errors — anything else. These are wrapped with
 *      isOperational=false so the report says "unexpected" rather than
 *      pretending the message is meaningful to an operator.
 *
 * Why `Object.setPrototypeOf(this, new.target.prototype)`?
 *   When you `extends Error`, the prototype chain can break in some compilation
 *   targets, making `instanceof QualityError` return false. This line fixes the
 *   chain so the pipeline's `err instanceof AppError` checks always work.
 *
 * Every stage throws exactly one of the subclasses below; none are retried.
 */
import type { TransformStage } from '@shared/types';

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  public readonly code: string;
  public readonly details: ErrorDetails;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code = 'INTERNAL_ERROR',
    details: ErrorDetails = {},
    isOperational = true,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Payload unparseable, or mandatory structural columns missing. */
export class FormatError extends AppError {
  constructor(message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, 'FORMAT_ERROR', details, true, options);
  }
}

export type QualityErrorKind = 'MissingValues' | 'DuplicateRows';

export class QualityError extends AppError {
  constructor(
    public readonly kind: QualityErrorKind,
    public readonly count: number,
    details: ErrorDetails = {},
  ) {
    super(
      kind === 'MissingValues'
        ? `Null values found in life expectancy: ${count}`
        : `Duplicate rows detected: ${count}`,
      'QUALITY_ERROR',
      { kind, count, ...details },
    );
  }
}

/** The both-sexes filter removed every row. */
export class EmptyResultError extends AppError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'EMPTY_RESULT', details);
  }
}

export class SchemaMismatchError extends AppError {
  constructor(
    public readonly expected: readonly string[],
    public readonly actual: readonly string[],
  ) {
    super(
      `Target table columns [${actual.join(', ')}] do not match [${expected.join(', ')}]`,
      'SCHEMA_MISMATCH',
      { expected: [...expected], actual: [...actual] },
    );
  }
}

/** I/O or transaction failure during the bulk copy. Nothing was committed. */
export class LoadError extends AppError {
  constructor(message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, 'LOAD_ERROR', details, true, options);
  }
}

/** Listing or fetching from the staging store failed (including "no objects"). */
export class StoreError extends AppError {
  constructor(message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, 'STORE_ERROR', details, true, options);
  }
}

/**
 * The absorbing "failed" state of a run: which stage failed and the typed
 * error that stopped it. Unknown errors are wrapped as non-operational.
 */
export class TransformRunError extends AppError {
  public readonly reason: AppError;

  constructor(
    public readonly stage: TransformStage,
    cause: unknown,
  ) {
    const reason = toAppError(cause);
    super(
      `Transform failed during ${stage}: ${reason.message}`,
      'TRANSFORM_FAILED',
      { stage, code: reason.code, ...reason.details },
      reason.isOperational,
      { cause },
    );
    this.reason = reason;
  }
}

export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new AppError(message, 'INTERNAL_ERROR', {}, false, { cause: err });
}
