/**
 * Error classes raised by the cursor adapters.
 *
 * The algorithms themselves never throw; these surface only when an adapter is
 * asked to step or read outside the array it views.
 */

export type CursorErrorCode =
  | "CURSOR_OUT_OF_BOUNDS"
  | "CURSOR_MISMATCH"
  | "CURSOR_REVERSED_RANGE";

/**
 * Base error class for all cursor contract violations
 */
export class CursorError extends Error {
  constructor(
    message: string,
    public readonly code: CursorErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CursorError";

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a cursor is read, written or moved outside its array
 */
export class CursorBoundsError extends CursorError {
  constructor(
    public readonly index: number,
    public readonly length: number,
    public readonly operation: "read" | "write" | "advance",
  ) {
    super(
      `Cannot ${operation} at index ${index}: valid positions are 0..${length}`,
      "CURSOR_OUT_OF_BOUNDS",
      { index, length, operation },
    );
    this.name = "CursorBoundsError";
  }
}

/**
 * Thrown when two cursors over different arrays are measured against each other
 */
export class CursorMismatchError extends CursorError {
  constructor(public readonly operation: string) {
    super(
      `Cursors passed to ${operation} do not view the same array`,
      "CURSOR_MISMATCH",
      { operation },
    );
    this.name = "CursorMismatchError";
  }
}

/**
 * Thrown when a range is requested whose end comes before its start
 */
export class CursorRangeOrderError extends CursorError {
  constructor(
    public readonly from: number,
    public readonly to: number,
  ) {
    super(
      `Range [${from}, ${to}) ends before it starts`,
      "CURSOR_REVERSED_RANGE",
      { from, to },
    );
    this.name = "CursorRangeOrderError";
  }
}

export const isCursorError = (error: unknown): error is CursorError =>
  error instanceof CursorError;
