/**
 * @module array-cursor
 * @description Adapters that let plain arrays take part in cursor ranges.
 *
 * `ArrayCursor` satisfies every capability the algorithms ask for, so one array
 * can be scanned, rewritten in place and bisected. `BackInsertCursor` is an
 * output destination that grows its array on each write.
 *
 * @example
 * ```typescript
 * const [first, last] = arrayRange([1, 3, 3, 5]);
 * const hit = findIf(first, last, (n) => n > 2);
 * hit.index; // => 1
 *
 * const evens: number[] = [];
 * copyIf(first, last, new BackInsertCursor(evens), (n) => n % 2 === 0);
 * ```
 *
 * @since 2026-10-19
 */

import {
  CursorBoundsError,
  CursorMismatchError,
  CursorRangeOrderError,
} from "./errors.mjs";

import type {
  CursorPair,
  ForwardCursor,
  MutableCursor,
  OutputCursor,
  RandomAccessCursor,
} from "./types.mjs";

/**
 * Random-access, writable position inside an array.
 * Valid positions run from 0 to `array.length`; the last one is the end
 * position and cannot be read or written.
 */
export class ArrayCursor<T>
  implements
    RandomAccessCursor<T, ArrayCursor<T>>,
    MutableCursor<T, ArrayCursor<T>>
{
  constructor(
    public readonly array: T[],
    public readonly index: number,
  ) {
    if (!Number.isInteger(index) || index < 0 || index > array.length) {
      throw new CursorBoundsError(index, array.length, "advance");
    }
  }

  read(): T {
    this.assertDereferenceable("read");
    return this.array[this.index];
  }

  write(value: T): void {
    this.assertDereferenceable("write");
    this.array[this.index] = value;
  }

  next(): ArrayCursor<T> {
    return this.advance(1);
  }

  advance(n: number): ArrayCursor<T> {
    return new ArrayCursor(this.array, this.index + n);
  }

  distance(to: ArrayCursor<T>): number {
    if (to.array !== this.array) {
      throw new CursorMismatchError("distance");
    }
    return to.index - this.index;
  }

  equals(other: ArrayCursor<T>): boolean {
    return other.array === this.array && other.index === this.index;
  }

  private assertDereferenceable(operation: "read" | "write"): void {
    if (this.index >= this.array.length) {
      throw new CursorBoundsError(this.index, this.array.length, operation);
    }
  }
}

/**
 * Output cursor that appends every written value to `array`.
 */
export class BackInsertCursor<T>
  implements OutputCursor<T, BackInsertCursor<T>>
{
  constructor(public readonly array: T[] = []) {}

  write(value: T): void {
    this.array.push(value);
  }

  // appending has no position to move to
  next(): BackInsertCursor<T> {
    return this;
  }
}

/**
 * Cursors delimiting `[from, to)` of `array`; defaults to the whole array.
 */
export const arrayRange = <T,>(
  array: T[],
  from = 0,
  to: number = array.length,
): CursorPair<ArrayCursor<T>> => {
  if (to < from) {
    throw new CursorRangeOrderError(from, to);
  }
  return [new ArrayCursor(array, from), new ArrayCursor(array, to)];
};

/**
 * Copy the elements of `[first, last)` into a new array.
 */
export const collect = <T, C extends ForwardCursor<T, C>>(
  first: C & ForwardCursor<T, C>,
  last: C,
): T[] => {
  const out: T[] = [];
  for (let cur: C = first; !cur.equals(last); cur = cur.next()) {
    out.push(cur.read());
  }
  return out;
};
