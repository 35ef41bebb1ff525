/**
 * @module types
 * @description Capability interfaces shared by every algorithm in the package.
 *
 * Cursors are F-bounded: `Self` is the concrete cursor type, so an algorithm that
 * takes `ArrayCursor<number>` hands back `ArrayCursor<number>` rather than a
 * widened interface. Stepping returns a new cursor and never moves the receiver.
 *
 * ### Decision Tree
 * - Only reading, one pass? `ForwardCursor`.
 * - Writing back into the same range (`replaceIf`, `removeIf`)? `MutableCursor`.
 * - Writing into a destination (`copyIf` and friends)? `OutputCursor`.
 * - Bisecting a sorted range? `RandomAccessCursor`.
 *
 * @since 2026-10-19
 */

/**
 * Single-element test.
 */
export type Predicate<T> = (value: T) => boolean;

/**
 * Two-element test, used for pairwise equality and for ordering.
 */
export type BinaryPredicate<A, B = A> = (a: A, b: B) => boolean;

/**
 * Irreflexive, asymmetric, transitive "less than" whose incomparability is also
 * transitive. Bisection over a range sorted by anything weaker is meaningless.
 *
 * @example
 * const byAge: StrictWeakOrdering<{ age: number }> = (a, b) => a.age < b.age;
 */
export type StrictWeakOrdering<T> = BinaryPredicate<T>;

/**
 * A position in a sequence that can be read, stepped and compared.
 */
export interface ForwardCursor<T, Self extends ForwardCursor<T, Self>> {
  read(): T;
  next(): Self;
  equals(other: Self): boolean;
}

/**
 * A forward cursor that can overwrite the element it points at.
 */
export interface MutableCursor<T, Self extends MutableCursor<T, Self>>
  extends ForwardCursor<T, Self> {
  write(value: T): void;
}

/**
 * Write-only destination. `next()` yields the slot for the following write.
 */
export interface OutputCursor<T, Self extends OutputCursor<T, Self>> {
  write(value: T): void;
  next(): Self;
}

/**
 * Forward cursor with O(1) jumps and distance, required for bisection.
 */
export interface RandomAccessCursor<T, Self extends RandomAccessCursor<T, Self>>
  extends ForwardCursor<T, Self> {
  /** Position `n` steps away. `n` may be negative. */
  advance(n: number): Self;
  /** Number of forward steps from this cursor to `to`. */
  distance(to: Self): number;
}

/**
 * Two cursors returned together, e.g. by `mismatch` and `equalRange`.
 */
export type CursorPair<A, B = A> = readonly [first: A, second: B];
