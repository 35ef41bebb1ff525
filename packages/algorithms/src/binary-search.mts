/**
 * @module binary-search
 * @description Bisection over a range already sorted by `comp`.
 *
 * "Sorted" means no element before position `i` compares greater than an
 * element at or after `i`. This is assumed and never checked: an unsorted
 * range produces a meaningless (but valid) cursor, not an error.
 *
 * All four searches share one loop shape. The answer always lies in
 * `[lo, hi]`; every iteration either moves `lo` past the midpoint or pulls `hi`
 * down onto it, so the interval strictly shrinks and a single-element range
 * costs exactly one comparison.
 *
 * ### Decision Tree
 * - Where would `value` go, before its equals? `lowerBound`.
 * - Where would it go, after its equals? `upperBound`.
 * - All equal elements at once? `equalRange`.
 * - Only need yes/no? `binarySearch`. Need the element? `findSorted`.
 *
 * @example
 * ```typescript
 * const byNumber = (a: number, b: number) => a < b;
 * const [first, last] = arrayRange([1, 3, 3, 3, 5, 7]);
 *
 * lowerBound(first, last, 3, byNumber).index; // => 1
 * upperBound(first, last, 3, byNumber).index; // => 4
 * binarySearch(first, last, 4, byNumber); // => false
 * ```
 *
 * @since 2026-10-19
 */

import type {
  CursorPair,
  RandomAccessCursor,
  StrictWeakOrdering,
} from "./types.mjs";

const midpoint = <T, C extends RandomAccessCursor<T, C>>(lo: C, hi: C): C =>
  lo.advance(Math.floor(lo.distance(hi) / 2));

/**
 * Leftmost position at which `value` could be inserted without breaking the
 * order: every element before it satisfies `comp(element, value)`.
 */
export const lowerBound = <T, C extends RandomAccessCursor<T, C>>(
  first: C & RandomAccessCursor<T, C>,
  last: C,
  value: T,
  comp: StrictWeakOrdering<T>,
): C => {
  let lo: C = first;
  let hi: C = last;
  while (!lo.equals(hi)) {
    const mid = midpoint<T, C>(lo, hi);
    if (comp(mid.read(), value)) {
      lo = mid.next();
    } else {
      hi = mid;
    }
  }
  return lo;
};

/**
 * Rightmost insertion position for `value`: the first element for which
 * `comp(value, element)` holds, or `last`.
 */
export const upperBound = <T, C extends RandomAccessCursor<T, C>>(
  first: C & RandomAccessCursor<T, C>,
  last: C,
  value: T,
  comp: StrictWeakOrdering<T>,
): C => {
  let lo: C = first;
  let hi: C = last;
  while (!lo.equals(hi)) {
    const mid = midpoint<T, C>(lo, hi);
    if (comp(value, mid.read())) {
      hi = mid;
    } else {
      lo = mid.next();
    }
  }
  return hi;
};

/**
 * `[lowerBound, upperBound)` for `value`. Empty (`first === second` by
 * position) when nothing matches.
 *
 * The upper bound is bisected inside `[lower, last)` only, so the whole call
 * stays O(log n) even when every element equals `value`.
 */
export const equalRange = <T, C extends RandomAccessCursor<T, C>>(
  first: C & RandomAccessCursor<T, C>,
  last: C,
  value: T,
  comp: StrictWeakOrdering<T>,
): CursorPair<C> => {
  const lower = lowerBound<T, C>(first, last, value, comp);
  const upper = upperBound<T, C>(lower, last, value, comp);
  return [lower, upper];
};

/**
 * True iff some element is equivalent to `value`, i.e. neither compares
 * before the other.
 */
export const binarySearch = <T, C extends RandomAccessCursor<T, C>>(
  first: C & RandomAccessCursor<T, C>,
  last: C,
  value: T,
  comp: StrictWeakOrdering<T>,
): boolean => {
  const found = lowerBound<T, C>(first, last, value, comp);
  return !found.equals(last) && !comp(value, found.read());
};

/**
 * Cursor at the first element equivalent to `value`, or `last` when there is none.
 *
 * @example
 * const users = [{ id: 2 }, { id: 5 }, { id: 9 }];
 * const [first, last] = arrayRange(users);
 * const hit = findSorted(first, last, { id: 5 }, (a, b) => a.id < b.id);
 * hit.equals(last) ? undefined : hit.read(); // => { id: 5 }
 */
export const findSorted = <T, C extends RandomAccessCursor<T, C>>(
  first: C & RandomAccessCursor<T, C>,
  last: C,
  value: T,
  comp: StrictWeakOrdering<T>,
): C => {
  const found = lowerBound<T, C>(first, last, value, comp);
  return found.equals(last) || comp(value, found.read()) ? last : found;
};
