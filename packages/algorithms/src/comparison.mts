/**
 * @module comparison
 * @description Lock-step comparison of two ranges.
 * Range B is described only by its start and must hold at least as many
 * elements as range A; its end is never checked.
 *
 * @since 2026-10-19
 */

import type { BinaryPredicate, CursorPair, ForwardCursor } from "./types.mjs";

/**
 * Walk `[first1, last1)` and the range from `first2` together while
 * `comp(a, b)` holds.
 *
 * @returns the pair of cursors at the first failing position, or
 * `[last1, <counterpart in B>]` when every pair compared true
 *
 * @example
 * const [a, aEnd] = arrayRange([1, 2, 3]);
 * const [b] = arrayRange([1, 2, 4]);
 * const [x, y] = mismatch(a, aEnd, b, (l, r) => l === r);
 * x.index; // => 2
 * y.read(); // => 4
 */
export const mismatch = <
  A,
  B,
  C1 extends ForwardCursor<A, C1>,
  C2 extends ForwardCursor<B, C2>,
>(
  first1: C1 & ForwardCursor<A, C1>,
  last1: C1,
  first2: C2 & ForwardCursor<B, C2>,
  comp: BinaryPredicate<A, B>,
): CursorPair<C1, C2> => {
  let cur1: C1 = first1;
  let cur2: C2 = first2;
  while (!cur1.equals(last1) && comp(cur1.read(), cur2.read())) {
    cur1 = cur1.next();
    cur2 = cur2.next();
  }
  return [cur1, cur2];
};

/**
 * True iff every element of `[first1, last1)` compares equal under `comp` to
 * its counterpart starting at `first2`. Stops at the first inequality.
 */
export const equal = <
  A,
  B,
  C1 extends ForwardCursor<A, C1>,
  C2 extends ForwardCursor<B, C2>,
>(
  first1: C1 & ForwardCursor<A, C1>,
  last1: C1,
  first2: C2 & ForwardCursor<B, C2>,
  comp: BinaryPredicate<A, B>,
): boolean => {
  const [stop] = mismatch<A, B, C1, C2>(first1, last1, first2, comp);
  return stop.equals(last1);
};
