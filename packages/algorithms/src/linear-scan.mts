/**
 * @module linear-scan
 * @description Single-pass algorithms over one range `[first, last)`.
 * Each one visits elements front to back, calls the predicate at most once per
 * element, and treats an empty range (`first.equals(last)`) as a no-op.
 *
 * ### Decision Tree
 * - Need the first match? `findIf`.
 * - Need how many match? `countIf`.
 * - Looking for a neighbouring pair? `adjacentFind`.
 * - Keeping matches somewhere else? `copyIf`. Dropping them? `removeCopyIf`.
 * - Overwriting matches in place? `replaceIf`; into a destination, `replaceCopyIf`.
 * - Compacting the range itself? `removeIf`.
 *
 * @example
 * ```typescript
 * const data = [1, 2, 3, 4, 5];
 * const [first, last] = arrayRange(data);
 * const end = removeIf(first, last, (n) => n % 2 === 0);
 * collect(first, end); // => [1, 3, 5]
 * ```
 *
 * @since 2026-10-19
 */

import type {
  BinaryPredicate,
  ForwardCursor,
  MutableCursor,
  OutputCursor,
  Predicate,
} from "./types.mjs";

/**
 * First cursor whose element satisfies `pred`, or `last` when none does.
 *
 * @example
 * const [first, last] = arrayRange(['a', 'bb', 'ccc']);
 * findIf(first, last, (s) => s.length > 1).index; // => 1
 */
export const findIf = <T, C extends ForwardCursor<T, C>>(
  first: C & ForwardCursor<T, C>,
  last: C,
  pred: Predicate<T>,
): C => {
  let cur: C = first;
  while (!cur.equals(last) && !pred(cur.read())) {
    cur = cur.next();
  }
  return cur;
};

/**
 * Number of elements satisfying `pred`.
 */
export const countIf = <T, C extends ForwardCursor<T, C>>(
  first: C & ForwardCursor<T, C>,
  last: C,
  pred: Predicate<T>,
): number => {
  let total = 0;
  for (let cur: C = first; !cur.equals(last); cur = cur.next()) {
    if (pred(cur.read())) {
      total++;
    }
  }
  return total;
};

/**
 * First cursor `i` such that `pred(*i, *(i + 1))` holds, or `last`.
 * Ranges shorter than two elements never match.
 *
 * @example
 * // first pair that is out of order
 * const [first, last] = arrayRange([1, 2, 5, 4, 6]);
 * adjacentFind(first, last, (a, b) => b < a).index; // => 2
 */
export const adjacentFind = <T, C extends ForwardCursor<T, C>>(
  first: C & ForwardCursor<T, C>,
  last: C,
  pred: BinaryPredicate<T>,
): C => {
  if (first.equals(last)) {
    return last;
  }
  let prev: C = first;
  for (let cur: C = first.next(); !cur.equals(last); cur = cur.next()) {
    if (pred(prev.read(), cur.read())) {
      return prev;
    }
    prev = cur;
  }
  return last;
};

/**
 * Copy the elements satisfying `pred` to `result`, keeping their order.
 * @returns `result` advanced past the last copied element
 */
export const copyIf = <
  T,
  C extends ForwardCursor<T, C>,
  O extends OutputCursor<T, O>,
>(
  first: C & ForwardCursor<T, C>,
  last: C,
  result: O,
  pred: Predicate<T>,
): O => {
  let out = result;
  for (let cur: C = first; !cur.equals(last); cur = cur.next()) {
    const value = cur.read();
    if (pred(value)) {
      out.write(value);
      out = out.next();
    }
  }
  return out;
};

/**
 * Overwrite every element satisfying `pred` with `newValue`.
 */
export const replaceIf = <T, C extends MutableCursor<T, C>>(
  first: C & MutableCursor<T, C>,
  last: C,
  pred: Predicate<T>,
  newValue: T,
): void => {
  for (let cur: C = first; !cur.equals(last); cur = cur.next()) {
    if (pred(cur.read())) {
      cur.write(newValue);
    }
  }
};

/**
 * Write one output per input: `newValue` where `pred` holds, the element otherwise.
 * @returns `result` advanced by the length of the range
 */
export const replaceCopyIf = <
  T,
  C extends ForwardCursor<T, C>,
  O extends OutputCursor<T, O>,
>(
  first: C & ForwardCursor<T, C>,
  last: C,
  result: O,
  pred: Predicate<T>,
  newValue: T,
): O => {
  let out = result;
  for (let cur: C = first; !cur.equals(last); cur = cur.next()) {
    const value = cur.read();
    out.write(pred(value) ? newValue : value);
    out = out.next();
  }
  return out;
};

/**
 * Copy the elements for which `pred` is false to `result`. Stable.
 * @returns the end of the written output
 */
export const removeCopyIf = <
  T,
  C extends ForwardCursor<T, C>,
  O extends OutputCursor<T, O>,
>(
  first: C & ForwardCursor<T, C>,
  last: C,
  result: O,
  pred: Predicate<T>,
): O => {
  let out = result;
  for (let cur: C = first; !cur.equals(last); cur = cur.next()) {
    const value = cur.read();
    if (!pred(value)) {
      out.write(value);
      out = out.next();
    }
  }
  return out;
};

/**
 * Compact `[first, last)` in place so that `[first, newLast)` holds exactly the
 * elements for which `pred` was false, in their original order.
 *
 * The write position trails the read position, so no element is overwritten
 * before it has been read. Positions in `[newLast, last)` stay readable but
 * their values are unspecified (in practice, whatever was there before).
 *
 * @returns the new logical end, `newLast`
 */
export const removeIf = <T, C extends MutableCursor<T, C>>(
  first: C & MutableCursor<T, C>,
  last: C,
  pred: Predicate<T>,
): C => removeCopyIf<T, C, C>(first, last, first, pred);
