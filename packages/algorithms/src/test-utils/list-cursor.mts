/**
 * Forward-only cursor over a singly linked list. It has no `advance` or
 * `distance`, so it only fits the algorithms that need stepping alone.
 */

import type { CursorPair, MutableCursor } from "../types.mjs";

export interface ListNode<T> {
  value: T;
  next: ListNode<T> | null;
}

export class ListCursor<T> implements MutableCursor<T, ListCursor<T>> {
  constructor(public readonly node: ListNode<T> | null) {}

  read(): T {
    return this.current().value;
  }

  write(value: T): void {
    this.current().value = value;
  }

  next(): ListCursor<T> {
    return new ListCursor(this.current().next);
  }

  equals(other: ListCursor<T>): boolean {
    return other.node === this.node;
  }

  private current(): ListNode<T> {
    if (this.node === null) {
      throw new Error("list cursor is past the end");
    }
    return this.node;
  }
}

export const toList = <T,>(values: T[]): ListNode<T> | null =>
  values.reduceRight<ListNode<T> | null>(
    (next, value) => ({ value, next }),
    null,
  );

export const fromList = <T,>(head: ListNode<T> | null): T[] => {
  const values: T[] = [];
  for (let node = head; node !== null; node = node.next) {
    values.push(node.value);
  }
  return values;
};

export const listRange = <T,>(values: T[]): CursorPair<ListCursor<T>> => [
  new ListCursor(toList(values)),
  new ListCursor<T>(null),
];
