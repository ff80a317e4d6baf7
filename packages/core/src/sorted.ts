/**
 * Algorithms over ascending, duplicate-free id lists (posting lists)
 *
 * Every function takes lists that satisfy the invariant and returns a new
 * list that satisfies it. Inputs are never mutated.
 */

import { MinHeap } from "./heap.js";

/**
 * Two-pointer merge-intersection of two sorted lists
 */
export function intersectSorted(a: readonly number[], b: readonly number[]): number[] {
  const out: number[] = [];
  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    const x = a[i];
    const y = b[j];
    if (x === y) {
      out.push(x);
      i++;
      j++;
    } else if (x < y) {
      i++;
    } else {
      j++;
    }
  }

  return out;
}

/**
 * Linear merge-union of two sorted lists, dropping duplicates
 */
export function mergeUnion(a: readonly number[], b: readonly number[]): number[] {
  const out: number[] = [];
  let i = 0;
  let j = 0;

  while (i < a.length || j < b.length) {
    let next: number;
    if (j >= b.length || (i < a.length && a[i] < b[j])) {
      next = a[i++];
    } else if (i >= a.length || b[j] < a[i]) {
      next = b[j++];
    } else {
      next = a[i];
      i++;
      j++;
    }

    if (out.length === 0 || out[out.length - 1] !== next) {
      out.push(next);
    }
  }

  return out;
}

/**
 * Union of many sorted lists by folding pairwise merges
 */
export function mergeUnionPairwise(lists: readonly (readonly number[])[]): number[] {
  let out: number[] = [];
  for (const list of lists) {
    if (list.length === 0) continue;
    out = out.length === 0 ? [...list] : mergeUnion(out, list);
  }
  return out;
}

interface Cursor {
  value: number;
  list: number;
  position: number;
}

/**
 * Union of many sorted lists with a heap-based k-way merge
 */
export function kWayMerge(lists: readonly (readonly number[])[]): number[] {
  const heap = new MinHeap<Cursor>((a, b) => a.value - b.value);

  lists.forEach((list, index) => {
    if (list.length > 0) {
      heap.push({ value: list[0], list: index, position: 0 });
    }
  });

  const out: number[] = [];
  for (let cursor = heap.pop(); cursor !== undefined; cursor = heap.pop()) {
    if (out.length === 0 || out[out.length - 1] !== cursor.value) {
      out.push(cursor.value);
    }

    const list = lists[cursor.list];
    const position = cursor.position + 1;
    if (position < list.length) {
      heap.push({ value: list[position], list: cursor.list, position });
    }
  }

  return out;
}

/**
 * Ids in `a` that are not in `b`
 */
export function differenceSorted(a: readonly number[], b: readonly number[]): number[] {
  const out: number[] = [];
  let j = 0;

  for (const x of a) {
    while (j < b.length && b[j] < x) j++;
    if (j >= b.length || b[j] !== x) {
      out.push(x);
    }
  }

  return out;
}

/**
 * True when every element is strictly greater than the previous one
 */
export function isStrictlyAscending(list: readonly number[]): boolean {
  for (let i = 1; i < list.length; i++) {
    if (!(list[i] > list[i - 1])) return false;
  }
  return true;
}

export function sameSequence(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
