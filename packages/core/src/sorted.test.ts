/**
 * Unit tests for sorted-list algorithms and MinHeap
 */

import { describe, it, expect } from "vitest";
import { MinHeap } from "./heap.js";
import {
  differenceSorted,
  intersectSorted,
  isStrictlyAscending,
  kWayMerge,
  mergeUnion,
  mergeUnionPairwise,
  sameSequence,
} from "./sorted.js";
import { createRandom } from "./synthetic.js";

describe("MinHeap", () => {
  it("should pop items in ascending order", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    for (const n of [5, 1, 4, 1, 3, 9, 2]) {
      heap.push(n);
    }

    const out: number[] = [];
    for (let n = heap.pop(); n !== undefined; n = heap.pop()) {
      out.push(n);
    }
    expect(out).toEqual([1, 1, 2, 3, 4, 5, 9]);
    expect(heap.size).toBe(0);
  });

  it("should return undefined when empty", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    expect(heap.pop()).toBeUndefined();
  });
});

describe("intersectSorted", () => {
  it("should keep common ids", () => {
    expect(intersectSorted([1, 3, 5, 7], [2, 3, 4, 7, 9])).toEqual([3, 7]);
  });

  it("should return empty when either side is empty", () => {
    expect(intersectSorted([], [1, 2])).toEqual([]);
    expect(intersectSorted([1, 2], [])).toEqual([]);
  });
});

describe("mergeUnion", () => {
  it("should merge and drop duplicates", () => {
    expect(mergeUnion([1, 4, 6], [2, 4, 7])).toEqual([1, 2, 4, 6, 7]);
  });

  it("should not mutate its inputs", () => {
    const a = [1, 2];
    const b = [2, 3];
    mergeUnion(a, b);
    expect(a).toEqual([1, 2]);
    expect(b).toEqual([2, 3]);
  });
});

describe("range merge strategies", () => {
  it("should agree on a small case", () => {
    const lists = [[1, 5, 9], [2, 5], [], [0, 9, 10]];
    expect(kWayMerge(lists)).toEqual([0, 1, 2, 5, 9, 10]);
    expect(mergeUnionPairwise(lists)).toEqual([0, 1, 2, 5, 9, 10]);
  });

  it("should produce identical lists for random inputs", () => {
    const random = createRandom(7);
    for (let trial = 0; trial < 50; trial++) {
      const lists: number[][] = [];
      const count = 1 + Math.floor(random() * 8);
      for (let i = 0; i < count; i++) {
        const list = new Set<number>();
        const length = Math.floor(random() * 30);
        for (let j = 0; j < length; j++) {
          list.add(Math.floor(random() * 200));
        }
        lists.push([...list].sort((a, b) => a - b));
      }

      const heap = kWayMerge(lists);
      expect(heap).toEqual(mergeUnionPairwise(lists));
      expect(isStrictlyAscending(heap)).toBe(true);
    }
  });

  it("should return an empty list for no input", () => {
    expect(kWayMerge([])).toEqual([]);
    expect(mergeUnionPairwise([])).toEqual([]);
  });
});

describe("differenceSorted", () => {
  it("should keep ids missing from the second list", () => {
    expect(differenceSorted([1, 2, 3, 4], [2, 4, 5])).toEqual([1, 3]);
    expect(differenceSorted([], [1])).toEqual([]);
  });
});

describe("isStrictlyAscending", () => {
  it("should reject duplicates and descending pairs", () => {
    expect(isStrictlyAscending([1, 2, 3])).toBe(true);
    expect(isStrictlyAscending([])).toBe(true);
    expect(isStrictlyAscending([1, 1, 2])).toBe(false);
    expect(isStrictlyAscending([2, 1])).toBe(false);
  });
});

describe("sameSequence", () => {
  it("should compare element by element", () => {
    expect(sameSequence([1, 2], [1, 2])).toBe(true);
    expect(sameSequence([1, 2], [2, 1])).toBe(false);
    expect(sameSequence([1], [1, 2])).toBe(false);
  });
});
