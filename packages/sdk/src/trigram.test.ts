import { describe, it, expect } from "vitest";
import {
  codePointLength,
  insertSorted,
  intersectAll,
  intersectSorted,
  removeSorted,
  trigramsOf,
  unionSorted,
} from "./trigram.js";

describe("trigramsOf", () => {
  it("should return overlapping trigrams in order", () => {
    expect(trigramsOf("photo")).toEqual(["pho", "hot", "oto"]);
  });

  it("should deduplicate repeated trigrams", () => {
    expect(trigramsOf("aaaa")).toEqual(["aaa"]);
  });

  it("should return nothing for short text", () => {
    expect(trigramsOf("ab")).toEqual([]);
  });

  it("should split on code points", () => {
    expect(codePointLength("a😀b")).toBe(3);
    expect(trigramsOf("a😀bc")).toEqual(["a😀b", "😀bc"]);
  });
});

describe("sorted id lists", () => {
  it("should intersect", () => {
    expect(intersectSorted([1, 3, 5, 7], [2, 3, 4, 7, 9])).toEqual([3, 7]);
  });

  it("should intersect many lists", () => {
    expect(intersectAll([[1, 2, 3, 4], [2, 4], [0, 2, 4, 6]])).toEqual([2, 4]);
    expect(intersectAll([])).toEqual([]);
  });

  it("should union and sort", () => {
    expect(unionSorted([[5, 9], [1, 5], [3]])).toEqual([1, 3, 5, 9]);
  });

  it("should insert keeping order and uniqueness", () => {
    const list = [1, 4, 8];
    insertSorted(list, 5);
    insertSorted(list, 4);
    insertSorted(list, 10);
    insertSorted(list, 0);
    expect(list).toEqual([0, 1, 4, 5, 8, 10]);
  });

  it("should remove present ids only", () => {
    const list = [1, 4, 8];
    expect(removeSorted(list, 4)).toBe(true);
    expect(removeSorted(list, 5)).toBe(false);
    expect(list).toEqual([1, 8]);
  });
});
