/**
 * Trigram decomposition and sorted id-list set operations
 *
 * Invariants:
 * - Trigrams are taken over code points, so non-BMP names are split correctly
 * - Id lists are strictly ascending (sorted and deduplicated)
 */

/**
 * Length of a string in code points
 */
export function codePointLength(text: string): number {
  let n = 0;
  for (const _ of text) n++;
  return n;
}

/**
 * Distinct overlapping 3-code-point substrings, in order of first appearance
 */
export function trigramsOf(text: string): string[] {
  const chars = Array.from(text);
  if (chars.length < 3) {
    return [];
  }

  const seen = new Set<string>();
  for (let i = 0; i + 3 <= chars.length; i++) {
    seen.add(chars[i]! + chars[i + 1]! + chars[i + 2]!);
  }
  return [...seen];
}

/**
 * Intersect two ascending id lists
 */
export function intersectSorted(a: readonly number[], b: readonly number[]): number[] {
  const out: number[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const x = a[i]!;
    const y = b[j]!;
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
 * Intersect many ascending id lists, smallest first
 */
export function intersectAll(lists: readonly (readonly number[])[]): number[] {
  if (lists.length === 0) return [];

  const ordered = [...lists].sort((a, b) => a.length - b.length);
  let result: number[] = [...ordered[0]!];
  for (let k = 1; k < ordered.length && result.length > 0; k++) {
    result = intersectSorted(result, ordered[k]!);
  }
  return result;
}

/**
 * Union of ascending id lists, ascending and deduplicated
 */
export function unionSorted(lists: readonly (readonly number[])[]): number[] {
  if (lists.length === 0) return [];
  if (lists.length === 1) return [...lists[0]!];

  const merged = new Set<number>();
  for (const list of lists) {
    for (const id of list) merged.add(id);
  }
  return [...merged].sort((a, b) => a - b);
}

/**
 * Insert an id into an ascending list, keeping it deduplicated
 */
export function insertSorted(list: number[], id: number): void {
  const last = list[list.length - 1];
  if (last === undefined || id > last) {
    list.push(id);
    return;
  }

  const at = lowerBound(list, id);
  if (list[at] !== id) {
    list.splice(at, 0, id);
  }
}

/**
 * Remove an id from an ascending list
 * @returns true if the id was present
 */
export function removeSorted(list: number[], id: number): boolean {
  const at = lowerBound(list, id);
  if (list[at] === id) {
    list.splice(at, 1);
    return true;
  }
  return false;
}

function lowerBound(list: readonly number[], id: number): number {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (list[mid]! < id) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
