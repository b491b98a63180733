/**
 * Filter value parsing and evaluation
 *
 * Parsers return undefined for malformed values; the compiler then degrades the
 * whole term to a literal keyword. Nothing here throws on user input.
 */

import { Attribute } from "./types.js";
import type { DateBound, DateRange, Filter, FilterSet, IndexedFile, NumericRange } from "./types.js";

const SIZE_UNITS: Record<string, number> = {
  b: 1,
  kb: 1024,
  mb: 1024 * 1024,
  gb: 1024 * 1024 * 1024,
};

const ATTRIBUTE_LETTERS: Record<string, number> = {
  h: Attribute.HIDDEN,
  r: Attribute.READONLY,
  s: Attribute.SYSTEM,
};

const SECONDS_PER_UNIT: Record<string, number> = {
  d: 86400,
  h: 3600,
  m: 60,
};

/**
 * Split a filter value into its `|` alternatives
 */
function alternatives(value: string, separators = /\|/): string[] {
  return value.split(separators).map((v) => v.trim());
}

function stripQuotes(value: string): string {
  return value.replace(/"/g, "");
}

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

/**
 * Parse a size such as `5mb`, `1.5kb` or `300` into bytes
 */
export function parseSize(text: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?)(b|kb|mb|gb)?$/i.exec(text.trim());
  if (!match) return undefined;
  const unit = (match[2] ?? "b").toLowerCase();
  return Math.floor(Number(match[1]) * (SIZE_UNITS[unit] ?? 1));
}

function parseCount(text: string): number | undefined {
  const trimmed = text.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/**
 * Parse one numeric alternative: `>N`, `>=N`, `<N`, `<=N`, `=N`, `N` or `a..b`
 */
function parseNumericRange(
  text: string,
  parseNumber: (text: string) => number | undefined
): NumericRange | undefined {
  const dots = text.indexOf("..");
  if (dots >= 0) {
    const lo = text.slice(0, dots);
    const hi = text.slice(dots + 2);
    if (!lo && !hi) return undefined;
    const min = lo ? parseNumber(lo) : undefined;
    const max = hi ? parseNumber(hi) : undefined;
    if ((lo && min === undefined) || (hi && max === undefined)) return undefined;
    return { ...(min !== undefined && { min }), ...(max !== undefined && { max }) };
  }

  const match = /^(>=|<=|>|<|=)?(.+)$/.exec(text);
  if (!match) return undefined;
  const n = parseNumber(match[2] ?? "");
  if (n === undefined) return undefined;

  switch (match[1]) {
    case ">":
      return { min: n, minExclusive: true };
    case ">=":
      return { min: n };
    case "<":
      return { max: n, maxExclusive: true };
    case "<=":
      return { max: n };
    default:
      return { min: n, max: n };
  }
}

function parseNumericRanges(
  value: string,
  parseNumber: (text: string) => number | undefined
): NumericRange[] | undefined {
  const ranges: NumericRange[] = [];
  for (const alt of alternatives(value)) {
    const range = parseNumericRange(alt, parseNumber);
    if (!range) return undefined;
    ranges.push(range);
  }
  return ranges.length > 0 ? ranges : undefined;
}

export function inRange(n: number, range: NumericRange): boolean {
  if (range.min !== undefined && (range.minExclusive ? n <= range.min : n < range.min)) {
    return false;
  }
  if (range.max !== undefined && (range.maxExclusive ? n >= range.max : n > range.max)) {
    return false;
  }
  return true;
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

/** `week` and `month` count back from now; `year` starts on January 1 */
const NAMED_PERIODS: ReadonlyMap<string, DateBound> = new Map<string, DateBound>([
  ["week", { kind: "ago", seconds: 7 * 86400 }],
  ["month", { kind: "ago", seconds: 30 * 86400 }],
  ["year", { kind: "startOfYear" }],
]);

/**
 * A date expression: an instant (`7d`, `week`) or a whole day (`2024-12-01`, `today`)
 */
interface DatePoint {
  start: DateBound;
  /** First instant after the point; equal to start for instants */
  end: DateBound;
  instant: boolean;
}

/**
 * Local midnight of a calendar date, in seconds since epoch
 */
export function localDayStart(year: number, month: number, day: number): number {
  return Math.floor(new Date(year, month - 1, day).getTime() / 1000);
}

function parseDatePoint(text: string): DatePoint | undefined {
  const lower = text.trim().toLowerCase();

  if (lower === "today" || lower === "yesterday") {
    const daysAgo = lower === "today" ? 0 : 1;
    return {
      start: { kind: "startOfDay", daysAgo },
      end: { kind: "startOfDay", daysAgo: daysAgo - 1 },
      instant: false,
    };
  }

  const period = NAMED_PERIODS.get(lower);
  if (period) {
    return { start: period, end: period, instant: true };
  }

  const relative = /^(\d+)([dhm])$/.exec(lower);
  if (relative) {
    const seconds = Number.parseInt(relative[1] ?? "0", 10) * (SECONDS_PER_UNIT[relative[2] ?? "d"] ?? 0);
    const bound: DateBound = { kind: "ago", seconds };
    return { start: bound, end: bound, instant: true };
  }

  const date = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(lower);
  if (date) {
    const year = Number(date[1]);
    const month = Number(date[2]);
    const day = Number(date[3]);
    const probe = new Date(year, month - 1, day);
    if (probe.getFullYear() !== year || probe.getMonth() !== month - 1 || probe.getDate() !== day) {
      return undefined;
    }
    return {
      start: { kind: "absolute", epochSeconds: localDayStart(year, month, day) },
      end: { kind: "absolute", epochSeconds: localDayStart(year, month, day + 1) },
      instant: false,
    };
  }

  return undefined;
}

function parseDateRange(text: string): DateRange | undefined {
  const dots = text.indexOf("..");
  if (dots >= 0) {
    const lo = text.slice(0, dots);
    const hi = text.slice(dots + 2);
    if (!lo && !hi) return undefined;
    const from = lo ? parseDatePoint(lo) : undefined;
    const to = hi ? parseDatePoint(hi) : undefined;
    if ((lo && !from) || (hi && !to)) return undefined;
    return { ...(from && { from: from.start }), ...(to && { to: to.end }) };
  }

  const match = /^(>=|<=|>|<|=)?(.+)$/.exec(text);
  if (!match) return undefined;
  const point = parseDatePoint(match[2] ?? "");
  if (!point) return undefined;

  switch (match[1]) {
    case ">":
      return { from: point.end };
    case ">=":
      return { from: point.start };
    case "<":
      return { to: point.start };
    case "<=":
      return { to: point.end };
    default:
      return point.instant ? { from: point.start } : { from: point.start, to: point.end };
  }
}

/**
 * Resolve a date bound against the current time (seconds since epoch)
 */
export function resolveDateBound(bound: DateBound, nowSeconds: number): number {
  switch (bound.kind) {
    case "absolute":
      return bound.epochSeconds;
    case "ago":
      return nowSeconds - bound.seconds;
    case "startOfDay": {
      const now = new Date(nowSeconds * 1000);
      return localDayStart(now.getFullYear(), now.getMonth() + 1, now.getDate() - bound.daysAgo);
    }
    case "startOfYear":
      return localDayStart(new Date(nowSeconds * 1000).getFullYear(), 1, 1);
  }
}

// ---------------------------------------------------------------------------
// Filter terms
// ---------------------------------------------------------------------------

export const FILTER_KEYS = [
  "ext",
  "size",
  "dm",
  "datemodified",
  "len",
  "attrib",
  "path",
  "file",
  "folder",
] as const;

export type FilterKey = (typeof FILTER_KEYS)[number];

const FILTER_KEY_SET: ReadonlySet<string> = new Set(FILTER_KEYS);

export function isFilterKey(key: string): key is FilterKey {
  return FILTER_KEY_SET.has(key);
}

/**
 * Parsed filter term; `keywords` carries text following `file:`/`folder:`
 */
export interface ParsedFilterTerm {
  filter: Filter;
  keywords?: string[];
}

/**
 * Parse the value of a known filter key
 * @returns undefined when the value is malformed
 */
export function parseFilterValue(key: FilterKey, value: string): ParsedFilterTerm | undefined {
  switch (key) {
    case "ext": {
      const extensions = alternatives(stripQuotes(value), /[|,]/)
        .map((e) => e.replace(/^\.+/, "").toLowerCase())
        .filter(Boolean);
      if (extensions.length === 0 || extensions.some((e) => /[\s*?]/.test(e))) return undefined;
      return { filter: { kind: "extension", extensions: [...new Set(extensions)] } };
    }
    case "size": {
      const ranges = parseNumericRanges(value, parseSize);
      return ranges && { filter: { kind: "size", ranges } };
    }
    case "len": {
      const ranges = parseNumericRanges(value, parseCount);
      return ranges && { filter: { kind: "pathLength", ranges } };
    }
    case "dm":
    case "datemodified": {
      const ranges: DateRange[] = [];
      for (const alt of alternatives(value)) {
        const range = parseDateRange(alt);
        if (!range) return undefined;
        ranges.push(range);
      }
      return ranges.length > 0 ? { filter: { kind: "modified", ranges } } : undefined;
    }
    case "attrib": {
      const masks: number[] = [];
      for (const alt of alternatives(value)) {
        if (!/^[hrs]+$/i.test(alt)) return undefined;
        let mask = 0;
        for (const letter of alt.toLowerCase()) mask |= ATTRIBUTE_LETTERS[letter] ?? 0;
        masks.push(mask);
      }
      return masks.length > 0 ? { filter: { kind: "attributes", masks } } : undefined;
    }
    case "path": {
      const needles = alternatives(stripQuotes(value))
        .map((p) => p.toLowerCase())
        .filter(Boolean);
      return needles.length > 0 ? { filter: { kind: "path", needles } } : undefined;
    }
    case "file":
    case "folder": {
      const keywords = alternatives(stripQuotes(value)).filter(Boolean);
      return {
        filter: { kind: "entryType", type: key },
        ...(keywords.length > 0 && { keywords }),
      };
    }
  }
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export type RecordPredicate = (record: IndexedFile) => boolean;

/**
 * Compile a FilterSet into one predicate; date bounds resolve against `nowSeconds`
 */
export function compileFilterPredicate(filters: FilterSet, nowSeconds: number): RecordPredicate {
  const checks = filters.map((filter) => compileFilter(filter, nowSeconds));
  return (record) => checks.every((check) => check(record));
}

function compileFilter(filter: Filter, nowSeconds: number): RecordPredicate {
  switch (filter.kind) {
    case "extension": {
      const wanted = new Set(filter.extensions);
      return (record) => wanted.has(record.extension);
    }
    case "size":
      return (record) => !record.isDir && filter.ranges.some((r) => inRange(record.size, r));
    case "pathLength":
      return (record) => filter.ranges.some((r) => inRange(record.fullPath.length, r));
    case "modified": {
      const resolved = filter.ranges.map((r) => ({
        from: r.from && resolveDateBound(r.from, nowSeconds),
        to: r.to && resolveDateBound(r.to, nowSeconds),
      }));
      return (record) =>
        resolved.some(
          (r) =>
            (r.from === undefined || record.mtime >= r.from) &&
            (r.to === undefined || record.mtime < r.to)
        );
    }
    case "attributes":
      return (record) => filter.masks.some((mask) => (record.attributes & mask) === mask);
    case "path":
      return (record) => {
        const lower = record.fullPath.toLowerCase();
        return filter.needles.some((needle) => lower.includes(needle));
      };
    case "entryType":
      return filter.type === "file" ? (record) => !record.isDir : (record) => record.isDir;
  }
}
