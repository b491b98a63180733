/**
 * Query compiler: free text to an immutable Query
 *
 * Syntax:
 * - Whitespace separates AND terms; double quotes keep whitespace inside a term
 * - `a|b` is an OR group; a leading `!` excludes the term's atoms
 * - `key:value` with a known key (ext, size, dm/datemodified, len, attrib, path,
 *   file, folder) is a filter; `key:v1|v2` gives alternative values
 * - Unknown keys and malformed values degrade to a literal keyword, verbatim
 * - `*` and `?` make an atom a wildcard pattern
 *
 * Compilation is total and deterministic: the same input always yields a
 * structurally equal Query, and no input throws.
 */

import { isFilterKey, parseFilterValue } from "./filters.js";
import type { Atom, Filter, Query } from "./types.js";

const FILTER_TERM = /^([a-z]+):(.*)$/is;

/**
 * Split raw input into terms on whitespace outside double quotes
 */
export function tokenize(raw: string): string[] {
  const terms: string[] = [];
  let current = "";
  let quoted = false;

  for (const ch of raw) {
    if (ch === '"') {
      quoted = !quoted;
      current += ch;
    } else if (!quoted && /\s/.test(ch)) {
      if (current) terms.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  if (current) terms.push(current);

  return terms;
}

/**
 * Build an atom from keyword text; quotes are removed, case is folded
 * @returns undefined for text that is empty after cleanup
 */
export function toAtom(text: string): Atom | undefined {
  const lower = text.replace(/"/g, "").toLowerCase();
  if (!lower) return undefined;
  return /[*?]/.test(lower) ? { kind: "wildcard", pattern: lower } : { kind: "literal", text: lower };
}

function toAtoms(texts: string[]): Atom[] {
  const atoms: Atom[] = [];
  for (const text of texts) {
    const atom = toAtom(text);
    if (atom) atoms.push(atom);
  }
  return atoms;
}

/**
 * Compile a raw query string
 */
export function compileQuery(raw: string): Query {
  const groups: Atom[][] = [];
  const excluded: Atom[] = [];
  const filters: Filter[] = [];

  for (const term of tokenize(raw)) {
    const negated = term.length > 1 && term.startsWith("!");
    const body = negated ? term.slice(1) : term;

    const match = FILTER_TERM.exec(body);
    const key = match?.[1]?.toLowerCase();

    if (match && key !== undefined && isFilterKey(key)) {
      const parsed = negated ? undefined : parseFilterValue(key, match[2] ?? "");
      if (parsed) {
        filters.push(parsed.filter);
        const keywords = toAtoms(parsed.keywords ?? []);
        if (keywords.length > 0) groups.push(keywords);
      } else {
        // Malformed value (or negated filter): the whole term is one literal
        const atom = toAtom(body);
        if (atom && negated) {
          excluded.push(atom);
        } else if (atom) {
          groups.push([atom]);
        }
      }
      continue;
    }

    const atoms = toAtoms(body.split("|"));
    if (atoms.length === 0) continue;

    if (negated) {
      excluded.push(...atoms);
    } else {
      groups.push(atoms);
    }
  }

  return deepFreeze({ raw, groups, excluded, filters });
}

/**
 * True when the query has nothing to match on
 */
export function isEmptyQuery(query: Query): boolean {
  return query.groups.length === 0 && query.excluded.length === 0 && query.filters.length === 0;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
