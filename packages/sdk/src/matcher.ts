/**
 * Keyword atom matchers
 *
 * Literal atoms match as substrings. Wildcard atoms match the whole text:
 * `*` is any run of characters (including none), `?` exactly one code point.
 */

import type { Atom, MatchMode } from "./types.js";

export type TextMatcher = (lowerText: string) => boolean;

const REGEX_SPECIALS = /[.+^${}()[\]\\|]/g;

/**
 * Compile a wildcard pattern into an anchored, case-insensitive matcher
 */
export function compileWildcard(pattern: string): TextMatcher {
  let source = "";
  for (const ch of pattern) {
    if (ch === "*") {
      source += ".*";
    } else if (ch === "?") {
      source += ".";
    } else {
      source += ch.replace(REGEX_SPECIALS, "\\$&");
    }
  }
  // `u` so `?` consumes a full code point; `s` so `.` also matches newlines
  const re = new RegExp(`^${source}$`, "su");
  return (text) => re.test(text);
}

/**
 * Compile an atom into a text matcher
 */
export function compileAtom(atom: Atom): TextMatcher {
  if (atom.kind === "wildcard") {
    return compileWildcard(atom.pattern);
  }
  const needle = atom.text;
  return (text) => text.includes(needle);
}

/**
 * Record-level matcher; `lowerPath` is only read in path mode
 */
export type RecordMatcher = (lowerName: string, lowerPath: string) => boolean;

export function compileRecordMatcher(atom: Atom, mode: MatchMode): RecordMatcher {
  const test = compileAtom(atom);
  if (mode === "name") {
    return (lowerName) => test(lowerName);
  }
  return (lowerName, lowerPath) => test(lowerName) || test(lowerPath);
}
