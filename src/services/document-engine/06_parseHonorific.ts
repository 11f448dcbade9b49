// document-engine/06_parseHonorific.ts
// ---------------------------------------------------------------------------
// Stage 6: Split a name line into (honorific, person).
//
// The lexicon is an ordered list of fragments kept in data/honorifics.json.
// The first fragment that matches the start of the line wins, so compound
// titles ("H.E.Mr.") are listed before their shorter prefixes ("H.E", "Mr.").
//
// Fragment syntax:
// - "."  matches a dot and then any amount of whitespace ("H.E.Mr." matches
//        "H.E. Mr." as well as "H.E.Mr.")
// - ","  works like ".", so "His Excellency,Mr." matches
//        "His Excellency, Mr."
// - " "  matches exactly one whitespace character
// - a fragment ending in a letter only matches on a word boundary, so "Ms"
//   never eats the start of "Msimang"

import honorificFragments from "../../../data/honorifics.json";

export const DEFAULT_HONORIFICS: readonly string[] = honorificFragments;

export interface HonorificSplit {
  honorific: string;
  person: string;
}

const WHITESPACE = /\s/;
const LETTER = /\p{L}/u;

/**
 * Length of the line prefix consumed by the fragment, or -1 if it does not
 * match.
 */
export function matchFragment(line: string, fragment: string): number {
  if (!fragment) return -1;

  let pos = 0;
  for (const ch of fragment) {
    if (ch === " ") {
      if (pos >= line.length || !WHITESPACE.test(line[pos])) return -1;
      pos++;
      continue;
    }
    if (line[pos] !== ch) return -1;
    pos++;
    if (ch === "." || ch === ",") {
      while (pos < line.length && WHITESPACE.test(line[pos])) pos++;
    }
  }

  const last = fragment[fragment.length - 1];
  if (LETTER.test(last) && pos < line.length && LETTER.test(line[pos])) return -1;
  return pos;
}

export function parseHonorific(
  line: string,
  fragments: readonly string[] = DEFAULT_HONORIFICS
): HonorificSplit {
  const s = line.trim();
  for (const fragment of fragments) {
    const consumed = matchFragment(s, fragment);
    if (consumed > 0) {
      return {
        honorific: s.slice(0, consumed).trim(),
        person: s.slice(consumed).trim(),
      };
    }
  }
  return { honorific: "", person: s };
}
