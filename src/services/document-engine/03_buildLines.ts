// document-engine/03_buildLines.ts
// ---------------------------------------------------------------------------
// Stage 3: Cluster a token stream into lines.
//
// Responsibility:
// - Walk tokens top-to-bottom and group those whose "top" stays within
//   yTolerance of the running line bottom (y1)
// - Rebuild each line's text left-to-right and flag it bold when any of its
//   tokens is bold
//
// Word streams are joined with a single space. Character streams already
// carry their spaces, so characters are concatenated as-is.

import type { Line, Token, TokenGranularity } from "../../../core/types";
import { sortByReadingOrder } from "../../utils/readingOrder";

export const DEFAULT_Y_TOLERANCE = 3;

function closeLine(tokens: Token[], y0: number, y1: number, granularity: TokenGranularity): Line {
  const ordered = [...tokens].sort((a, b) => a.x0 - b.x0);
  const text =
    granularity === "char"
      ? ordered.map((t) => t.text).join("").trim()
      : ordered.map((t) => t.text).join(" ");

  return {
    text,
    y0,
    y1,
    bold: ordered.some((t) => t.bold === true),
  };
}

export function buildLines(
  tokens: readonly Token[],
  granularity: TokenGranularity,
  yTolerance: number = DEFAULT_Y_TOLERANCE
): Line[] {
  if (tokens.length === 0) return [];

  const sorted = sortByReadingOrder(tokens);
  const lines: Line[] = [];

  let current: Token[] = [sorted[0]];
  let y0 = sorted[0].top;
  let y1 = y0;

  for (const token of sorted.slice(1)) {
    if (Math.abs(token.top - y1) <= yTolerance) {
      current.push(token);
      y1 = token.top;
      continue;
    }
    lines.push(closeLine(current, y0, y1, granularity));
    current = [token];
    y0 = token.top;
    y1 = token.top;
  }

  lines.push(closeLine(current, y0, y1, granularity));
  return lines;
}
