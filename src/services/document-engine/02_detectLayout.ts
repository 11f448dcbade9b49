// document-engine/02_detectLayout.ts
// ---------------------------------------------------------------------------
// Stage 2: Layout mode detection and column splitting.
//
// Responsibility:
// - Guess once per document whether pages read as one column or two
// - Split a page's tokens into left/right streams at a fixed x threshold
//
// The guess only counts how many tokens start on each side of the threshold
// on the first pages.

import type { LayoutMode, Token } from "../../../core/types";
import { sortByReadingOrder } from "../../utils/readingOrder";

export const DEFAULT_X_THRESHOLD = 260;

/** Minimum share of a page's tokens each side needs for a two-column page. */
export const TWO_COLUMN_MIN_SHARE = 0.25;

/** How many leading pages the detector samples. */
export const LAYOUT_SAMPLE_PAGES = 2;

export interface ColumnCounts {
  left: number;
  right: number;
  total: number;
}

export interface ColumnStreams {
  left: Token[];
  right: Token[];
}

export function countColumnTokens(tokens: readonly Token[], xThreshold: number): ColumnCounts {
  let left = 0;
  let right = 0;
  for (const token of tokens) {
    if (token.x0 < xThreshold) left++;
    else right++;
  }
  return { left, right, total: left + right };
}

export function isTwoColumnPage(tokens: readonly Token[], xThreshold: number): boolean {
  const { left, right, total } = countColumnTokens(tokens, xThreshold);
  if (total === 0) return false;
  return left / total >= TWO_COLUMN_MIN_SHARE && right / total >= TWO_COLUMN_MIN_SHARE;
}

/**
 * Decides the layout from the sampled pages' token streams.
 * Pages that could not be read should simply be left out; no usable page
 * means "one".
 */
export function detectLayoutMode(samplePages: readonly (readonly Token[])[], xThreshold: number): LayoutMode {
  for (const tokens of samplePages.slice(0, LAYOUT_SAMPLE_PAGES)) {
    if (isTwoColumnPage(tokens, xThreshold)) return "two";
  }
  return "one";
}

export function splitColumns(tokens: readonly Token[], xThreshold: number): ColumnStreams {
  const left: Token[] = [];
  const right: Token[] = [];
  for (const token of tokens) {
    (token.x0 < xThreshold ? left : right).push(token);
  }
  return { left: sortByReadingOrder(left), right: sortByReadingOrder(right) };
}
