// document-engine/04_buildParagraphs.ts
// ---------------------------------------------------------------------------
// Stage 4: Group consecutive lines into paragraphs.
//
// The split threshold is derived from the lines themselves: the median gap
// between line midpoints times paragraphFactor. Dense and loose pages each get
// their own threshold, so there is no fixed spacing constant.

import type { Line, Paragraph } from "../../../core/types";
import { midpoint } from "../../utils/readingOrder";

export const DEFAULT_PARAGRAPH_FACTOR = 1.5;

/** Lower median: for an even count, the smaller of the two middle values. */
export function lowerMedian(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor((sorted.length - 1) / 2)];
}

export function paragraphMidpoint(paragraph: Paragraph): number {
  return midpoint(paragraph.y0, paragraph.y1);
}

export function buildParagraphs(
  lines: readonly Line[],
  paragraphFactor: number = DEFAULT_PARAGRAPH_FACTOR
): Paragraph[] {
  if (lines.length === 0) return [];
  if (lines.length === 1) {
    const [only] = lines;
    return [{ lines: [only.text], y0: only.y0, y1: only.y1 }];
  }

  const mids = lines.map((line) => midpoint(line.y0, line.y1));
  const gaps: number[] = [];
  for (let i = 1; i < mids.length; i++) {
    gaps.push(mids[i] - mids[i - 1]);
  }
  const threshold = lowerMedian(gaps) * paragraphFactor;

  const paragraphs: Paragraph[] = [];
  let current: Paragraph = { lines: [lines[0].text], y0: lines[0].y0, y1: lines[0].y1 };

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (mids[i] - mids[i - 1] > threshold) {
      paragraphs.push(current);
      current = { lines: [line.text], y0: line.y0, y1: line.y1 };
      continue;
    }
    current.lines.push(line.text);
    current.y1 = line.y1;
  }

  paragraphs.push(current);
  return paragraphs;
}
