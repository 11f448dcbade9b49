// document-engine/05_classifyHeaders.ts
// ---------------------------------------------------------------------------
// Stage 5: Delegation headers.
//
// A header is a one-line paragraph made only of upper-case letters, spaces
// and slashes ("BAHAMAS", "SWITZERLAND / SUISSE / SUIZA"). Multilingual
// variants are collapsed to the part before the first slash.

import type { Header, Paragraph } from "../../../core/types";
import { paragraphMidpoint } from "./04_buildParagraphs";

const HEADER_TEXT = /^[\p{Lu} /]+$/u;

export function isHeaderText(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.length > 0 && HEADER_TEXT.test(trimmed);
}

export function headerName(text: string): string {
  return text.split("/", 1)[0].trim();
}

export function isHeaderParagraph(paragraph: Paragraph): boolean {
  return paragraph.lines.length === 1 && isHeaderText(paragraph.lines[0]);
}

/** Headers of one page, sorted by vertical midpoint. */
export function collectHeaders(paragraphs: readonly Paragraph[]): Header[] {
  return paragraphs
    .filter(isHeaderParagraph)
    .map((paragraph) => ({ name: headerName(paragraph.lines[0]), midY: paragraphMidpoint(paragraph) }))
    .sort((a, b) => a.midY - b.midY);
}

/**
 * The delegation owning a block at midY: the last header at or above it.
 * Blocks above the first header of the page get "".
 */
export function resolveDelegation(headers: readonly Header[], midY: number): string {
  let name = "";
  for (const header of headers) {
    if (header.midY > midY) break;
    name = header.name;
  }
  return name;
}
