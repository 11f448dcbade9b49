// document-engine/07_assembleRecords.ts
// ---------------------------------------------------------------------------
// Stage 7: Turn one page's tokens into roster records.
//
// Two strategies, picked once per document:
//
// single-column (text layer with font weight)
//   Lines are walked top-to-bottom. A bold line opens a delegation; the next
//   plain line is a person's name line and the plain lines right after it are
//   the affiliation, up to the next bold or blank line.
//
// two-column (text layer without weight, and every OCR page)
//   Headers are found once on the whole page (all-caps one-line paragraphs).
//   Each column is then cut into paragraphs; a paragraph's first line is the
//   name line, the rest is the affiliation, and the delegation is the last
//   page header above the paragraph's midpoint.
//
// Records never span pages: delegation state starts empty on every page.

import type {
  Header,
  Line,
  LayoutMode,
  PageTokens,
  Paragraph,
  RosterRecord,
  Token,
  TokenGranularity,
} from "../../../core/types";
import { DEFAULT_X_THRESHOLD, splitColumns } from "./02_detectLayout";
import { DEFAULT_Y_TOLERANCE, buildLines } from "./03_buildLines";
import { DEFAULT_PARAGRAPH_FACTOR, buildParagraphs, paragraphMidpoint } from "./04_buildParagraphs";
import { collectHeaders, headerName, isHeaderParagraph, resolveDelegation } from "./05_classifyHeaders";
import { DEFAULT_HONORIFICS, parseHonorific } from "./06_parseHonorific";

export type AssemblyStrategy =
  | { kind: "single-column" }
  | { kind: "two-column"; xThreshold: number };

export interface AssemblySettings {
  yTolerance: number;
  paragraphFactor: number;
  honorifics: readonly string[];
}

export const DEFAULT_ASSEMBLY_SETTINGS: AssemblySettings = {
  yTolerance: DEFAULT_Y_TOLERANCE,
  paragraphFactor: DEFAULT_PARAGRAPH_FACTOR,
  honorifics: DEFAULT_HONORIFICS,
};

/**
 * Only a single-column document whose source reports font weight can use the
 * bold-header walk; everything else falls back to the two-column paragraphs.
 */
export function chooseStrategy(
  mode: LayoutMode,
  hasFontWeight: boolean,
  xThreshold: number = DEFAULT_X_THRESHOLD
): AssemblyStrategy {
  if (mode === "one" && hasFontWeight) return { kind: "single-column" };
  return { kind: "two-column", xThreshold };
}

export function granularityFor(strategy: AssemblyStrategy): TokenGranularity {
  return strategy.kind === "single-column" ? "char" : "word";
}

function toRecord(
  delegation: string,
  nameLine: string,
  affiliation: string,
  honorifics: readonly string[]
): RosterRecord {
  const { honorific, person } = parseHonorific(nameLine, honorifics);
  return {
    Delegation: delegation,
    Honorific: honorific,
    PersonName: person,
    Affiliation: affiliation,
  };
}

export function assembleSingleColumn(
  lines: readonly Line[],
  honorifics: readonly string[] = DEFAULT_HONORIFICS
): RosterRecord[] {
  const records: RosterRecord[] = [];
  let delegation = "";
  let i = 0;

  while (i < lines.length) {
    const { text, bold } = lines[i];

    if (bold && text) {
      delegation = headerName(text);
      i++;
      continue;
    }

    if (!delegation || !text) {
      i++;
      continue;
    }

    i++;
    const affiliation: string[] = [];
    while (i < lines.length && !lines[i].bold && lines[i].text.trim()) {
      affiliation.push(lines[i].text.trim());
      i++;
    }
    records.push(toRecord(delegation, text, affiliation.join(" ").trim(), honorifics));
  }

  return records;
}

/**
 * Paragraph-level half of the two-column strategy: column paragraphs are
 * assigned to the page-global headers.
 */
export function assembleColumnParagraphs(
  headers: readonly Header[],
  columns: readonly (readonly Paragraph[])[],
  honorifics: readonly string[] = DEFAULT_HONORIFICS
): RosterRecord[] {
  const records: RosterRecord[] = [];

  for (const paragraphs of columns) {
    for (const paragraph of paragraphs) {
      if (paragraph.lines.length === 0 || isHeaderParagraph(paragraph)) continue;

      const [nameLine, ...rest] = paragraph.lines;
      const affiliation = rest.map((line) => line.trim()).join(" ").trim();
      const delegation = resolveDelegation(headers, paragraphMidpoint(paragraph));
      records.push(toRecord(delegation, nameLine.trim(), affiliation, honorifics));
    }
  }

  return records;
}

export function assembleTwoColumn(
  tokens: readonly Token[],
  granularity: TokenGranularity,
  xThreshold: number,
  settings: AssemblySettings = DEFAULT_ASSEMBLY_SETTINGS
): RosterRecord[] {
  const { yTolerance, paragraphFactor, honorifics } = settings;
  const paragraphsOf = (stream: readonly Token[]): Paragraph[] =>
    buildParagraphs(buildLines(stream, granularity, yTolerance), paragraphFactor);

  const headers = collectHeaders(paragraphsOf(tokens));
  const { left, right } = splitColumns(tokens, xThreshold);

  return assembleColumnParagraphs(headers, [paragraphsOf(left), paragraphsOf(right)], honorifics);
}

export function assemblePage(
  page: PageTokens,
  strategy: AssemblyStrategy,
  settings: AssemblySettings = DEFAULT_ASSEMBLY_SETTINGS
): RosterRecord[] {
  if (page.tokens.length === 0) return [];

  switch (strategy.kind) {
    case "single-column":
      return assembleSingleColumn(
        buildLines(page.tokens, page.granularity, settings.yTolerance),
        settings.honorifics
      );
    case "two-column":
      return assembleTwoColumn(page.tokens, page.granularity, strategy.xThreshold, settings);
  }
}
