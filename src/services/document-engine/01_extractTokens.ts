// document-engine/01_extractTokens.ts
// ---------------------------------------------------------------------------
// Stage 1: Positioned token extraction from the PDF text layer.
//
// Responsibility:
// - Open the PDF with pdfjs-dist and expose it page by page (PageTokenSource)
// - Turn pdfjs text items into tokens at "char" or "word" granularity
// - Derive a bold flag from the font's real name ("...-BoldMT", "...,Bold")
// - No layout knowledge: no lines, no columns, no headers
//
// Notes:
// - pdfjs has a bottom-left origin. Tokens use a top-left origin so that
//   "top" grows down the page like in the rest of the engine.
// - Glyph positions inside one pdfjs item are interpolated from the item width.

import type { PageTokenSource, Token, TokenGranularity } from "../../../core/types";

// ---- Minimal pdfjs surface (the real PDFDocumentProxy/PDFPageProxy satisfy it)

export interface PdfTextContentLike {
  items: unknown[];
  styles?: Record<string, { fontFamily?: string }>;
}

export interface PdfPageLike {
  getViewport(params: { scale: number }): { width: number; height: number };
  getTextContent(): Promise<PdfTextContentLike>;
  getOperatorList?(): Promise<unknown>;
  commonObjs?: {
    has(objId: string): boolean;
    get(objId: string): unknown;
  };
}

export interface PdfDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
  destroy?(): Promise<void>;
}

export type PdfDocumentLoader = (data: Uint8Array) => Promise<PdfDocumentLike>;

/** One pdfjs text item, reduced to what token extraction needs. */
export interface PdfTextRun {
  str: string;
  x: number;
  baseline: number;
  width: number;
  height: number;
  fontName: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function finiteOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Loads a PDF with the legacy pdfjs build (the one meant for Node.js).
 * The buffer is copied because pdfjs may take ownership of the bytes it gets.
 */
export const loadPdfDocument: PdfDocumentLoader = async (data) => {
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(data),
    verbosity: 0,
    isEvalSupported: false,
  });
  return await loadingTask.promise;
};

/**
 * Narrows a pdfjs text content item to a PdfTextRun.
 * Marked-content items and items without a usable transform return null.
 */
export function toTextRun(item: unknown): PdfTextRun | null {
  if (!isObject(item) || typeof item.str !== "string") return null;
  const transform = item.transform;
  if (!Array.isArray(transform) || transform.length < 6) return null;

  const a = finiteOr(transform[0], 0);
  const b = finiteOr(transform[1], 0);
  const d = finiteOr(transform[3], 0);
  const fontSize = Math.sqrt(a * a + b * b) || Math.abs(d);

  return {
    str: item.str,
    x: finiteOr(transform[4], 0),
    baseline: finiteOr(transform[5], 0),
    width: finiteOr(item.width, item.str.length * fontSize * 0.5),
    height: finiteOr(item.height, fontSize),
    fontName: typeof item.fontName === "string" ? item.fontName : "",
  };
}

export function isBoldFontName(fontName: string): boolean {
  return fontName.includes("Bold");
}

/** Largest gap, in points, between two runs on one baseline that still continues a word. */
export const WORD_JOIN_GAP = 1;

/**
 * Converts text runs into tokens.
 * - "char": one token per character, spaces included, so that the line
 *   builder can concatenate characters back without a separator
 * - "word": one token per whitespace-separated word; a word split over
 *   touching runs ("Mr" + ".") stays one token
 */
export function runsToTokens(
  runs: readonly PdfTextRun[],
  pageHeight: number,
  granularity: TokenGranularity,
  isBold: (fontName: string) => boolean = isBoldFontName
): Token[] {
  const tokens: Token[] = [];
  // last word token, while it still ends flush with its run
  let open: { index: number; endX: number; baseline: number } | null = null;

  for (const run of runs) {
    if (!run.str) continue;
    const top = pageHeight - run.baseline - run.height;
    const charWidth = run.str.length > 0 ? run.width / run.str.length : 0;

    if (granularity === "char") {
      const bold = isBold(run.fontName);
      for (let i = 0; i < run.str.length; i++) {
        tokens.push({ text: run.str[i], x0: run.x + i * charWidth, top, bold });
      }
      continue;
    }

    for (const match of run.str.matchAll(/\S+/g)) {
      const offset = match.index ?? 0;
      const x0 = run.x + offset * charWidth;
      const endX = x0 + match[0].length * charWidth;
      const continues =
        open !== null &&
        offset === 0 &&
        Math.abs(run.baseline - open.baseline) < 0.5 &&
        Math.abs(x0 - open.endX) <= WORD_JOIN_GAP;

      if (open !== null && continues) {
        const prev = tokens[open.index];
        tokens[open.index] = { ...prev, text: prev.text + match[0] };
        const current: { index: number; endX: number; baseline: number } = open;
        open = { ...current, endX };
      } else {
        tokens.push({ text: match[0], x0, top });
        open = { index: tokens.length - 1, endX, baseline: run.baseline };
      }
    }
    if (/\s$/.test(run.str)) open = null;
  }

  return tokens;
}

/**
 * Maps a pdfjs internal font id ("g_d0_f3") to the font's real name.
 * The real name is only available once the operator list has loaded the
 * font; the text content style family is the fallback.
 */
function resolveFontName(
  page: PdfPageLike,
  content: PdfTextContentLike,
  fontId: string
): string {
  if (page.commonObjs?.has(fontId)) {
    const font = page.commonObjs.get(fontId);
    if (isObject(font) && typeof font.name === "string") {
      return font.name;
    }
  }
  return content.styles?.[fontId]?.fontFamily ?? fontId;
}

async function readTextLayerPage(
  doc: PdfDocumentLike,
  pageNumber: number,
  granularity: TokenGranularity
): Promise<Token[]> {
  const page = await doc.getPage(pageNumber);
  const { height } = page.getViewport({ scale: 1 });

  // Font names are only needed for character streams (bold detection)
  if (granularity === "char" && page.getOperatorList) {
    await page.getOperatorList();
  }

  const content = await page.getTextContent();
  const runs: PdfTextRun[] = [];
  for (const item of content.items) {
    const run = toTextRun(item);
    if (run) runs.push(run);
  }

  const boldByFont = new Map<string, boolean>();
  const isBold = (fontId: string): boolean => {
    let bold = boldByFont.get(fontId);
    if (bold === undefined) {
      bold = isBoldFontName(resolveFontName(page, content, fontId));
      boldByFont.set(fontId, bold);
    }
    return bold;
  };

  return runsToTokens(runs, height, granularity, isBold);
}

/**
 * Opens the PDF text layer as a PageTokenSource.
 * Throws when the document cannot be opened at all (the only failure that
 * reaches the caller); per-page failures surface from readPage.
 */
export async function openTextLayerSource(
  pdfBuffer: Uint8Array,
  load: PdfDocumentLoader = loadPdfDocument
): Promise<PageTokenSource> {
  if (!pdfBuffer || pdfBuffer.byteLength === 0) {
    throw new Error("openTextLayerSource: pdfBuffer is empty");
  }

  const doc = await load(pdfBuffer);

  return {
    pageCount: doc.numPages,
    async readPage(pageNumber, granularity) {
      const tokens = await readTextLayerPage(doc, pageNumber, granularity);
      return { pageNumber, granularity, tokens };
    },
    async close() {
      if (doc.destroy) await doc.destroy();
    },
  };
}
