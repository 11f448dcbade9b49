// document-engine/99_processDocument.ts
// ---------------------------------------------------------------------------
// High-level pipeline orchestration for document-engine.
//
// Responsibility:
// - Take a PDF buffer + options and pick one token source and one strategy
//   for the whole document:
//   1) resolveExtractionOptions(options)          → invalid → throw
//   2) text layer: layout override, or sample the first 2 pages (word tokens)
//   3) chooseStrategy(mode)                        → single-column | two-column
//   4) page by page: readPage → assemblePage       → unreadable page → warn, skip
//   5) forceOcr, or a text layer empty on every page → OCR source, two-column
//
// Notes:
// - Pages run in document order, one at a time
// - Only invalid options, an unopenable document or a failed rasterization
//   reach the caller
// - Sources are always closed

import type { LayoutMode, PageTokens, PageTokenSource, RosterRecord, Token } from "../../../core/types";
import { resolveExtractionOptions } from "../../config";
import type { ExtractionOptions } from "../../config";
import { openOcrSource } from "../ocr.router";
import { runCommand } from "../../utils/runCommand";
import type { CommandRunner } from "../../utils/runCommand";
import { openTextLayerSource } from "./01_extractTokens";
import { LAYOUT_SAMPLE_PAGES, detectLayoutMode } from "./02_detectLayout";
import { assemblePage, chooseStrategy, granularityFor } from "./07_assembleRecords";
import type { AssemblySettings, AssemblyStrategy } from "./07_assembleRecords";
import { DEFAULT_HONORIFICS } from "./06_parseHonorific";

export type TokenSourceKind = "text-layer" | "ocr";

export interface DocumentSources {
  openTextLayer(pdfBuffer: Uint8Array): Promise<PageTokenSource>;
  openOcr(pdfBuffer: Uint8Array, options: ExtractionOptions): Promise<PageTokenSource>;
}

export interface ProcessDocumentResult {
  records: RosterRecord[];
  mode: LayoutMode;
  source: TokenSourceKind;
  pageCount: number;
  emptyPages: number[];
  failedPages: number[];
}

interface PageRun {
  records: RosterRecord[];
  emptyPages: number[];
  failedPages: number[];
  tokenCount: number;
}

export function createDocumentSources(runner: CommandRunner = runCommand): DocumentSources {
  return {
    openTextLayer: (pdfBuffer) => openTextLayerSource(pdfBuffer),
    openOcr: (pdfBuffer, options) =>
      openOcrSource(
        pdfBuffer,
        {
          dpi: options.ocrDpi,
          language: options.ocrLanguage,
          minConfidence: options.minConfidence,
          tesseractCmd: options.tesseractCmd,
          popplerPath: options.popplerPath,
        },
        runner
      ),
  };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Samples the first pages' word tokens and stops at the first two-column
 * page. Pages that cannot be read are skipped; sampled pages are returned so
 * a two-column run can reuse them.
 */
export async function sampleLayoutMode(
  source: PageTokenSource,
  xThreshold: number
): Promise<{ mode: LayoutMode; sampled: Map<number, PageTokens> }> {
  const sampled = new Map<number, PageTokens>();
  const readable: Token[][] = [];
  const last = Math.min(LAYOUT_SAMPLE_PAGES, source.pageCount);

  for (let pageNumber = 1; pageNumber <= last; pageNumber++) {
    let page: PageTokens;
    try {
      page = await source.readPage(pageNumber, "word");
    } catch (err) {
      console.warn("[document-engine] Layout sample page unreadable, skipped", {
        pageNumber,
        error: describeError(err),
      });
      continue;
    }
    sampled.set(pageNumber, page);
    readable.push(page.tokens);
    if (detectLayoutMode(readable, xThreshold) === "two") {
      return { mode: "two", sampled };
    }
  }

  return { mode: detectLayoutMode(readable, xThreshold), sampled };
}

async function runPages(
  source: PageTokenSource,
  strategy: AssemblyStrategy,
  settings: AssemblySettings,
  cached: Map<number, PageTokens> = new Map()
): Promise<PageRun> {
  const granularity = granularityFor(strategy);
  const run: PageRun = { records: [], emptyPages: [], failedPages: [], tokenCount: 0 };

  for (let pageNumber = 1; pageNumber <= source.pageCount; pageNumber++) {
    let page: PageTokens;
    const hit = cached.get(pageNumber);
    try {
      page = hit && hit.granularity === granularity ? hit : await source.readPage(pageNumber, granularity);
    } catch (err) {
      console.warn("[document-engine] Page unreadable, skipped", {
        pageNumber,
        error: describeError(err),
      });
      run.failedPages.push(pageNumber);
      continue;
    }

    if (page.tokens.length === 0) {
      run.emptyPages.push(pageNumber);
      continue;
    }

    run.tokenCount += page.tokens.length;
    const records = assemblePage(page, strategy, settings);
    run.records.push(...records);
  }

  return run;
}

async function extractWithOcr(
  pdfBuffer: Uint8Array,
  sources: DocumentSources,
  options: ExtractionOptions,
  settings: AssemblySettings
): Promise<ProcessDocumentResult> {
  let source: PageTokenSource;
  try {
    console.log("[document-engine] Opening OCR source");
    source = await sources.openOcr(pdfBuffer, options);
  } catch (err) {
    console.error("[document-engine] OCR source failed to open", err);
    throw err;
  }

  try {
    const strategy = chooseStrategy("two", false, options.xThreshold);
    const run = await runPages(source, strategy, settings);
    return {
      records: run.records,
      mode: "two",
      source: "ocr",
      pageCount: source.pageCount,
      emptyPages: run.emptyPages,
      failedPages: run.failedPages,
    };
  } finally {
    await source.close();
  }
}

async function extractFromTextLayer(
  source: PageTokenSource,
  options: ExtractionOptions,
  settings: AssemblySettings
): Promise<{ result: ProcessDocumentResult; tokenCount: number }> {
  let mode: LayoutMode;
  let sampled = new Map<number, PageTokens>();
  if (options.layout === "auto") {
    console.log("[document-engine] Step 2: detect layout");
    ({ mode, sampled } = await sampleLayoutMode(source, options.xThreshold));
  } else {
    mode = options.layout;
  }

  const strategy = chooseStrategy(mode, true, options.xThreshold);
  console.log("[document-engine] Step 3: assemble records", {
    mode,
    strategy: strategy.kind,
    pages: source.pageCount,
  });

  const run = await runPages(source, strategy, settings, sampled);
  return {
    result: {
      records: run.records,
      mode,
      source: "text-layer",
      pageCount: source.pageCount,
      emptyPages: run.emptyPages,
      failedPages: run.failedPages,
    },
    tokenCount: run.tokenCount,
  };
}

/**
 * Runs the whole pipeline against explicit token sources. processDocument()
 * is this function with the real pdfjs and tesseract sources.
 */
export async function extractRecordsFromSources(
  pdfBuffer: Uint8Array,
  sources: DocumentSources,
  partialOptions: Partial<ExtractionOptions> = {}
): Promise<ProcessDocumentResult> {
  const options = resolveExtractionOptions(partialOptions);
  const settings: AssemblySettings = {
    yTolerance: options.yTolerance,
    paragraphFactor: options.paragraphFactor,
    honorifics: DEFAULT_HONORIFICS,
  };

  if (options.forceOcr) {
    console.log("[document-engine] forceOcr set, skipping the text layer");
    return extractWithOcr(pdfBuffer, sources, options, settings);
  }

  let source: PageTokenSource;
  try {
    console.log("[document-engine] Step 1: open text layer");
    source = await sources.openTextLayer(pdfBuffer);
  } catch (err) {
    console.error("[document-engine] Step 1 failed: open text layer", err);
    throw err;
  }

  const opened = source;
  const textLayer = await extractFromTextLayer(opened, options, settings).finally(() => opened.close());

  if (textLayer.tokenCount === 0 && options.ocrFallback) {
    console.log("[document-engine] Text layer is empty on every page, falling back to OCR");
    return extractWithOcr(pdfBuffer, sources, options, settings);
  }

  return textLayer.result;
}

export async function processDocument(
  pdfBuffer: Uint8Array,
  options: Partial<ExtractionOptions> = {},
  sources: DocumentSources = createDocumentSources()
): Promise<ProcessDocumentResult> {
  if (!pdfBuffer || pdfBuffer.byteLength === 0) {
    throw new Error("processDocument: pdfBuffer is empty");
  }

  const result = await extractRecordsFromSources(pdfBuffer, sources, options);
  console.log("[document-engine] Pipeline completed successfully.", {
    records: result.records.length,
    mode: result.mode,
    source: result.source,
    emptyPages: result.emptyPages.length,
    failedPages: result.failedPages.length,
  });
  return result;
}
