// Extraction options shared by the CLI, the HTTP endpoint and the engine.
// Surfaces build a Partial<ExtractionOptions>; the engine only ever sees the
// resolved, validated object.

import type { LayoutOption } from "../core/types"

export interface ExtractionOptions {
  layout: LayoutOption
  xThreshold: number // column split, in PDF points
  forceOcr: boolean
  ocrFallback: boolean // OCR a document whose text layer is empty on every page
  ocrDpi: number
  ocrLanguage: string
  minConfidence: number // tesseract word confidence floor (0-100)
  tesseractCmd?: string
  popplerPath?: string
  yTolerance: number
  paragraphFactor: number
}

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  layout: "auto",
  xThreshold: 260,
  forceOcr: false,
  ocrFallback: true,
  ocrDpi: 300,
  ocrLanguage: "eng",
  minConfidence: 0,
  yTolerance: 3,
  paragraphFactor: 1.5,
}

const LAYOUT_OPTIONS: readonly LayoutOption[] = ["auto", "one", "two"]

export function isLayoutOption(value: string): value is LayoutOption {
  return LAYOUT_OPTIONS.some((option) => option === value)
}

function requirePositive(name: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`resolveExtractionOptions: ${name} must be a positive number, got ${value}`)
  }
}

function requireNonNegative(name: string, value: number) {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`resolveExtractionOptions: ${name} must be a non-negative number, got ${value}`)
  }
}

/**
 * Merges partial options over the defaults and validates the result.
 * Undefined entries keep the default.
 */
export function resolveExtractionOptions(partial: Partial<ExtractionOptions> = {}): ExtractionOptions {
  const defaults = DEFAULT_EXTRACTION_OPTIONS
  const merged: ExtractionOptions = {
    layout: partial.layout ?? defaults.layout,
    xThreshold: partial.xThreshold ?? defaults.xThreshold,
    forceOcr: partial.forceOcr ?? defaults.forceOcr,
    ocrFallback: partial.ocrFallback ?? defaults.ocrFallback,
    ocrDpi: partial.ocrDpi ?? defaults.ocrDpi,
    ocrLanguage: partial.ocrLanguage ?? defaults.ocrLanguage,
    minConfidence: partial.minConfidence ?? defaults.minConfidence,
    tesseractCmd: partial.tesseractCmd || undefined,
    popplerPath: partial.popplerPath || undefined,
    yTolerance: partial.yTolerance ?? defaults.yTolerance,
    paragraphFactor: partial.paragraphFactor ?? defaults.paragraphFactor,
  }

  if (!isLayoutOption(merged.layout)) {
    throw new Error(`resolveExtractionOptions: layout must be one of ${LAYOUT_OPTIONS.join(", ")}, got "${merged.layout}"`)
  }
  requirePositive("xThreshold", merged.xThreshold)
  requirePositive("ocrDpi", merged.ocrDpi)
  requireNonNegative("yTolerance", merged.yTolerance)
  requirePositive("paragraphFactor", merged.paragraphFactor)
  if (!Number.isFinite(merged.minConfidence) || merged.minConfidence < 0 || merged.minConfidence > 100) {
    throw new Error(`resolveExtractionOptions: minConfidence must be between 0 and 100, got ${merged.minConfidence}`)
  }
  if (!/^[A-Za-z_]+(\+[A-Za-z_]+)*$/.test(merged.ocrLanguage)) {
    throw new Error(`resolveExtractionOptions: invalid ocrLanguage "${merged.ocrLanguage}"`)
  }

  return merged
}
