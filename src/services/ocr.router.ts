// OCR Router - scanned PDF → PageTokenSource
// Rasterizes the whole document once, then runs tesseract page by page as
// the engine asks for pages. OCR has no font weight, so pages are always
// word streams whatever granularity is requested.

import { rm } from "node:fs/promises"
import type { PageTokenSource } from "../../core/types"
import { runCommand } from "../utils/runCommand"
import type { CommandRunner } from "../utils/runCommand"
import { rasterizePdf } from "./ocr.rasterizer"
import { ocrImageToTokens } from "./ocr.service.tesseract"

export interface OcrSourceOptions {
  dpi: number
  language: string
  minConfidence: number
  tesseractCmd?: string
  popplerPath?: string
}

/**
 * Opens a PDF for OCR. Throws when the document cannot be rasterized at all;
 * a page whose OCR fails rejects only that page's readPage().
 */
export async function openOcrSource(
  pdfBuffer: Uint8Array,
  options: OcrSourceOptions,
  runner: CommandRunner = runCommand
): Promise<PageTokenSource> {
  if (!pdfBuffer || pdfBuffer.byteLength === 0) {
    throw new Error("openOcrSource: pdfBuffer is empty")
  }

  console.log(`🔀 [OCR Router] Opening document for OCR:`, {
    bytes: pdfBuffer.byteLength,
    dpi: options.dpi,
    language: options.language,
  })

  const { dir, images } = await rasterizePdf(
    pdfBuffer,
    { dpi: options.dpi, popplerPath: options.popplerPath },
    runner
  )
  let closed = false

  return {
    pageCount: images.length,

    async readPage(pageNumber) {
      if (closed) {
        throw new Error("openOcrSource: source is closed")
      }
      const image = images[pageNumber - 1]
      if (!image) {
        throw new Error(`openOcrSource: page ${pageNumber} out of range (1-${images.length})`)
      }
      const tokens = await ocrImageToTokens(image, options, runner)
      console.log(`📋 [OCR Router] Page ${pageNumber}: ${tokens.length} word(s)`)
      return { pageNumber, granularity: "word", tokens }
    },

    async close() {
      if (closed) return
      closed = true
      await rm(dir, { recursive: true, force: true })
    },
  }
}
