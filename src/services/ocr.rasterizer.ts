// Rasterizer - PDF pages → PNG files via poppler's pdftoppm
// Images live in a per-run temp directory owned by the caller

import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { runCommand } from "../utils/runCommand"
import type { CommandRunner } from "../utils/runCommand"

export interface RasterizeOptions {
  dpi: number
  popplerPath?: string // directory holding pdftoppm
}

export interface RasterizedPdf {
  dir: string
  images: string[] // absolute paths, page order
}

const PAGE_IMAGE = /^page-(\d+)\.png$/

/**
 * pdftoppm names images page-1.png … or page-01.png … depending on the page
 * count, so files are ordered by their numeric suffix.
 */
export function orderPageImages(fileNames: readonly string[]): string[] {
  const pages: Array<{ name: string; page: number }> = []
  for (const name of fileNames) {
    const match = PAGE_IMAGE.exec(name)
    if (match) pages.push({ name, page: Number(match[1]) })
  }
  return pages.sort((a, b) => a.page - b.page).map((p) => p.name)
}

export function pdftoppmCommand(popplerPath?: string): string {
  return popplerPath ? join(popplerPath, "pdftoppm") : "pdftoppm"
}

/**
 * Renders every page of the PDF to a PNG at the given resolution.
 * On failure the temp directory is removed before the error propagates.
 */
export async function rasterizePdf(
  pdfBuffer: Uint8Array,
  options: RasterizeOptions,
  runner: CommandRunner = runCommand
): Promise<RasterizedPdf> {
  const dir = await mkdtemp(join(tmpdir(), "roster-ocr-"))

  try {
    const input = join(dir, "input.pdf")
    await writeFile(input, pdfBuffer)

    console.log(`🖼️ [Rasterizer] pdftoppm at ${options.dpi} dpi`, { dir })
    await runner(pdftoppmCommand(options.popplerPath), [
      "-r",
      String(options.dpi),
      "-png",
      input,
      join(dir, "page"),
    ])

    const images = orderPageImages(await readdir(dir)).map((name) => join(dir, name))
    if (images.length === 0) {
      throw new Error("rasterizePdf: pdftoppm produced no page images")
    }

    console.log(`✅ [Rasterizer] ${images.length} page image(s)`)
    return { dir, images }
  } catch (error) {
    console.error(`❌ [Rasterizer] Rasterization failed:`, error)
    await rm(dir, { recursive: true, force: true })
    throw error
  }
}
