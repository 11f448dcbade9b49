// OCR Tesseract - one page image → word tokens
// Runs the tesseract binary with TSV output and converts pixel boxes to
// PDF points so OCR tokens share the text layer's geometry.

import type { Token } from "../../core/types"
import { runCommand } from "../utils/runCommand"
import type { CommandRunner } from "../utils/runCommand"

export interface TesseractOptions {
  dpi: number
  language: string
  minConfidence: number
  tesseractCmd?: string
}

export interface TsvParseOptions {
  dpi: number
  minConfidence: number
}

const WORD_LEVEL = 5
const POINTS_PER_INCH = 72

/**
 * Parses tesseract TSV output into word tokens.
 * Only word rows (level 5) with text and a confidence at or above the floor
 * are kept. Columns are located by the header row.
 */
export function parseTesseractTsv(tsv: string, options: TsvParseOptions): Token[] {
  const rows = tsv.split(/\r?\n/)
  const header = rows[0]?.split("\t") ?? []
  const col = (name: string) => header.indexOf(name)
  const levelCol = col("level")
  const leftCol = col("left")
  const topCol = col("top")
  const confCol = col("conf")
  const textCol = col("text")

  if ([levelCol, leftCol, topCol, confCol, textCol].some((i) => i < 0)) {
    throw new Error("parseTesseractTsv: missing TSV header row")
  }

  const scale = POINTS_PER_INCH / options.dpi
  const tokens: Token[] = []

  for (const row of rows.slice(1)) {
    if (!row) continue
    const cells = row.split("\t")
    if (Number(cells[levelCol]) !== WORD_LEVEL) continue

    const text = (cells[textCol] ?? "").trim()
    if (!text) continue

    const conf = Number(cells[confCol])
    if (Number.isNaN(conf) || conf < options.minConfidence) continue

    const left = Number(cells[leftCol])
    const top = Number(cells[topCol])
    if (!Number.isFinite(left) || !Number.isFinite(top)) continue

    tokens.push({ text, x0: left * scale, top: top * scale })
  }

  return tokens
}

export async function ocrImageToTokens(
  imagePath: string,
  options: TesseractOptions,
  runner: CommandRunner = runCommand
): Promise<Token[]> {
  const command = options.tesseractCmd || "tesseract"
  const { stdout } = await runner(command, [
    imagePath,
    "stdout",
    "--dpi",
    String(options.dpi),
    "-l",
    options.language,
    "tsv",
  ])
  return parseTesseractTsv(stdout, options)
}
