// extract-roster: PDF roster → CSV / XLSX
//
//   extract-roster <pdf> [-o out.csv] [--layout auto|one|two] [--force-ocr] ...
//
// TESSERACT_CMD and POPPLER_PATH fill in --tesseract-cmd / --poppler-path.

import { readFile } from "node:fs/promises"
import { pathToFileURL } from "node:url"
import { isLayoutOption } from "./config"
import type { ExtractionOptions } from "./config"
import { processDocument, writeRecords } from "./services/document-engine"
import type { ProcessDocumentResult } from "./services/document-engine"

export interface CliArgs {
  pdf: string
  out: string
  help: boolean
  options: Partial<ExtractionOptions>
}

export type CliProcessor = (
  pdfBuffer: Uint8Array,
  options: Partial<ExtractionOptions>
) => Promise<ProcessDocumentResult>

export const DEFAULT_OUT = "roster.csv"

export const USAGE = `Usage: extract-roster <pdf> [options]

Options:
  -o, --out <file>            output file, .csv / .xlsx / .xls (default ${DEFAULT_OUT})
  --layout <auto|one|two>     force the column layout (default auto)
  --x-threshold <points>      column split position (default 260)
  --force-ocr                 skip the text layer and OCR every page
  --no-ocr-fallback           do not OCR a document whose text layer is empty
  --tesseract-cmd <path>      tesseract executable (env TESSERACT_CMD)
  --poppler-path <dir>        directory containing pdftoppm (env POPPLER_PATH)
  --ocr-dpi <n>               rasterization resolution (default 300)
  --ocr-lang <code>           tesseract language (default eng)
  --y-tolerance <points>      line clustering tolerance (default 3)
  --paragraph-factor <n>      paragraph gap factor (default 1.5)
  -h, --help                  show this help`

function toNumber(flag: string, value: string): number {
  const n = Number(value)
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new Error(`parseCliArgs: ${flag} expects a number, got "${value}"`)
  }
  return n
}

/**
 * Parses argv (without the node executable and script path).
 * Throws on unknown flags, missing values and a missing input path.
 */
export function parseCliArgs(argv: readonly string[], env: NodeJS.ProcessEnv = {}): CliArgs {
  const options: Partial<ExtractionOptions> = {}
  let pdf: string | undefined
  let out = DEFAULT_OUT
  let help = false

  const valueOf = (flag: string, i: number): string => {
    const next = argv[i + 1]
    if (next === undefined || next.startsWith("--")) {
      throw new Error(`parseCliArgs: ${flag} expects a value`)
    }
    return next
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === "-h" || arg === "--help") {
      help = true
    } else if (arg === "-o" || arg === "--out") {
      out = valueOf(arg, i)
      i++
    } else if (arg === "--layout") {
      const layout = valueOf(arg, i)
      if (!isLayoutOption(layout)) {
        throw new Error(`parseCliArgs: --layout must be auto, one or two, got "${layout}"`)
      }
      options.layout = layout
      i++
    } else if (arg === "--x-threshold") {
      options.xThreshold = toNumber(arg, valueOf(arg, i))
      i++
    } else if (arg === "--force-ocr") {
      options.forceOcr = true
    } else if (arg === "--no-ocr-fallback") {
      options.ocrFallback = false
    } else if (arg === "--tesseract-cmd") {
      options.tesseractCmd = valueOf(arg, i)
      i++
    } else if (arg === "--poppler-path") {
      options.popplerPath = valueOf(arg, i)
      i++
    } else if (arg === "--ocr-dpi") {
      options.ocrDpi = toNumber(arg, valueOf(arg, i))
      i++
    } else if (arg === "--ocr-lang") {
      options.ocrLanguage = valueOf(arg, i)
      i++
    } else if (arg === "--y-tolerance") {
      options.yTolerance = toNumber(arg, valueOf(arg, i))
      i++
    } else if (arg === "--paragraph-factor") {
      options.paragraphFactor = toNumber(arg, valueOf(arg, i))
      i++
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new Error(`parseCliArgs: unknown option ${arg}`)
    } else if (pdf === undefined) {
      pdf = arg
    } else {
      throw new Error(`parseCliArgs: unexpected argument ${arg}`)
    }
  }

  if (options.tesseractCmd === undefined && env.TESSERACT_CMD) {
    options.tesseractCmd = env.TESSERACT_CMD
  }
  if (options.popplerPath === undefined && env.POPPLER_PATH) {
    options.popplerPath = env.POPPLER_PATH
  }

  if (pdf === undefined) {
    if (help) return { pdf: "", out, help, options }
    throw new Error("parseCliArgs: missing input PDF")
  }
  return { pdf, out, help, options }
}

/** Runs the command and resolves with the process exit code. */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  processor: CliProcessor = processDocument
): Promise<number> {
  let args: CliArgs
  try {
    args = parseCliArgs(argv, env)
  } catch (error) {
    console.error(`[cli] ${error instanceof Error ? error.message : String(error)}`)
    console.error(USAGE)
    return 1
  }

  if (args.help) {
    console.log(USAGE)
    return 0
  }

  try {
    const pdfBuffer = await readFile(args.pdf)
    const result = await processor(pdfBuffer, args.options)
    await writeRecords(result.records, args.out)
    console.log(`Wrote ${result.records.length} rows to ${args.out}`)
    return 0
  } catch (error) {
    console.error(`[cli] ${error instanceof Error ? error.message : String(error)}`)
    return 1
  }
}

const entry = process.argv[1]
if (entry && import.meta.url === pathToFileURL(entry).href) {
  void main(process.argv.slice(2)).then((code) => {
    process.exitCode = code
  })
}
