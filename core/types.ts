/**
 * A positioned text unit read from one page.
 * Coordinates are in PDF points with the origin at the top-left of the page.
 */
export interface Token {
  text: string
  x0: number
  top: number
  bold?: boolean // Only the text layer knows font weight
}

// "char" streams come from the text layer (with font weight),
// "word" streams from the text layer or OCR (without it)
export type TokenGranularity = "char" | "word"

export interface PageTokens {
  pageNumber: number // 1-based
  granularity: TokenGranularity
  tokens: Token[]
}

/**
 * Page-by-page access to a document's tokens. Implemented by the PDF text
 * layer and by the OCR pipeline.
 */
export interface PageTokenSource {
  readonly pageCount: number
  readPage(pageNumber: number, granularity: TokenGranularity): Promise<PageTokens>
  close(): Promise<void>
}

export interface Line {
  text: string
  y0: number // smallest token top
  y1: number // largest token top
  bold: boolean
}

export interface Paragraph {
  lines: string[]
  y0: number
  y1: number
}

export interface Header {
  name: string
  midY: number
}

export interface RosterRecord {
  Delegation: string
  Honorific: string
  PersonName: string
  Affiliation: string
}

export const RECORD_COLUMNS = ["Delegation", "Honorific", "PersonName", "Affiliation"] as const

export type LayoutMode = "one" | "two"

export type LayoutOption = "auto" | LayoutMode
