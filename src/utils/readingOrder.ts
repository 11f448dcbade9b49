import type { Token } from "../../core/types"

/**
 * Returns a copy of the tokens ordered top-to-bottom, then left-to-right.
 */
export function sortByReadingOrder(tokens: readonly Token[]): Token[] {
  return [...tokens].sort((a, b) => a.top - b.top || a.x0 - b.x0)
}

export function midpoint(y0: number, y1: number): number {
  return (y0 + y1) / 2
}
