import type { Token } from "../../../../core/types";

/** One token per character, 6pt apart. */
export function chars(text: string, x: number, top: number, isBold = false): Token[] {
  return text.split("").map((ch, i) => ({ text: ch, x0: x + i * 6, top, bold: isBold }));
}

/** One token per word, 30pt apart. */
export function words(text: string, x: number, top: number): Token[] {
  return text.split(" ").map((word, i) => ({ text: word, x0: x + i * 30, top }));
}

/** ARGENTINA across the top, two entries on the left and one on the right. */
export const twoColumnPage: Token[] = [
  ...words("ARGENTINA", 72, 10),
  ...words("Ms. Ana Ruiz", 72, 30),
  ...words("Ministry of Environment", 72, 42),
  ...words("Mr. Luis Paz", 72, 80),
  ...words("Forest Service", 72, 92),
  ...words("Dr. Rui Melo", 300, 34),
  ...words("Water Agency", 300, 46),
];
