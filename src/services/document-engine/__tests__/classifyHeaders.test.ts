import { describe, expect, test } from "vitest";
import type { Header, Paragraph } from "../../../../core/types";
import {
  collectHeaders,
  headerName,
  isHeaderParagraph,
  isHeaderText,
  resolveDelegation,
} from "../05_classifyHeaders";

describe("isHeaderText", () => {
  test("accepts upper-case letters, spaces and slashes", () => {
    expect(isHeaderText("BAHAMAS")).toBe(true);
    expect(isHeaderText("SWITZERLAND / SUISSE / SUIZA")).toBe(true);
    expect(isHeaderText("  RÉPUBLIQUE TCHÈQUE  ")).toBe(true);
  });

  test("rejects mixed case, digits, punctuation and blank text", () => {
    expect(isHeaderText("Mr. John Smith")).toBe(false);
    expect(isHeaderText("ANNEX 2")).toBe(false);
    expect(isHeaderText("GUINEA-BISSAU")).toBe(false);
    expect(isHeaderText("   ")).toBe(false);
    expect(isHeaderText("")).toBe(false);
  });
});

describe("headerName", () => {
  test("keeps the part before the first slash", () => {
    expect(headerName("SWITZERLAND / SUISSE / SUIZA")).toBe("SWITZERLAND");
    expect(headerName("  KENYA ")).toBe("KENYA");
  });
});

describe("isHeaderParagraph", () => {
  test("a lone header-shaped line is a header", () => {
    expect(isHeaderParagraph({ lines: ["SWITZERLAND / SUISSE / SUIZA"], y0: 0, y1: 0 })).toBe(true);
  });

  test("multi-line paragraphs never are, even in capitals", () => {
    expect(isHeaderParagraph({ lines: ["UNITED NATIONS", "ENVIRONMENT PROGRAMME"], y0: 0, y1: 12 })).toBe(false);
  });
});

describe("collectHeaders", () => {
  test("keeps header paragraphs only, sorted by midpoint", () => {
    const paragraphs: Paragraph[] = [
      { lines: ["URUGUAY"], y0: 300, y1: 300 },
      { lines: ["Ms. Ana Ruiz", "Ministry of Environment"], y0: 40, y1: 52 },
      { lines: ["ARGENTINA / ARGENTINE"], y0: 10, y1: 12 },
      { lines: ["ALPHA", "BETA"], y0: 100, y1: 112 },
    ];

    expect(collectHeaders(paragraphs)).toEqual([
      { name: "ARGENTINA", midY: 11 },
      { name: "URUGUAY", midY: 300 },
    ]);
  });
});

describe("resolveDelegation", () => {
  const headers: Header[] = [
    { name: "ARGENTINA", midY: 10 },
    { name: "BRAZIL", midY: 100 },
  ];

  test("takes the last header at or above the block", () => {
    expect(resolveDelegation(headers, 10)).toBe("ARGENTINA");
    expect(resolveDelegation(headers, 99)).toBe("ARGENTINA");
    expect(resolveDelegation(headers, 100)).toBe("BRAZIL");
    expect(resolveDelegation(headers, 500)).toBe("BRAZIL");
  });

  test("blocks above the first header get an empty delegation", () => {
    expect(resolveDelegation(headers, 5)).toBe("");
    expect(resolveDelegation([], 50)).toBe("");
  });
});
