import { describe, expect, it } from "vitest";
import { parseScoreCell, roundTo } from "../lib/scores/cells";
import { columnHasDecimals, deriveScorePair } from "../lib/scores/deriveScores";

describe("score cells", () => {
  it("reads integers, reals and exponents", () => {
    expect(parseScoreCell(" 10 ")).toBe(10);
    expect(parseScoreCell("-3")).toBe(-3);
    expect(parseScoreCell("10.9")).toBe(10.9);
    expect(parseScoreCell(".5")).toBe(0.5);
    expect(parseScoreCell("1e1")).toBe(10);
  });

  it("treats anything else as absent", () => {
    expect(parseScoreCell("")).toBeNull();
    expect(parseScoreCell("10,9")).toBeNull();
    expect(parseScoreCell("x")).toBeNull();
    expect(parseScoreCell("inf")).toBeNull();
    expect(parseScoreCell(undefined)).toBeNull();
  });

  it("rounds to four places", () => {
    expect(roundTo(0.1 + 0.2)).toBe(0.3);
    expect(roundTo(9.87654)).toBe(9.8765);
  });
});

describe("score derivation", () => {
  it("detects a decimal primary column", () => {
    expect(columnHasDecimals([["10"], ["9.5"]], 0)).toBe(true);
    expect(columnHasDecimals([["10"], ["x"], ["9.0"]], 0)).toBe(false);
  });

  it("takes the ring from the secondary slot in decimal disciplines", () => {
    expect(deriveScorePair(5.5, 3, true)).toEqual({ decimal: 5.5, integer: 3 });
  });

  it("floors the decimal score when the secondary slot is zero or missing", () => {
    expect(deriveScorePair(5.5, 0, true)).toEqual({ decimal: 5.5, integer: 5 });
    expect(deriveScorePair(9.7, null, true)).toEqual({ decimal: 9.7, integer: 9 });
  });

  it("keeps missing values absent", () => {
    expect(deriveScorePair(null, null, true)).toEqual({ decimal: null, integer: null });
    expect(deriveScorePair(null, 7, true)).toEqual({ decimal: null, integer: 7 });
    expect(deriveScorePair(null, 2.25, false)).toEqual({ decimal: 2.25, integer: null });
  });

  it("swaps the slots in integer disciplines", () => {
    expect(deriveScorePair(8, 2.25, false)).toEqual({ decimal: 2.25, integer: 8 });
  });
});
