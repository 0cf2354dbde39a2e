import { cellAt } from "../import/columnIndex";
import { parseScoreCell } from "./cells";

export type ScorePair = {
  decimal: number | null;
  integer: number | null;
};

/** True when any readable cell of the column has a fractional part. */
export const columnHasDecimals = (rows: string[][], columnIndex: number): boolean =>
  rows.some((row) => {
    const value = parseScoreCell(cellAt(row, columnIndex));
    return value !== null && !Number.isInteger(value);
  });

/**
 * Rebuilds the (decimal, integer) pair from the two raw score slots.
 *
 * Decimal disciplines report the decimal score in the primary slot and the
 * ring value in the secondary one, which some targets leave at 0; the ring is
 * then taken from the decimal score. Integer disciplines swap the slots.
 */
export const deriveScorePair = (
  primary: number | null,
  secondary: number | null,
  primaryIsDecimal: boolean
): ScorePair => {
  if (primaryIsDecimal) {
    let integer: number | null = null;
    if (secondary !== null && secondary !== 0) {
      integer = Math.trunc(secondary);
    } else if (primary !== null) {
      integer = Math.floor(primary);
    }
    return { decimal: primary, integer };
  }
  return {
    integer: primary === null ? null : Math.trunc(primary),
    decimal: secondary
  };
};
