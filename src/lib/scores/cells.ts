const integerPattern = /^[+-]?\d+$/;
const decimalPattern = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Reads a score cell. Literals with a decimal point or exponent are read as
 * reals, the rest as integers; anything else is absent (null).
 */
export const parseScoreCell = (value: string | null | undefined): number | null => {
  const trimmed = (value ?? "").trim();
  if (!trimmed) {
    return null;
  }
  const pattern = /[.eE]/.test(trimmed) ? decimalPattern : integerPattern;
  if (!pattern.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};

export const isNumericCell = (value: string | null | undefined): boolean =>
  parseScoreCell(value) !== null;

export const roundTo = (value: number, digits = 4): number => Number(value.toFixed(digits));

export const roundOrNull = (value: number | null, digits = 4): number | null =>
  value === null ? null : roundTo(value, digits);
