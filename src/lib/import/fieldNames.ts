import { parseDelimitedText, sanitizeText } from "./parseCsv";

export const START_NR = "Start NR";
export const PRIMARY_SCORE = "Primary score";
export const SECONDARY_SCORE = "Secondary score";
export const RELAY = "Relay";
export const TIME = "Time";

const FIELD_COLUMN_NAMES = ["field", "fields"];

const START_NR_ALIASES = ["startnr", "startnumber", "startno"];
const PRIMARY_SCORE_ALIASES = ["primaryscore", "decimalscore"];
const SECONDARY_SCORE_ALIASES = ["secondaryscore"];

export const normalizeHeader = (name: string | null | undefined): string =>
  (name ?? "").trim().toLowerCase().replace(/[\s_-]/g, "");

/**
 * Reads the canonical field order from the tab-separated reference list.
 * The name column is the header cell that reads "Field"/"Fields" (else the
 * first column); blank names are skipped without taking a position.
 */
export const parseFieldNames = (text: string): string[] => {
  const rows = parseDelimitedText(sanitizeText(text), "\t");
  if (rows.length === 0) {
    return [];
  }
  const headers = rows[0].map((header) => header.trim());
  const named = headers.findIndex((header) =>
    FIELD_COLUMN_NAMES.includes(normalizeHeader(header))
  );
  const fieldColumn = named === -1 ? 0 : named;

  return rows
    .slice(1)
    .map((row) => (row[fieldColumn] ?? "").trim())
    .filter((name) => name.length > 0);
};

export const headersFromFieldNames = (columnCount: number, fieldNames: string[]): string[] =>
  Array.from({ length: columnCount }, (_, index) => fieldNames[index] ?? `Column ${index + 1}`);

const findHeader = (
  headers: string[],
  predicate: (normalized: string) => boolean
): string | null => headers.find((header) => predicate(normalizeHeader(header))) ?? null;

/** Finds the header standing for one of the device's canonical fields. */
export const matchHeaderToField = (headers: string[], field: string): string | null => {
  const target = normalizeHeader(field);
  const exact = findHeader(headers, (normalized) => normalized === target);
  if (exact !== null) {
    return exact;
  }
  if (target === normalizeHeader(START_NR)) {
    return findHeader(headers, (normalized) => START_NR_ALIASES.includes(normalized));
  }
  if (target === normalizeHeader(PRIMARY_SCORE)) {
    return findHeader(
      headers,
      (normalized) =>
        PRIMARY_SCORE_ALIASES.includes(normalized) ||
        (normalized.includes("decimal") && normalized.includes("score"))
    );
  }
  if (target === normalizeHeader(SECONDARY_SCORE)) {
    return findHeader(headers, (normalized) => SECONDARY_SCORE_ALIASES.includes(normalized));
  }
  return null;
};

export type SuggestedColumns = {
  startNr: string | null;
  primaryScore: string | null;
  secondaryScore: string | null;
};

export const suggestColumns = (headers: string[]): SuggestedColumns => ({
  startNr: matchHeaderToField(headers, START_NR) ?? headers[0] ?? null,
  primaryScore: matchHeaderToField(headers, PRIMARY_SCORE),
  secondaryScore: matchHeaderToField(headers, SECONDARY_SCORE)
});

export const findTimeColumn = (headers: string[]): string =>
  headers.includes(TIME)
    ? TIME
    : headers.find((header) => header.toLowerCase().includes("time")) ?? TIME;
