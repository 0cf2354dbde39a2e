import { normalizeHeader } from "../import/fieldNames";
import { cellAt } from "../import/columnIndex";
import { isNumericCell } from "./cells";

export const SAMPLE_ROW_LIMIT = 50;

const ID_ALIASES = ["startnumber", "startno", "id", "competitor", "shooter"];
const SCORE_ALIASES = ["decimalscore", "score", "decimal", "points", "innerten"];

export type ColumnRoles = {
  idColumn: string | null;
  scoreColumns: string[];
};

export type ColumnRoleHints = {
  idHint?: string | null;
  scoreHints?: string[] | null;
};

const resolveIdColumn = (
  headers: string[],
  normalized: string[],
  idHint: string | null | undefined
): string => {
  if (idHint) {
    const hint = normalizeHeader(idHint);
    const hinted = headers.findIndex(
      (header, index) =>
        normalized[index] === hint || idHint === header || idHint === String(index)
    );
    if (hinted !== -1) {
      return headers[hinted];
    }
  }
  const aliased = normalized.findIndex(
    (name) => ID_ALIASES.includes(name) || name.includes("start")
  );
  return headers[aliased === -1 ? 0 : aliased];
};

const sampleIsNumeric = (rows: string[][], columnIndex: number): boolean =>
  rows
    .slice(0, SAMPLE_ROW_LIMIT)
    .map((row) => cellAt(row, columnIndex))
    .filter((cell) => cell !== "")
    .every((cell) => isNumericCell(cell));

/**
 * Guesses which header identifies a competitor and which hold scores.
 * Hints win, then known names, then (for scores) a numeric sample.
 */
export const inferColumnRoles = (
  headers: string[],
  rows: string[][],
  hints: ColumnRoleHints = {}
): ColumnRoles => {
  if (headers.length === 0 || rows.length === 0) {
    return { idColumn: null, scoreColumns: [] };
  }

  const normalized = headers.map((header) => normalizeHeader(header));
  const idColumn = resolveIdColumn(headers, normalized, hints.idHint);
  const scoreHints = new Set((hints.scoreHints ?? []).map((hint) => normalizeHeader(hint)));

  const scoreColumns = headers.filter((header, index) => {
    if (header === idColumn) {
      return false;
    }
    const name = normalized[index];
    if (scoreHints.has(name)) {
      return true;
    }
    if (SCORE_ALIASES.includes(name) || name.includes("score") || name.includes("decimal")) {
      return true;
    }
    return sampleIsNumeric(rows, index);
  });

  return { idColumn, scoreColumns: Array.from(new Set(scoreColumns)) };
};

/** Ticked score columns in header order, once each, never the identifier. */
export const chosenScoreColumns = (
  headers: string[],
  idColumn: string,
  selected: string[]
): string[] =>
  Array.from(
    new Set(headers.filter((header) => header !== idColumn && selected.includes(header)))
  );
