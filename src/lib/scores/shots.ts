import { buildColumnIndex, cellAt } from "../import/columnIndex";
import { RELAY } from "../import/fieldNames";
import type { RawTable } from "../import/types";
import { parseScoreCell, roundOrNull } from "./cells";
import { createScorePairReader, type DeviceScoreColumns } from "./summarize";

export type RowFilters = {
  relay?: string | null;
  startNrs?: string[] | null;
  excludedIndices?: number[] | null;
};

export type ShotRecord = {
  index: number;
  time: string;
  primaryScore: string;
  secondaryScore: string;
  decimalScore: number | null;
  integerScore: number | null;
};

export type ShotColumns = DeviceScoreColumns & {
  timeColumn: string;
};

/**
 * Narrows the table to the rows the official is looking at. Exclusions are
 * positions in the sequence left after the relay and start number filters.
 */
export const filterRows = (table: RawTable, idColumn: string, filters: RowFilters): string[][] => {
  const columns = buildColumnIndex(table.headers);
  const relayIndex = columns.indexOf(RELAY);
  const idIndex = columns.indexOf(idColumn);
  let rows = table.rows;

  const relay = filters.relay;
  if (relay !== undefined && relay !== null && relay !== "" && relayIndex !== null) {
    rows = rows.filter((row) => cellAt(row, relayIndex).trim() === relay);
  }

  if (filters.startNrs !== undefined && filters.startNrs !== null && idIndex !== null) {
    const allowed = new Set(filters.startNrs.map(String));
    rows = allowed.size === 0 ? [] : rows.filter((row) => allowed.has(cellAt(row, idIndex).trim()));
  }

  const excluded = new Set(filters.excludedIndices ?? []);
  if (excluded.size > 0) {
    rows = rows.filter((_, index) => !excluded.has(index));
  }
  return rows;
};

type TimeKey = { kind: "number"; value: number } | { kind: "text"; value: string };

const timeKey = (time: string): TimeKey => {
  const value = parseScoreCell(time);
  return value === null ? { kind: "text", value: time } : { kind: "number", value };
};

/**
 * Newest first: numeric times descending, then non-numeric times in
 * descending lexical order. A numeric time always precedes a non-numeric one.
 */
export const compareShotTimes = (a: string, b: string): number => {
  const aKey = timeKey(a);
  const bKey = timeKey(b);
  if (aKey.kind === "number" && bKey.kind === "number") {
    return bKey.value - aKey.value;
  }
  if (aKey.kind === "text" && bKey.kind === "text") {
    if (aKey.value === bKey.value) {
      return 0;
    }
    return aKey.value < bKey.value ? 1 : -1;
  }
  return aKey.kind === "number" ? -1 : 1;
};

const rawScore = (cell: string): string => {
  const trimmed = cell.trim();
  return parseScoreCell(trimmed) === null ? "" : trimmed;
};

/** Every shot of one start number, newest first. `index` is the row's position in `rows`. */
export const selectShots = (
  headers: string[],
  rows: string[][],
  columns: ShotColumns,
  startNr: string
): ShotRecord[] => {
  const index = buildColumnIndex(headers);
  const { idIndex, readPair } = createScorePairReader({ headers, rows }, columns);
  const target = String(startNr).trim();

  const shots: ShotRecord[] = [];
  rows.forEach((row, rowIndex) => {
    if (cellAt(row, idIndex).trim() !== target) {
      return;
    }
    const pair = readPair(row);
    shots.push({
      index: rowIndex,
      time: index.cell(row, columns.timeColumn).trim(),
      primaryScore: rawScore(index.cell(row, columns.primaryColumn)),
      secondaryScore: rawScore(index.cell(row, columns.secondaryColumn)),
      decimalScore: roundOrNull(pair.decimal),
      integerScore: pair.integer
    });
  });

  return shots.sort((a, b) => compareShotTimes(a.time, b.time));
};
