import { buildColumnIndex, cellAt } from "../import/columnIndex";
import type { RawTable } from "../import/types";
import { parseScoreCell, roundTo } from "./cells";
import { columnHasDecimals, deriveScorePair, type ScorePair } from "./deriveScores";
import { ScoreDataError } from "./errors";

export const DECIMAL_SCORE = "Decimal score";
export const INTEGER_SCORE = "Integer score";

const IDENTIFIER_WIDTH = 10;

export type ScoreAggregate = {
  sum: number | null;
  mean: number | null;
};

export type SummaryRecord = {
  id: string;
  count: number;
  scores: Record<string, ScoreAggregate>;
};

export type SummaryCell = string | number | null;

export type SummaryTable = {
  columns: string[];
  rows: Record<string, SummaryCell>[];
};

type ScoreReader = {
  name: string;
  roundSum: boolean;
  read: (row: string[]) => number | null;
};

type Accumulator = {
  count: number;
  totals: Map<string, { sum: number; n: number }>;
};

const isDigits = (value: string): boolean => /^\d+$/.test(value);

/**
 * Numeric identifiers first in numeric order (zero-padded comparison),
 * then everything else lexically.
 */
export const compareIdentifiers = (a: string, b: string): number => {
  const aNumeric = isDigits(a);
  const bNumeric = isDigits(b);
  if (aNumeric !== bNumeric) {
    return aNumeric ? -1 : 1;
  }
  const aKey = aNumeric ? a.padStart(IDENTIFIER_WIDTH, "0") : a;
  const bKey = bNumeric ? b.padStart(IDENTIFIER_WIDTH, "0") : b;
  if (aKey === bKey) {
    return 0;
  }
  return aKey < bKey ? -1 : 1;
};

export const sortIdentifiers = (values: Iterable<string>): string[] =>
  Array.from(values).sort(compareIdentifiers);

export const uniqueValues = (rows: string[][], columnIndex: number): string[] => {
  const values = new Set<string>();
  rows.forEach((row) => {
    const value = cellAt(row, columnIndex).trim();
    if (value) {
      values.add(value);
    }
  });
  return sortIdentifiers(values);
};

const createAccumulator = (readers: ScoreReader[]): Accumulator => {
  const totals: Accumulator["totals"] = new Map();
  readers.forEach((reader) => totals.set(reader.name, { sum: 0, n: 0 }));
  return { count: 0, totals };
};

const aggregateRows = (
  rows: string[][],
  idIndex: number,
  readers: ScoreReader[]
): SummaryRecord[] => {
  const byId = new Map<string, Accumulator>();

  rows.forEach((row) => {
    const id = cellAt(row, idIndex).trim();
    if (!id) {
      return;
    }
    const entry = byId.get(id) ?? createAccumulator(readers);
    entry.count += 1;
    readers.forEach((reader) => {
      const value = reader.read(row);
      const total = entry.totals.get(reader.name);
      if (value !== null && total) {
        total.sum += value;
        total.n += 1;
      }
    });
    byId.set(id, entry);
  });

  const entries = Array.from(byId.entries()).sort(([a], [b]) => compareIdentifiers(a, b));
  return entries.map(([id, entry]) => {
    const scores: Record<string, ScoreAggregate> = {};
    readers.forEach((reader) => {
      const total = entry.totals.get(reader.name);
      if (!total || total.n === 0) {
        scores[reader.name] = { sum: null, mean: null };
        return;
      }
      scores[reader.name] = {
        sum: reader.roundSum ? roundTo(total.sum) : total.sum,
        mean: roundTo(total.sum / total.n)
      };
    });
    return { id, count: entry.count, scores };
  });
};

const requireColumn = (index: number | null, name: string, role: string): number => {
  if (index === null) {
    throw new ScoreDataError("MISSING_COLUMN", `${role} column "${name}" not found`);
  }
  return index;
};

/** Header-CSV path: groups by one column and sums the chosen score columns. */
export const summarizeById = (
  table: RawTable,
  idColumn: string,
  scoreColumns: string[]
): SummaryRecord[] => {
  const columns = buildColumnIndex(table.headers);
  const idIndex = requireColumn(columns.indexOf(idColumn), idColumn, "ID");
  const readers = Array.from(new Set(scoreColumns)).map<ScoreReader>((name) => {
    const index = requireColumn(columns.indexOf(name), name, "Score");
    return { name, roundSum: true, read: (row) => parseScoreCell(cellAt(row, index)) };
  });
  return aggregateRows(table.rows, idIndex, readers);
};

export type DeviceScoreColumns = {
  idColumn: string;
  primaryColumn: string;
  secondaryColumn: string | null;
};

export type ScorePairReader = (row: string[]) => ScorePair;

/**
 * Builds the per-row score pair reader. Whether the primary slot is decimal
 * is decided once over all given rows.
 */
export const createScorePairReader = (
  table: RawTable,
  columns: DeviceScoreColumns
): { idIndex: number; readPair: ScorePairReader } => {
  const index = buildColumnIndex(table.headers);
  const idIndex = requireColumn(index.indexOf(columns.idColumn), columns.idColumn, "ID");
  const primaryIndex = requireColumn(
    index.indexOf(columns.primaryColumn),
    columns.primaryColumn,
    "Primary score"
  );
  const secondaryIndex = index.indexOf(columns.secondaryColumn);
  const primaryIsDecimal = columnHasDecimals(table.rows, primaryIndex);

  return {
    idIndex,
    readPair: (row) =>
      deriveScorePair(
        parseScoreCell(cellAt(row, primaryIndex)),
        secondaryIndex === null ? null : parseScoreCell(cellAt(row, secondaryIndex)),
        primaryIsDecimal
      )
  };
};

/** Device path: groups by start number and sums the derived decimal and integer scores. */
export const summarizeDecimalInteger = (
  table: RawTable,
  columns: DeviceScoreColumns
): SummaryRecord[] => {
  const { idIndex, readPair } = createScorePairReader(table, columns);
  return aggregateRows(table.rows, idIndex, [
    { name: DECIMAL_SCORE, roundSum: true, read: (row) => readPair(row).decimal },
    { name: INTEGER_SCORE, roundSum: false, read: (row) => readPair(row).integer }
  ]);
};

export const toSummaryTable = (
  records: SummaryRecord[],
  scoreNames: string[],
  idLabel = "id"
): SummaryTable => {
  const names = Array.from(new Set(scoreNames));
  const columns = [idLabel, "count", ...names.flatMap((name) => [`${name}_sum`, `${name}_mean`])];
  const rows = records.map((record) => {
    const row: Record<string, SummaryCell> = { [idLabel]: record.id, count: record.count };
    names.forEach((name) => {
      const aggregate = record.scores[name] ?? { sum: null, mean: null };
      row[`${name}_sum`] = aggregate.sum;
      row[`${name}_mean`] = aggregate.mean;
    });
    return row;
  });
  return { columns, rows };
};
