import { buildColumnIndex, cellAt } from "../import/columnIndex";
import {
  RELAY,
  START_NR,
  findTimeColumn,
  headersFromFieldNames,
  suggestColumns
} from "../import/fieldNames";
import { parseHeaderlessCsvText } from "../import/parseCsv";
import type { Delimiter, RawTable } from "../import/types";
import { parseScoreCell } from "./cells";
import { ScoreDataError } from "./errors";
import { filterRows, selectShots, type RowFilters, type ShotRecord } from "./shots";
import {
  DECIMAL_SCORE,
  INTEGER_SCORE,
  summarizeDecimalInteger,
  toSummaryTable,
  uniqueValues,
  type DeviceScoreColumns,
  type SummaryTable
} from "./summarize";

export type DeviceUpload = {
  table: RawTable;
  delimiter: Delimiter;
  startNr: string;
  primaryScore: string | null;
  secondaryScore: string | null;
  relays: string[];
  startNrs: string[];
};

export type ShotsQuery = Omit<RowFilters, "excludedIndices"> & { startNr: string };

export type TargetQuery = RowFilters & { startNr: string };

export type TargetShot = {
  shotNum: number;
  x: number | null;
  y: number | null;
  decimalScore: number | null;
};

/**
 * Turns a headerless device export into a named table. Column names come
 * from the reference field list, positionally.
 */
export const prepareDeviceUpload = (text: string, fieldNames: string[]): DeviceUpload => {
  const { rows, delimiter } = parseHeaderlessCsvText(text);
  if (rows.length === 0) {
    throw new ScoreDataError("EMPTY_FILE", "File has no data rows");
  }
  const columnCount = rows.reduce((widest, row) => Math.max(widest, row.length), 0);
  if (columnCount === 0) {
    throw new ScoreDataError("NO_COLUMNS", "File has no columns");
  }
  if (fieldNames.length === 0) {
    throw new ScoreDataError(
      "MISSING_FIELD_LIST",
      "Field list not found or empty; cannot assign column names"
    );
  }

  const headers = headersFromFieldNames(columnCount, fieldNames);
  const suggested = suggestColumns(headers);
  const columns = buildColumnIndex(headers);
  const relayIndex = columns.indexOf(RELAY);
  const startNrIndex = columns.indexOf(suggested.startNr);

  return {
    table: { headers, rows },
    delimiter,
    startNr: suggested.startNr ?? headers[0],
    primaryScore: suggested.primaryScore,
    secondaryScore: suggested.secondaryScore,
    relays: relayIndex === null ? [] : uniqueValues(rows, relayIndex),
    startNrs: startNrIndex === null ? [] : uniqueValues(rows, startNrIndex)
  };
};

export const requireTable = (table: RawTable | null | undefined): RawTable => {
  if (!table || table.headers.length === 0 || table.rows.length === 0) {
    throw new ScoreDataError("NO_TABLE", "Upload a file first");
  }
  return table;
};

export const resolveDeviceColumns = (headers: string[]): DeviceScoreColumns => {
  const suggested = suggestColumns(headers);
  if (!suggested.primaryScore) {
    throw new ScoreDataError("MISSING_COLUMN", "No Primary score column in field list");
  }
  return {
    idColumn: suggested.startNr ?? headers[0],
    primaryColumn: suggested.primaryScore,
    secondaryColumn: suggested.secondaryScore
  };
};

const requireStartNr = (startNr: string): string => {
  if (!String(startNr).trim()) {
    throw new ScoreDataError("INVALID_REQUEST", "start_nr required");
  }
  return startNr;
};

export const runDeviceSummary = (table: RawTable, filters: RowFilters): SummaryTable => {
  const columns = resolveDeviceColumns(table.headers);
  const rows = filterRows(table, columns.idColumn, filters);
  const records = summarizeDecimalInteger({ headers: table.headers, rows }, columns);
  return toSummaryTable(records, [DECIMAL_SCORE, INTEGER_SCORE], START_NR);
};

export const runShots = (table: RawTable, query: ShotsQuery): ShotRecord[] => {
  const startNr = requireStartNr(query.startNr);
  const columns = resolveDeviceColumns(table.headers);
  const rows = filterRows(table, columns.idColumn, {
    relay: query.relay,
    startNrs: query.startNrs
  });
  return selectShots(
    table.headers,
    rows,
    { ...columns, timeColumn: findTimeColumn(table.headers) },
    startNr
  );
};

/** Included shots of one start number with their hit coordinates, for the target plot. */
export const runTargetData = (table: RawTable, query: TargetQuery): TargetShot[] => {
  const startNr = requireStartNr(query.startNr);
  const columns = resolveDeviceColumns(table.headers);
  const index = buildColumnIndex(table.headers);
  const xIndex = index.indexOf("X");
  const yIndex = index.indexOf("Y");
  if (xIndex === null || yIndex === null) {
    throw new ScoreDataError("MISSING_COLUMN", "X and Y columns required for target view");
  }

  const rows = filterRows(table, columns.idColumn, query);
  const shots = selectShots(
    table.headers,
    rows,
    { ...columns, timeColumn: findTimeColumn(table.headers) },
    startNr
  );

  return shots.map((shot, position) => {
    const row = rows[shot.index] ?? [];
    return {
      shotNum: position + 1,
      x: parseScoreCell(cellAt(row, xIndex)),
      y: parseScoreCell(cellAt(row, yIndex)),
      decimalScore: shot.decimalScore
    };
  });
};
