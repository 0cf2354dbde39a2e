export type RawTable = {
  headers: string[];
  rows: string[][];
};

export type Delimiter = ";" | "," | "\t";

export type ParsedRows = {
  rows: string[][];
  delimiter: Delimiter;
};

export type ColumnIndex = {
  headers: string[];
  indexOf: (name: string | null | undefined) => number | null;
  cell: (row: string[], name: string | null | undefined) => string;
};
