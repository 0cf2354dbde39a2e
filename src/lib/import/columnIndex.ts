import type { ColumnIndex } from "./types";

// Built once per table; the first header wins when names repeat.
export const buildColumnIndex = (headers: string[]): ColumnIndex => {
  const positions = new Map<string, number>();
  headers.forEach((header, index) => {
    if (!positions.has(header)) {
      positions.set(header, index);
    }
  });

  const indexOf = (name: string | null | undefined): number | null => {
    if (name === null || name === undefined) {
      return null;
    }
    return positions.get(name) ?? null;
  };

  return {
    headers,
    indexOf,
    cell: (row, name) => {
      const index = indexOf(name);
      return index === null ? "" : cellAt(row, index);
    }
  };
};

export const cellAt = (row: string[], index: number): string => row[index] ?? "";
