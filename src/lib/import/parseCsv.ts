import type { Delimiter, ParsedRows, RawTable } from "./types";

export const DEFAULT_DELIMITER: Delimiter = ";";

export const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const firstLineOf = (text: string): string => {
  const newline = text.indexOf("\n");
  return newline === -1 ? text : text.slice(0, newline);
};

/**
 * Picks the field delimiter from the first line of an export.
 * Semicolon wins when the line has no comma; any comma means comma.
 */
export const detectDelimiter = (
  firstLine: string,
  fallback: Delimiter = DEFAULT_DELIMITER
): Delimiter => {
  if (firstLine.includes(";") && !firstLine.includes(",")) {
    return ";";
  }
  if (firstLine.includes(",")) {
    return ",";
  }
  return fallback;
};

const isBlankRow = (row: string[]): boolean => row.length === 1 && row[0] === "";

/**
 * Splits delimited text into rows. Quoted fields may hold the delimiter,
 * doubled quotes and line breaks. A quote only opens a quoted section at the
 * start of a field; elsewhere it is kept as text. Blank lines produce no row.
 */
export const parseDelimitedText = (text: string, delimiter: string): string[][] => {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = "";
  let inQuotes = false;
  let atFieldStart = true;

  const pushRow = () => {
    row.push(current);
    if (!isBlankRow(row)) {
      rows.push(row);
    }
    row = [];
    current = "";
    atFieldStart = true;
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === '"' && inQuotes) {
      if (text[index + 1] === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = false;
      }
      continue;
    }

    if (char === '"' && atFieldStart) {
      inQuotes = true;
      atFieldStart = false;
      continue;
    }

    if (char === delimiter && !inQuotes) {
      row.push(current);
      current = "";
      atFieldStart = true;
      continue;
    }

    if (char === "\n" && !inQuotes) {
      pushRow();
      continue;
    }

    current += char;
    atFieldStart = false;
  }

  if (current.length > 0 || row.length > 0) {
    pushRow();
  }
  return rows;
};

const prepare = (
  text: string,
  delimiter?: Delimiter
): { content: string; delimiter: Delimiter } | null => {
  const content = sanitizeText(text).trim();
  if (!content) {
    return null;
  }
  return { content, delimiter: delimiter ?? detectDelimiter(firstLineOf(content)) };
};

/** First row becomes the (trimmed) headers; data cells are left as read. */
export const parseCsvText = (text: string, delimiter?: Delimiter): RawTable => {
  const prepared = prepare(text, delimiter);
  if (!prepared) {
    return { headers: [], rows: [] };
  }
  const rows = parseDelimitedText(prepared.content, prepared.delimiter);
  if (rows.length === 0) {
    return { headers: [], rows: [] };
  }
  return {
    headers: rows[0].map((header) => header.trim()),
    rows: rows.slice(1)
  };
};

/** Device exports carry no header row: every row is data. */
export const parseHeaderlessCsvText = (text: string, delimiter?: Delimiter): ParsedRows => {
  const prepared = prepare(text, delimiter);
  if (!prepared) {
    return { rows: [], delimiter: delimiter ?? DEFAULT_DELIMITER };
  }
  return {
    rows: parseDelimitedText(prepared.content, prepared.delimiter),
    delimiter: prepared.delimiter
  };
};
