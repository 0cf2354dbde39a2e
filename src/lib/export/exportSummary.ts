import * as XLSX from "xlsx";
import type { SummaryTable } from "../scores/summarize";

export const SUMMARY_SHEET = "Summary";

export const buildSummaryWorkbook = (table: SummaryTable): XLSX.WorkBook => {
  const rows = [
    table.columns,
    ...table.rows.map((row) => table.columns.map((column) => row[column] ?? null))
  ];
  const sheet = XLSX.utils.aoa_to_sheet(rows);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, SUMMARY_SHEET);
  return workbook;
};

export const summaryToXlsx = (table: SummaryTable): ArrayBuffer =>
  XLSX.write(buildSummaryWorkbook(table), { type: "array", bookType: "xlsx" }) as ArrayBuffer;

export const summaryFileName = (sourceName: string | null): string => {
  const base = (sourceName ?? "scores").replace(/\.[^.]+$/, "") || "scores";
  return `${base}-summary.xlsx`;
};

export const downloadSummary = (table: SummaryTable, sourceName: string | null) => {
  const blob = new Blob([summaryToXlsx(table)], {
    type: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
  });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = summaryFileName(sourceName);
  link.click();
  URL.revokeObjectURL(url);
};
