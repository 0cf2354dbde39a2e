import { useMemo, useState } from "react";
import { parseCsvText } from "../../lib/import/parseCsv";
import type { RawTable } from "../../lib/import/types";
import { chosenScoreColumns, inferColumnRoles } from "../../lib/scores/inferColumns";
import {
  summarizeById,
  toSummaryTable,
  type SummaryTable as SummaryTableData
} from "../../lib/scores/summarize";
import { downloadSummary } from "../../lib/export/exportSummary";
import { SummaryTable } from "../summary/SummaryTable";
import { UploadPanel } from "./UploadPanel";

type Selection = {
  idColumn: string | null;
  scoreColumns: string[];
};

const emptySelection: Selection = { idColumn: null, scoreColumns: [] };

/**
 * Summaries for exports that already carry a header row. Everything runs in
 * the browser; nothing is sent to the server.
 */
export const HeaderCsvPanel = () => {
  const [table, setTable] = useState<RawTable | null>(null);
  const [fileName, setFileName] = useState<string | null>(null);
  const [selection, setSelection] = useState<Selection>(emptySelection);
  const [error, setError] = useState<string | null>(null);
  const [summary, setSummary] = useState<SummaryTableData | null>(null);

  const handleFile = async (file: File) => {
    setError(null);
    setSummary(null);
    setFileName(file.name);
    try {
      const parsed = parseCsvText(await file.text());
      const roles = inferColumnRoles(parsed.headers, parsed.rows);
      setTable(parsed);
      setSelection(roles);
    } catch (caught) {
      setTable(null);
      setSelection(emptySelection);
      setError(caught instanceof Error ? caught.message : "Could not read file.");
    }
  };

  const candidateScores = useMemo(
    () => (table ? table.headers.filter((header) => header !== selection.idColumn) : []),
    [table, selection.idColumn]
  );

  const toggleScore = (header: string) => {
    setSelection((prev) => ({
      ...prev,
      scoreColumns: prev.scoreColumns.includes(header)
        ? prev.scoreColumns.filter((name) => name !== header)
        : [...prev.scoreColumns, header]
    }));
  };

  const handleSummarize = () => {
    if (!table || !selection.idColumn) {
      setError("Load a file with a header row first.");
      return;
    }
    const scoreColumns = chosenScoreColumns(
      table.headers,
      selection.idColumn,
      selection.scoreColumns
    );
    try {
      const records = summarizeById(table, selection.idColumn, scoreColumns);
      setSummary(toSummaryTable(records, scoreColumns));
      setError(null);
    } catch (caught) {
      setSummary(null);
      setError(caught instanceof Error ? caught.message : "Summary failed.");
    }
  };

  return (
    <section className="panel">
      <header className="panel-header">
        <div>
          <p className="eyebrow">CSV with header row</p>
          <h2>Summarize by competitor</h2>
        </div>
      </header>
      <UploadPanel
        title="Choose a CSV file"
        description="The first row must name the columns."
        fileName={fileName}
        onFile={(file) => {
          void handleFile(file);
        }}
      />
      {error && <div className="callout error-callout">{error}</div>}
      {table && (
        <div className="column-roles">
          <label>
            ID column
            <select
              value={selection.idColumn ?? ""}
              onChange={(event) =>
                setSelection((prev) => ({
                  idColumn: event.target.value,
                  scoreColumns: prev.scoreColumns.filter((name) => name !== event.target.value)
                }))
              }
            >
              {table.headers.map((header, index) => (
                <option key={`${index}-${header}`} value={header}>
                  {header}
                </option>
              ))}
            </select>
          </label>
          <fieldset>
            <legend>Score columns</legend>
            {candidateScores.map((header, index) => (
              <label key={`${index}-${header}`} className="checkbox">
                <input
                  type="checkbox"
                  checked={selection.scoreColumns.includes(header)}
                  onChange={() => toggleScore(header)}
                />
                {header}
              </label>
            ))}
          </fieldset>
          <div className="actions">
            <button type="button" className="primary" onClick={handleSummarize}>
              Summarize
            </button>
            {summary && (
              <button type="button" onClick={() => downloadSummary(summary, fileName)}>
                Export to Excel
              </button>
            )}
          </div>
        </div>
      )}
      {summary && <SummaryTable table={summary} />}
    </section>
  );
};
