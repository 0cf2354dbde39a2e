import { useEffect, useMemo, useState } from "react";
import "./App.css";
import { HeaderCsvPanel } from "./components/import/HeaderCsvPanel";
import { UploadPanel } from "./components/import/UploadPanel";
import { ShotList } from "./components/shots/ShotList";
import { TargetPlot } from "./components/shots/TargetPlot";
import { FilterBar } from "./components/summary/FilterBar";
import { SummaryTable } from "./components/summary/SummaryTable";
import { requestShots, requestSummary, requestTargetData, uploadExport } from "./lib/api";
import { downloadSummary } from "./lib/export/exportSummary";
import type { SummaryTable as SummaryTableData } from "./lib/scores/summarize";
import type { ShotPayload, TargetShotPayload, UploadResult } from "./types/scoreApi";

type Mode = "device" | "header";

const modes: { id: Mode; label: string; description: string }[] = [
  { id: "device", label: "Device export", description: "Headerless shot log" },
  { id: "header", label: "CSV with header", description: "Any table with named columns" }
];

const errorMessage = (error: unknown, fallback: string): string =>
  error instanceof Error ? error.message : fallback;

function App() {
  const [mode, setMode] = useState<Mode>("device");
  const [upload, setUpload] = useState<UploadResult | null>(null);
  const [fileName, setFileName] = useState<string | null>(null);
  const [isUploading, setIsUploading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [relay, setRelay] = useState("");
  const [selectedStartNrs, setSelectedStartNrs] = useState<string[]>([]);
  const [excludedIndices, setExcludedIndices] = useState<number[]>([]);
  const [summary, setSummary] = useState<SummaryTableData | null>(null);
  const [activeStartNr, setActiveStartNr] = useState<string | null>(null);
  const [shots, setShots] = useState<ShotPayload[]>([]);
  const [targetShots, setTargetShots] = useState<TargetShotPayload[]>([]);
  const [targetError, setTargetError] = useState<string | null>(null);

  const filters = useMemo(
    () => ({ relay: relay || null, start_nrs: selectedStartNrs }),
    [relay, selectedStartNrs]
  );

  useEffect(() => {
    if (!upload) {
      return;
    }
    let cancelled = false;
    requestSummary({ ...filters, excluded_indices: excludedIndices })
      .then((result) => {
        if (!cancelled) {
          setSummary({ columns: result.columns, rows: result.summary });
          setError(null);
        }
      })
      .catch((caught: unknown) => {
        if (!cancelled) {
          setSummary(null);
          setError(errorMessage(caught, "Summary failed."));
        }
      });
    return () => {
      cancelled = true;
    };
  }, [upload, filters, excludedIndices]);

  useEffect(() => {
    if (!upload || !activeStartNr) {
      setShots([]);
      return;
    }
    let cancelled = false;
    requestShots({ ...filters, start_nr: activeStartNr })
      .then((result) => {
        if (!cancelled) {
          setShots(result.shots);
        }
      })
      .catch((caught: unknown) => {
        if (!cancelled) {
          setShots([]);
          setError(errorMessage(caught, "Could not load shots."));
        }
      });
    return () => {
      cancelled = true;
    };
  }, [upload, filters, activeStartNr]);

  useEffect(() => {
    if (!upload || !activeStartNr) {
      setTargetShots([]);
      return;
    }
    let cancelled = false;
    requestTargetData({ ...filters, excluded_indices: excludedIndices, start_nr: activeStartNr })
      .then((result) => {
        if (!cancelled) {
          setTargetShots(result.shots);
          setTargetError(null);
        }
      })
      .catch((caught: unknown) => {
        if (!cancelled) {
          setTargetShots([]);
          setTargetError(errorMessage(caught, "Could not load target data."));
        }
      });
    return () => {
      cancelled = true;
    };
  }, [upload, filters, excludedIndices, activeStartNr]);

  const handleFileUpload = async (file: File) => {
    setIsUploading(true);
    setError(null);
    setFileName(file.name);
    setSummary(null);
    setActiveStartNr(null);
    setExcludedIndices([]);
    try {
      const result = await uploadExport(file);
      setUpload(result);
      setRelay("");
      setSelectedStartNrs(result.start_nrs);
    } catch (caught) {
      setUpload(null);
      setError(errorMessage(caught, "Upload failed."));
    } finally {
      setIsUploading(false);
    }
  };

  // Exclusions are positions within the filtered rows, so they reset with the filters.
  const handleRelayChange = (next: string) => {
    setRelay(next);
    setExcludedIndices([]);
  };

  const handleStartNrsChange = (next: string[]) => {
    setSelectedStartNrs(next);
    setExcludedIndices([]);
    if (activeStartNr && !next.includes(activeStartNr)) {
      setActiveStartNr(null);
    }
  };

  const toggleShot = (index: number) => {
    setExcludedIndices((prev) =>
      prev.includes(index) ? prev.filter((item) => item !== index) : [...prev, index]
    );
  };

  const renderDeviceMode = () => (
    <div className="content-stack">
      <section className="panel">
        <header className="panel-header">
          <div>
            <p className="eyebrow">Device export</p>
            <h2>Load a shot log</h2>
            <p className="muted">
              Columns are named from the field list; the start number and score columns are
              picked automatically.
            </p>
          </div>
          {upload && (
            <div className="header-chips">
              <span className="pill">{upload.row_count} rows</span>
              <span className="pill">Delimiter {upload.delimiter}</span>
            </div>
          )}
        </header>
        <UploadPanel
          title="Choose an export file"
          description="Semicolon or comma separated, no header row."
          fileName={fileName}
          busy={isUploading}
          onFile={(file) => {
            void handleFileUpload(file);
          }}
        />
        {error && <div className="callout error-callout">{error}</div>}
      </section>

      {upload && (
        <section className="panel">
          <header className="panel-header">
            <div>
              <p className="eyebrow">Summary</p>
              <h2>Totals per start number</h2>
            </div>
            {summary && summary.rows.length > 0 && (
              <button type="button" onClick={() => downloadSummary(summary, fileName)}>
                Export to Excel
              </button>
            )}
          </header>
          <FilterBar
            relays={upload.relays}
            relay={relay}
            startNrs={upload.start_nrs}
            selectedStartNrs={selectedStartNrs}
            onRelayChange={handleRelayChange}
            onStartNrsChange={handleStartNrsChange}
          />
          {summary && (
            <SummaryTable
              table={summary}
              selectedId={activeStartNr}
              onSelectId={setActiveStartNr}
            />
          )}
        </section>
      )}

      {upload && activeStartNr && (
        <section className="panel shots-panel">
          <header className="panel-header">
            <div>
              <p className="eyebrow">Start number {activeStartNr}</p>
              <h2>Shots</h2>
            </div>
          </header>
          <div className="shots-grid">
            <ShotList
              startNr={activeStartNr}
              shots={shots}
              excludedIndices={excludedIndices}
              onToggleShot={toggleShot}
            />
            {targetError ? (
              <p className="muted">{targetError}</p>
            ) : (
              <TargetPlot shots={targetShots} />
            )}
          </div>
        </section>
      )}
    </div>
  );

  return (
    <div className="app-shell">
      <header className="top-header">
        <div className="header-container">
          <div className="brand">
            <h1>Range Score Summary</h1>
            <p className="muted small">Per-competitor totals from shooting range exports</p>
          </div>
          <nav className="mode-tabs">
            {modes.map((item) => (
              <button
                key={item.id}
                type="button"
                className={`mode-tab ${item.id === mode ? "active" : ""}`}
                aria-pressed={item.id === mode}
                onClick={() => setMode(item.id)}
              >
                <span className="label">{item.label}</span>
                <span className="muted small">{item.description}</span>
              </button>
            ))}
          </nav>
        </div>
      </header>
      <main className="main-container">
        {mode === "device" ? renderDeviceMode() : <HeaderCsvPanel />}
      </main>
    </div>
  );
}

export default App;
