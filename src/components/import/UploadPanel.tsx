import { useState, type ChangeEvent, type DragEvent } from "react";

type UploadPanelProps = {
  title: string;
  description: string;
  fileName: string | null;
  busy?: boolean;
  onFile: (file: File) => void;
};

export const UploadPanel = ({ title, description, fileName, busy = false, onFile }: UploadPanelProps) => {
  const [isDragging, setIsDragging] = useState(false);

  const handleChange = (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (file) {
      onFile(file);
    }
    event.target.value = "";
  };

  const handleDrop = (event: DragEvent<HTMLLabelElement>) => {
    event.preventDefault();
    setIsDragging(false);
    const file = event.dataTransfer.files[0];
    if (file) {
      onFile(file);
    }
  };

  return (
    <label
      className={`upload-panel ${isDragging ? "dragging" : ""}`}
      onDragOver={(event) => {
        event.preventDefault();
        setIsDragging(true);
      }}
      onDragLeave={() => setIsDragging(false)}
      onDrop={handleDrop}
    >
      <span className="eyebrow">{title}</span>
      <span className="meta">{description}</span>
      <input type="file" accept=".csv,.txt,text/csv" disabled={busy} onChange={handleChange} />
      <span className="pill">{busy ? "Reading…" : fileName ?? "No file loaded"}</span>
    </label>
  );
};
