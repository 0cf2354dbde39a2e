import type { SummaryCell, SummaryTable as SummaryTableData } from "../../lib/scores/summarize";

type SummaryTableProps = {
  table: SummaryTableData;
  selectedId?: string | null;
  onSelectId?: (id: string) => void;
};

const formatCell = (cell: SummaryCell | undefined): string => {
  if (cell === null || cell === undefined) {
    return "";
  }
  return typeof cell === "number" ? cell.toString() : cell;
};

export const SummaryTable = ({ table, selectedId = null, onSelectId }: SummaryTableProps) => {
  if (table.rows.length === 0) {
    return <p className="muted">No rows match the current filters.</p>;
  }

  const idColumn = table.columns[0];

  return (
    <table className="summary-table">
      <thead>
        <tr>
          {table.columns.map((column) => (
            <th key={column}>{column}</th>
          ))}
        </tr>
      </thead>
      <tbody>
        {table.rows.map((row) => {
          const id = formatCell(row[idColumn]);
          return (
            <tr
              key={id}
              className={id === selectedId ? "selected" : ""}
              onClick={onSelectId ? () => onSelectId(id) : undefined}
            >
              {table.columns.map((column) => (
                <td key={`${id}-${column}`}>{formatCell(row[column])}</td>
              ))}
            </tr>
          );
        })}
      </tbody>
    </table>
  );
};
