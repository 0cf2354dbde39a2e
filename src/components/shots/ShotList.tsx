import type { ShotPayload } from "../../types/scoreApi";

type ShotListProps = {
  startNr: string;
  shots: ShotPayload[];
  excludedIndices: number[];
  onToggleShot: (index: number) => void;
};

const formatScore = (value: number | null): string => (value === null ? "" : value.toString());

export const ShotList = ({ startNr, shots, excludedIndices, onToggleShot }: ShotListProps) => {
  if (shots.length === 0) {
    return <p className="muted">No shots for start number {startNr}.</p>;
  }

  return (
    <div className="shot-list">
      <p className="meta">
        {shots.length} shots for start number {startNr}, newest first. Untick a shot to leave it
        out of the summary.
      </p>
      <table>
        <thead>
          <tr>
            <th>Include</th>
            <th>Time</th>
            <th>Primary</th>
            <th>Secondary</th>
            <th>Decimal</th>
            <th>Integer</th>
          </tr>
        </thead>
        <tbody>
          {shots.map((shot) => {
            const included = !excludedIndices.includes(shot.index);
            return (
              <tr key={shot.index} className={included ? "" : "excluded"}>
                <td>
                  <input
                    type="checkbox"
                    aria-label={`Include shot at ${shot.Time || "unknown time"}`}
                    checked={included}
                    onChange={() => onToggleShot(shot.index)}
                  />
                </td>
                <td>{shot.Time}</td>
                <td>{shot["Primary score"]}</td>
                <td>{shot["Secondary score"]}</td>
                <td>{formatScore(shot["Decimal score"])}</td>
                <td>{formatScore(shot["Integer score"])}</td>
              </tr>
            );
          })}
        </tbody>
      </table>
    </div>
  );
};
