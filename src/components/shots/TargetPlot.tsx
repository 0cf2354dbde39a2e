import type { TargetShotPayload } from "../../types/scoreApi";

type TargetPlotProps = {
  shots: TargetShotPayload[];
  size?: number;
};

const RING_COUNT = 10;
const MIN_EXTENT = 1;

type PlottedShot = TargetShotPayload & { x: number; y: number };

const isPlottable = (shot: TargetShotPayload): shot is PlottedShot =>
  shot.x !== null && shot.y !== null;

export const TargetPlot = ({ shots, size = 320 }: TargetPlotProps) => {
  const plotted = shots.filter(isPlottable);
  if (plotted.length === 0) {
    return <p className="muted">No hit coordinates for the included shots.</p>;
  }

  // Scale so the widest hit sits inside the outer ring.
  const extent = Math.max(
    MIN_EXTENT,
    ...plotted.map((shot) => Math.max(Math.abs(shot.x), Math.abs(shot.y)))
  );
  const center = size / 2;
  const radius = size / 2 - 8;
  const scale = radius / (extent * 1.1);

  return (
    <svg
      className="target-plot"
      width={size}
      height={size}
      viewBox={`0 0 ${size} ${size}`}
      role="img"
      aria-label={`Target with ${plotted.length} shots`}
    >
      {Array.from({ length: RING_COUNT }, (_, ring) => (
        <circle
          key={`ring-${ring}`}
          cx={center}
          cy={center}
          r={(radius * (RING_COUNT - ring)) / RING_COUNT}
          className={ring >= RING_COUNT - 4 ? "ring ring-black" : "ring"}
        />
      ))}
      {plotted.map((shot) => (
        <g key={`shot-${shot.shot_num}`}>
          <circle
            className="shot"
            cx={center + shot.x * scale}
            cy={center - shot.y * scale}
            r={6}
          >
            <title>
              Shot {shot.shot_num}
              {shot.decimal_score === null ? "" : `: ${shot.decimal_score}`}
            </title>
          </circle>
          <text className="shot-label" x={center + shot.x * scale} y={center - shot.y * scale + 3}>
            {shot.shot_num}
          </text>
        </g>
      ))}
    </svg>
  );
};
