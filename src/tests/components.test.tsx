import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";
import { ShotList } from "../components/shots/ShotList";
import { TargetPlot } from "../components/shots/TargetPlot";
import { FilterBar } from "../components/summary/FilterBar";
import { SummaryTable } from "../components/summary/SummaryTable";

const summary = {
  columns: ["Start NR", "count", "Decimal score_sum"],
  rows: [
    { "Start NR": "1", count: 2, "Decimal score_sum": 19.9 },
    { "Start NR": "2", count: 1, "Decimal score_sum": null }
  ]
};

const shots = [
  {
    index: 3,
    Time: "20.0",
    "Primary score": "8.25",
    "Secondary score": "",
    "Decimal score": 8.25,
    "Integer score": 8
  },
  {
    index: 0,
    Time: "12.5",
    "Primary score": "10.5",
    "Secondary score": "10",
    "Decimal score": 10.5,
    "Integer score": 10
  }
];

describe("SummaryTable", () => {
  it("renders one row per identifier and reports clicks", () => {
    const onSelectId = vi.fn();
    render(<SummaryTable table={summary} onSelectId={onSelectId} />);

    expect(screen.getAllByRole("row")).toHaveLength(3);
    fireEvent.click(screen.getByText("19.9"));
    expect(onSelectId).toHaveBeenCalledWith("1");
  });

  it("explains an empty summary", () => {
    render(<SummaryTable table={{ columns: summary.columns, rows: [] }} />);

    expect(screen.getByText("No rows match the current filters.")).toBeInTheDocument();
  });
});

describe("ShotList", () => {
  it("shows excluded shots unticked and toggles by row index", () => {
    const onToggleShot = vi.fn();
    render(
      <ShotList startNr="1" shots={shots} excludedIndices={[0]} onToggleShot={onToggleShot} />
    );

    expect(screen.getByRole("checkbox", { name: "Include shot at 20.0" })).toBeChecked();
    const excluded = screen.getByRole("checkbox", { name: "Include shot at 12.5" });
    expect(excluded).not.toBeChecked();

    fireEvent.click(excluded);
    expect(onToggleShot).toHaveBeenCalledWith(0);
  });

  it("explains an empty list", () => {
    render(<ShotList startNr="7" shots={[]} excludedIndices={[]} onToggleShot={vi.fn()} />);

    expect(screen.getByText("No shots for start number 7.")).toBeInTheDocument();
  });
});

describe("TargetPlot", () => {
  it("plots shots that have coordinates", () => {
    render(
      <TargetPlot
        shots={[
          { shot_num: 1, x: null, y: 1, decimal_score: 8 },
          { shot_num: 2, x: 1.2, y: -0.5, decimal_score: 10.5 }
        ]}
      />
    );

    expect(screen.getByRole("img", { name: "Target with 1 shots" })).toBeInTheDocument();
  });

  it("explains when nothing can be plotted", () => {
    render(<TargetPlot shots={[{ shot_num: 1, x: null, y: null, decimal_score: null }]} />);

    expect(screen.getByText("No hit coordinates for the included shots.")).toBeInTheDocument();
  });
});

describe("FilterBar", () => {
  it("keeps start numbers in list order when one is ticked", () => {
    const onStartNrsChange = vi.fn();
    render(
      <FilterBar
        relays={["1", "2"]}
        relay=""
        startNrs={["1", "2", "10"]}
        selectedStartNrs={["10"]}
        onRelayChange={vi.fn()}
        onStartNrsChange={onStartNrsChange}
      />
    );

    fireEvent.click(screen.getByRole("checkbox", { name: "1" }));
    expect(onStartNrsChange).toHaveBeenCalledWith(["1", "10"]);
  });

  it("reports relay changes", () => {
    const onRelayChange = vi.fn();
    render(
      <FilterBar
        relays={["1", "2"]}
        relay=""
        startNrs={[]}
        selectedStartNrs={[]}
        onRelayChange={onRelayChange}
        onStartNrsChange={vi.fn()}
      />
    );

    fireEvent.change(screen.getByRole("combobox"), { target: { value: "2" } });
    expect(onRelayChange).toHaveBeenCalledWith("2");
  });
});
