import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it } from "vitest";
import App from "../App";

describe("App", () => {
  it("renders the header and the device upload step", () => {
    render(<App />);

    expect(screen.getByRole("heading", { name: "Range Score Summary" })).toBeInTheDocument();
    expect(screen.getByRole("heading", { name: "Load a shot log" })).toBeInTheDocument();
    expect(screen.getByRole("button", { name: /Device export/ })).toHaveAttribute(
      "aria-pressed",
      "true"
    );
  });

  it("switches to the header CSV mode", () => {
    render(<App />);

    fireEvent.click(screen.getByRole("button", { name: /CSV with header/ }));

    expect(screen.getByRole("heading", { name: "Summarize by competitor" })).toBeInTheDocument();
  });
});
