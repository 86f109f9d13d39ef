/** @vitest-environment jsdom */
import React from "react";
import { afterEach, describe, expect, it } from "vitest";
import { cleanup, render, screen } from "@testing-library/react";
import ClassStatsChart from "./ClassStatsChart";

afterEach(cleanup);

describe("ClassStatsChart", () => {
  it("renders rows by count with two-decimal percentages", () => {
    render(
      <ClassStatsChart
        stats={{
          traverse: { count: 2, percentage: 33.333 },
          bad_insulator: { count: 4, percentage: 66.667 },
        }}
      />
    );

    const rows = screen.getAllByTestId("class-row");
    expect(rows.map((r) => r.textContent)).toEqual(["Изолятор отсутствует4 · 66.67%", "Траверса2 · 33.33%"]);
  });

  it("shows a placeholder without objects", () => {
    render(<ClassStatsChart stats={{}} />);
    expect(screen.getByText("Объекты не обнаружены")).toBeTruthy();
    expect(screen.queryAllByTestId("class-row")).toHaveLength(0);
  });
});
