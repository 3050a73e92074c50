import { describe, expect, it } from "vitest";
import { exportScheduleCsv, gridToCsv } from "./exportCsv";
import type { ScheduleGrid } from "./types";

const grid: ScheduleGrid = {
  columns: ["Day 1", "Day 2"],
  rows: [
    ["Math", "Science"],
    ["History", ""],
  ],
};

describe("schedule export", () => {
  it("writes one line per row under the day labels", () => {
    expect(gridToCsv(grid)).toBe("Day 1,Day 2\nMath,Science\nHistory,\n");
  });

  it("pads ragged rows to the column count", () => {
    expect(gridToCsv({ columns: ["Day 1", "Day 2"], rows: [["Math"]] })).toBe("Day 1,Day 2\nMath,\n");
  });

  it("quotes cells containing separators or quotes", () => {
    expect(gridToCsv({ columns: ["Day 1"], rows: [["Art, Modern"], ['The "Best" Course']] })).toBe(
      'Day 1\n"Art, Modern"\n"The ""Best"" Course"\n'
    );
  });

  it("produces nothing before validation", () => {
    expect(exportScheduleCsv(grid, null)).toBeNull();
  });

  it("produces nothing while violations remain", () => {
    expect(exportScheduleCsv(grid, { multiDay: { Math: [1, 2] }, studentConflicts: {} })).toBeNull();
    expect(exportScheduleCsv(grid, { multiDay: {}, studentConflicts: { "Student 1": { 1: ["Math", "History"] } } })).toBeNull();
  });

  it("exports a clean schedule", () => {
    expect(exportScheduleCsv(grid, { multiDay: {}, studentConflicts: {} })).toBe("Day 1,Day 2\nMath,Science\nHistory,\n");
  });
});
