import { hasViolations } from "./validator";
import type { ScheduleGrid, ViolationSet } from "./types";

export const EXPORT_FILE_NAME = "exam_schedule.csv";

function escapeCsv(value: string | null | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (value.includes(",") || value.includes("\"") || value.includes("\n")) {
    return `"${value.replaceAll("\"", "\"\"")}"`;
  }
  return value;
}

export function gridToCsv(grid: ScheduleGrid): string {
  const lines = [grid.columns.map(escapeCsv).join(",")];
  for (const row of grid.rows) {
    lines.push(grid.columns.map((_label, column) => escapeCsv(row[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

/** Returns null, producing nothing, unless the grid was validated clean. */
export function exportScheduleCsv(grid: ScheduleGrid, violations: ViolationSet | null): string | null {
  if (!violations || hasViolations(violations)) return null;
  return gridToCsv(grid);
}
