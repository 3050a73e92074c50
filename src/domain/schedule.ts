import { DAY_LABEL_PREFIX } from "./constants";
import { FormatError } from "./errors";
import type { Coloring, Course, CourseDays, ScheduleGrid } from "./types";

const DAY_LABEL_PATTERN = new RegExp(`^${DAY_LABEL_PREFIX}\\s+(\\d+)$`, "i");

export function dayLabel(index: number) {
  return `${DAY_LABEL_PREFIX} ${index + 1}`;
}

export function parseDayLabel(label: string) {
  const match = DAY_LABEL_PATTERN.exec(label.trim());
  const day = match ? Number.parseInt(match[1], 10) : Number.NaN;
  if (!Number.isInteger(day) || day < 1) {
    throw new FormatError(`Column "${label}" is not a day label (expected "${DAY_LABEL_PREFIX} <n>").`, label);
  }
  return day - 1;
}

function isBlank(value: string | undefined) {
  return !value || value.trim() === "";
}

function cellAt(grid: ScheduleGrid, row: number, column: number) {
  return grid.rows[row]?.[column] ?? "";
}

export function toGrid(coloring: Coloring): ScheduleGrid {
  const byDay = new Map<number, Course[]>();
  for (const [course, day] of Object.entries(coloring)) {
    const bucket = byDay.get(day);
    if (bucket) bucket.push(course);
    else byDay.set(day, [course]);
  }

  const days = Array.from(byDay.keys()).sort((a, b) => a - b);
  const columns = days.map((day) => byDay.get(day) ?? []);
  const height = columns.reduce((max, column) => Math.max(max, column.length), 0);

  return {
    columns: days.map(dayLabel),
    rows: Array.from({ length: height }, (_, row) => columns.map((column) => column[row] ?? "")),
  };
}

export function fromGrid(grid: ScheduleGrid): CourseDays {
  const dayByColumn = grid.columns.map(parseDayLabel);

  const seen = new Map<number, string>();
  grid.columns.forEach((label, column) => {
    const day = dayByColumn[column];
    const previous = seen.get(day);
    if (previous !== undefined) {
      throw new FormatError(`Columns "${previous}" and "${label}" name the same day.`, label);
    }
    seen.set(day, label);
  });

  const courseDays: CourseDays = new Map();
  dayByColumn.forEach((day, column) => {
    for (let row = 0; row < grid.rows.length; row += 1) {
      const course = cellAt(grid, row, column);
      if (isBlank(course)) continue;
      const days = courseDays.get(course);
      if (days) days.push(day);
      else courseDays.set(course, [day]);
    }
  });

  return courseDays;
}

export function titleCase(text: string) {
  return text
    .trim()
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

export function cloneGrid(grid: ScheduleGrid): ScheduleGrid {
  return { columns: [...grid.columns], rows: grid.rows.map((row) => [...row]) };
}

/** Pads ragged rows and title-cases every filled cell. */
export function normalizeGrid(grid: ScheduleGrid): ScheduleGrid {
  return {
    columns: [...grid.columns],
    rows: grid.rows.map((_, row) =>
      grid.columns.map((_label, column) => {
        const value = cellAt(grid, row, column);
        return isBlank(value) ? "" : titleCase(value);
      })
    ),
  };
}

export function addGridRow(grid: ScheduleGrid): ScheduleGrid {
  const next = cloneGrid(grid);
  next.rows.push(grid.columns.map(() => ""));
  return next;
}

export function removeGridRow(grid: ScheduleGrid, rowIndex: number): ScheduleGrid {
  const next = cloneGrid(grid);
  if (rowIndex < 0 || rowIndex >= next.rows.length) return next;
  next.rows.splice(rowIndex, 1);
  return next;
}

export function setGridCell(grid: ScheduleGrid, rowIndex: number, columnIndex: number, value: string): ScheduleGrid {
  const next = cloneGrid(grid);
  if (columnIndex < 0 || columnIndex >= next.columns.length) return next;
  while (next.rows.length <= rowIndex) next.rows.push(next.columns.map(() => ""));
  for (const row of next.rows) {
    while (row.length < next.columns.length) row.push("");
  }
  next.rows[rowIndex][columnIndex] = value;
  return next;
}

export function gridsEqual(a: ScheduleGrid, b: ScheduleGrid) {
  if (a.columns.length !== b.columns.length || a.rows.length !== b.rows.length) return false;
  if (a.columns.some((label, index) => label !== b.columns[index])) return false;

  for (let row = 0; row < a.rows.length; row += 1) {
    for (let column = 0; column < a.columns.length; column += 1) {
      if (cellAt(a, row, column) !== cellAt(b, row, column)) return false;
    }
  }
  return true;
}
