import { dayCount, greedyColoring } from "./coloring";
import { buildConflictGraph } from "./graph";
import { toGrid } from "./schedule";
import type { Course, Enrollments, SchedulePlan } from "./types";

export type StudentSelections = Course[][];

export function studentName(index: number) {
  return `Student ${index + 1}`;
}

/**
 * Records each non-empty selection under its student's name. Empty selections
 * are turned away here with a message so they never reach the graph.
 */
export function collectEnrollments(selections: StudentSelections) {
  const enrollments: Enrollments = {};
  const errors: string[] = [];

  selections.forEach((selected, index) => {
    const name = studentName(index);
    if (selected.length === 0) {
      errors.push(`${name}: Please select at least one course.`);
      return;
    }
    enrollments[name] = Array.from(new Set(selected));
  });

  return { enrollments, errors };
}

export function resizeSelections(selections: StudentSelections, studentCount: number): StudentSelections {
  return Array.from({ length: studentCount }, (_, index) => [...(selections[index] || [])]);
}

export function toggleSelection(selections: StudentSelections, studentIndex: number, course: Course): StudentSelections {
  return selections.map((selected, index) => {
    if (index !== studentIndex) return selected;
    return selected.includes(course) ? selected.filter((entry) => entry !== course) : [...selected, course];
  });
}

export function planSchedule(catalog: readonly Course[], enrollments: Enrollments): SchedulePlan {
  const graph = buildConflictGraph(catalog, enrollments);
  const coloring = greedyColoring(graph);

  return {
    graph,
    coloring,
    dayCount: dayCount(coloring),
    grid: toGrid(coloring),
  };
}
