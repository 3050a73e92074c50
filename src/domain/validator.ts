import { cloneGrid, fromGrid, gridsEqual } from "./schedule";
import type { Course, Enrollments, ScheduleGrid, StudentName, ViolationSet } from "./types";

/** A validation together with the grid and enrollments it was computed from. */
export interface ValidationSnapshot {
  grid: ScheduleGrid;
  enrollments: Enrollments;
  violations: ViolationSet;
}

/**
 * Recomputes every violation of the grid against the enrollments. Throws
 * FormatError (from fromGrid) before looking at any cell when a column label
 * is unusable. The grid is never modified.
 */
export function validateSchedule(grid: ScheduleGrid, enrollments: Enrollments): ViolationSet {
  const courseDays = fromGrid(grid);

  // Entries, not assignment: course text like "__proto__" must stay an own key.
  const multiDay: Array<[Course, number[]]> = [];
  for (const [course, days] of courseDays) {
    if (days.length > 1) multiDay.push([course, days.map((day) => day + 1)]);
  }

  const studentConflicts: Array<[StudentName, Record<number, Course[]>]> = [];
  for (const [student, enrolled] of Object.entries(enrollments)) {
    const courses = Array.from(new Set(enrolled));

    const byDay = new Map<number, Course[]>();
    for (const course of courses) {
      for (const day of new Set(courseDays.get(course) ?? [])) {
        const bucket = byDay.get(day);
        if (bucket) bucket.push(course);
        else byDay.set(day, [course]);
      }
    }

    const clashes = Array.from(byDay.entries())
      .filter(([, sameDay]) => sameDay.length > 1)
      .sort((a, b) => a[0] - b[0]);
    if (clashes.length === 0) continue;

    studentConflicts.push([student, Object.fromEntries(clashes.map(([day, sameDay]) => [day + 1, sameDay]))]);
  }

  return { multiDay: Object.fromEntries(multiDay), studentConflicts: Object.fromEntries(studentConflicts) };
}

export function hasViolations(violations: ViolationSet) {
  return Object.keys(violations.multiDay).length > 0 || Object.keys(violations.studentConflicts).length > 0;
}

/** Courses that take part in any violation, for highlighting grid cells. */
export function violatingCourses(violations: ViolationSet) {
  const courses = new Set<Course>(Object.keys(violations.multiDay));
  for (const perDay of Object.values(violations.studentConflicts)) {
    for (const sameDay of Object.values(perDay)) {
      for (const course of sameDay) courses.add(course);
    }
  }
  return courses;
}

export function enrollmentsEqual(a: Enrollments, b: Enrollments) {
  const students = Object.keys(a);
  if (students.length !== Object.keys(b).length) return false;

  return students.every((student) => {
    if (!Object.hasOwn(b, student)) return false;
    const left = a[student];
    const right = b[student];
    return left.length === right.length && left.every((course, index) => course === right[index]);
  });
}

export function snapshotValidation(grid: ScheduleGrid, enrollments: Enrollments): ValidationSnapshot {
  const violations = validateSchedule(grid, enrollments);
  const copied = Object.fromEntries(Object.entries(enrollments).map(([student, courses]) => [student, [...courses]]));
  return { grid: cloneGrid(grid), enrollments: copied, violations };
}

/** The snapshot's violations if it still describes this grid and these enrollments, otherwise null. */
export function currentViolations(snapshot: ValidationSnapshot | null, grid: ScheduleGrid, enrollments: Enrollments) {
  if (!snapshot) return null;
  if (!gridsEqual(snapshot.grid, grid) || !enrollmentsEqual(snapshot.enrollments, enrollments)) return null;
  return snapshot.violations;
}
