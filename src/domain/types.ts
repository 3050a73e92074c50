import type { UndirectedGraph } from "graphology";

export type Lang = "en" | "ar";

export type Course = string;
export type StudentName = string;

export type Enrollments = Record<StudentName, Course[]>;

export type ConflictGraph = UndirectedGraph;

// Course -> zero-based day index.
export type Coloring = Record<Course, number>;

export interface ScheduleGrid {
  columns: string[];
  rows: string[][];
}

// Course -> zero-based day index of every cell the course occupies.
export type CourseDays = Map<Course, number[]>;

export interface ViolationSet {
  /** Course -> day numbers (as labelled, "Day 2" -> 2) it was found under. */
  multiDay: Record<Course, number[]>;
  /** Student -> day number -> the student's courses sitting on that day. */
  studentConflicts: Record<StudentName, Record<number, Course[]>>;
}

export interface SchedulePlan {
  graph: ConflictGraph;
  coloring: Coloring;
  dayCount: number;
  grid: ScheduleGrid;
}

export interface Translations {
  [key: string]: string;
}
