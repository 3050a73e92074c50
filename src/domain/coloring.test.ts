import { describe, expect, it } from "vitest";
import { COURSES } from "./constants";
import { dayCount, greedyColoring, isProperColoring, largestEnrollment } from "./coloring";
import { buildConflictGraph } from "./graph";
import type { Enrollments } from "./types";

function seededRandom(seed: number) {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return (state - 1) / 2147483646;
  };
}

function genEnrollments(seed: number, students: number): Enrollments {
  const r = seededRandom(seed);
  const enrollments: Enrollments = {};
  for (let s = 1; s <= students; s += 1) {
    const pool = [...COURSES];
    const picked: string[] = [];
    const count = 2 + Math.floor(r() * 4);
    for (let i = 0; i < count; i += 1) {
      picked.push(pool.splice(Math.floor(r() * pool.length), 1)[0]);
    }
    enrollments[`Student ${s}`] = picked;
  }
  return enrollments;
}

describe("greedy colouring", () => {
  it("needs three days for three courses taken by one student", () => {
    const graph = buildConflictGraph(["Math", "Science", "History"], { "Student 1": ["Math", "Science", "History"] });
    const coloring = greedyColoring(graph);

    expect(coloring).toEqual({ Math: 0, Science: 1, History: 2 });
    expect(dayCount(coloring)).toBe(3);
  });

  it("reuses a day across disjoint pairs", () => {
    const graph = buildConflictGraph(["Math", "Science", "History", "Art"], {
      "Student 1": ["Math", "Science"],
      "Student 2": ["History", "Art"],
    });
    const coloring = greedyColoring(graph);

    expect(coloring).toEqual({ Math: 0, Science: 1, History: 0, Art: 1 });
    expect(dayCount(coloring)).toBe(2);
  });

  it("colours the highest-degree course first", () => {
    const graph = buildConflictGraph(["Math", "Science", "History", "Art"], {
      "Student 1": ["Art", "Math"],
      "Student 2": ["Art", "Science"],
      "Student 3": ["Art", "History"],
    });

    expect(greedyColoring(graph)).toEqual({ Math: 1, Science: 1, History: 1, Art: 0 });
  });

  it("puts isolated courses on the first day", () => {
    const graph = buildConflictGraph(["Math", "Science", "Music"], { "Student 1": ["Math", "Science"] });
    expect(greedyColoring(graph).Music).toBe(0);
  });

  it("treats an empty catalog as zero days", () => {
    const coloring = greedyColoring(buildConflictGraph([], {}));
    expect(coloring).toEqual({});
    expect(dayCount(coloring)).toBe(0);
  });

  it("stays proper and at least as large as the biggest enrollment", () => {
    for (const seed of [7, 42, 1234]) {
      const enrollments = genEnrollments(seed, 12);
      const graph = buildConflictGraph(COURSES, enrollments);
      const coloring = greedyColoring(graph);

      expect(isProperColoring(graph, coloring)).toBe(true);
      expect(dayCount(coloring)).toBeGreaterThanOrEqual(largestEnrollment(enrollments));
      expect(Object.keys(coloring)).toHaveLength(COURSES.length);
    }
  });

  it("gives the same result on repeated runs", () => {
    const enrollments = genEnrollments(99, 8);
    const first = greedyColoring(buildConflictGraph(COURSES, enrollments));
    const second = greedyColoring(buildConflictGraph(COURSES, enrollments));
    expect(second).toEqual(first);
  });

  it("detects an improper colouring", () => {
    const graph = buildConflictGraph(["Math", "Science"], { "Student 1": ["Math", "Science"] });
    expect(isProperColoring(graph, { Math: 0, Science: 0 })).toBe(false);
  });

  it("counts distinct courses per student", () => {
    expect(largestEnrollment({ "Student 1": ["Math", "Math"], "Student 2": ["Art", "Music", "Dance"] })).toBe(3);
    expect(largestEnrollment({})).toBe(0);
  });
});
