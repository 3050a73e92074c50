import { describe, expect, it } from "vitest";
import { COURSES } from "./constants";
import { exportScheduleCsv } from "./exportCsv";
import { collectEnrollments, planSchedule, resizeSelections, toggleSelection } from "./planner";
import { validateSchedule } from "./validator";

describe("schedule planner", () => {
  it("records non-empty selections and turns away empty ones", () => {
    const { enrollments, errors } = collectEnrollments([["Math", "Science"], [], ["Art", "Art"]]);

    expect(enrollments).toEqual({ "Student 1": ["Math", "Science"], "Student 3": ["Art"] });
    expect(errors).toEqual(["Student 2: Please select at least one course."]);
  });

  it("puts every course on one day when nobody has enrolled", () => {
    const plan = planSchedule(COURSES, {});

    expect(plan.dayCount).toBe(1);
    expect(plan.grid.columns).toEqual(["Day 1"]);
    expect(plan.grid.rows.map((row) => row[0])).toEqual(COURSES);
  });

  it("needs four days for a four-course student and exports the clean grid", () => {
    const enrollments = { "Student 1": ["Math", "Science", "History", "English"] };
    const plan = planSchedule(COURSES, enrollments);

    expect(plan.graph.size).toBe(6);
    expect(plan.dayCount).toBe(4);
    expect(plan.grid.columns).toEqual(["Day 1", "Day 2", "Day 3", "Day 4"]);
    expect(plan.grid.rows).toHaveLength(18);
    expect(plan.grid.rows[0]).toEqual(["Math", "Science", "History", "English"]);
    expect(plan.grid.rows[1]).toEqual(["Art", "", "", ""]);

    const csv = exportScheduleCsv(plan.grid, validateSchedule(plan.grid, enrollments));
    expect(csv?.startsWith("Day 1,Day 2,Day 3,Day 4\nMath,Science,History,English\nArt,,,\n")).toBe(true);
  });

  it("resizes selections, keeping existing picks", () => {
    expect(resizeSelections([["Math"], ["Art"]], 3)).toEqual([["Math"], ["Art"], []]);
    expect(resizeSelections([["Math"], ["Art"]], 1)).toEqual([["Math"]]);
  });

  it("toggles a course for one student", () => {
    const selections = [["Math"], ["Art"]];
    expect(toggleSelection(selections, 0, "Science")).toEqual([["Math", "Science"], ["Art"]]);
    expect(toggleSelection(selections, 1, "Art")).toEqual([["Math"], []]);
  });
});
