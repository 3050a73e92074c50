import { describe, expect, it } from "vitest";
import { describeMultiDay, describeStudentConflict, fillTemplate, formatDayLabel, getT, localizeStudentName } from "./i18n";

describe("i18n", () => {
  it("describes violations in English", () => {
    const t = getT("en");
    expect(describeMultiDay(t, "Math", [1, 2])).toBe("Math is scheduled on Day 1, Day 2");
    expect(describeStudentConflict(t, "Student 1", 1, ["Math", "Science"])).toBe("Student 1 has multiple exams on Day 1: Math, Science");
  });

  it("describes violations in Arabic", () => {
    expect(describeStudentConflict(getT("ar"), "Student 2", 3, ["Math", "Art"])).toBe("الطالب 2 لديه أكثر من اختبار في اليوم 3: Math، Art");
  });

  it("localises day labels and student names", () => {
    expect(formatDayLabel("ar", "Day 4")).toBe("اليوم 4");
    expect(formatDayLabel("en", "Monday")).toBe("Monday");
    expect(localizeStudentName("en", "Student 5")).toBe("Student 5");
  });

  it("leaves unknown placeholders in templates", () => {
    expect(fillTemplate("{a}-{b}", { a: 1 })).toBe("1-{b}");
  });
});
