import type { Course, StudentName } from "./types";

/** Enrollment data that must not reach graph construction. */
export class InputError extends Error {
  readonly student: StudentName;
  readonly course: Course | null;

  constructor(message: string, student: StudentName, course: Course | null = null) {
    super(message);
    this.name = "InputError";
    this.student = student;
    this.course = course;
  }
}

/** A schedule column label that does not name a day. */
export class FormatError extends Error {
  readonly label: string;

  constructor(message: string, label: string) {
    super(message);
    this.name = "FormatError";
    this.label = label;
  }
}
