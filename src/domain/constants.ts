import type { Course } from "./types";

export const COURSES: Course[] = [
  "Math",
  "Science",
  "History",
  "English",
  "Art",
  "Music",
  "Geography",
  "Biology",
  "Chemistry",
  "Physics",
  "Economics",
  "Philosophy",
  "Sociology",
  "Psychology",
  "Physical Education",
  "Literature",
  "Computer Science",
  "Business Studies",
  "Dance",
  "Soccer",
  "Driving",
];

export const DAY_LABEL_PREFIX = "Day";

export const MIN_STUDENTS = 1;
export const MAX_STUDENTS = 20;

export const DEFAULT_DAY_COLORS = [
  "#f0f8ff",
  "#faebd7",
  "#00ffff",
  "#7fffd4",
  "#f0ffff",
  "#f5f5dc",
  "#ffe4c4",
  "#ffebcd",
  "#0000ff",
  "#8a2be2",
  "#a52a2a",
  "#deb887",
];
