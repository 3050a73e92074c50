import { DEFAULT_DAY_COLORS, MAX_STUDENTS, MIN_STUDENTS } from "./constants";
import type { Lang } from "./types";

export const DISPLAY_CONFIG_STORAGE_KEY = "exam-day-planner-display-config-v1";
export const MIN_FONT_SIZE = 8;
export const MAX_FONT_SIZE = 20;

const HEX_COLOR = /^#[0-9a-f]{6}$/i;

export interface DisplayConfig {
  lang: Lang;
  studentCount: number;
  fontSize: number;
  dayColors: string[];
}

export interface DisplayConfigValidation {
  errors: string[];
  warnings: string[];
}

const DEFAULT_CONFIG: DisplayConfig = {
  lang: "en",
  studentCount: 1,
  fontSize: 10,
  dayColors: DEFAULT_DAY_COLORS,
};

function cloneConfig(input: DisplayConfig): DisplayConfig {
  return {
    lang: input.lang,
    studentCount: input.studentCount,
    fontSize: input.fontSize,
    dayColors: [...input.dayColors],
  };
}

function asInt(value: unknown, fallback: number) {
  const n = Number(value);
  if (!Number.isFinite(n)) return fallback;
  return Math.round(n);
}

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function getDefaultDisplayConfig() {
  return cloneConfig(DEFAULT_CONFIG);
}

export function normalizeDisplayConfig(raw: unknown): DisplayConfig {
  const defaults = getDefaultDisplayConfig();
  if (!isRecord(raw)) return defaults;

  const colors = Array.isArray(raw.dayColors)
    ? raw.dayColors.filter((color): color is string => typeof color === "string" && HEX_COLOR.test(color)).map((color) => color.toLowerCase())
    : [];

  return {
    lang: raw.lang === "ar" ? "ar" : "en",
    studentCount: clamp(asInt(raw.studentCount, defaults.studentCount), MIN_STUDENTS, MAX_STUDENTS),
    fontSize: clamp(asInt(raw.fontSize, defaults.fontSize), MIN_FONT_SIZE, MAX_FONT_SIZE),
    dayColors: colors.length > 0 ? colors : defaults.dayColors,
  };
}

export function validateDisplayConfig(config: DisplayConfig, days: number): DisplayConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.studentCount) || config.studentCount < MIN_STUDENTS || config.studentCount > MAX_STUDENTS) {
    errors.push(`Number of students must be between ${MIN_STUDENTS} and ${MAX_STUDENTS}.`);
  }

  if (!Number.isInteger(config.fontSize) || config.fontSize < MIN_FONT_SIZE || config.fontSize > MAX_FONT_SIZE) {
    errors.push(`Font size must be between ${MIN_FONT_SIZE} and ${MAX_FONT_SIZE}.`);
  }

  if (config.dayColors.length === 0) {
    errors.push("At least one day color is required.");
  }

  config.dayColors.forEach((color, index) => {
    if (!HEX_COLOR.test(color)) errors.push(`Color for Day ${index + 1} must be a #rrggbb value.`);
  });

  if (config.dayColors.length > 0 && config.dayColors.length < days) {
    warnings.push(`Only ${config.dayColors.length} colors for ${days} days; colors will repeat.`);
  }

  return { errors, warnings };
}

export function colorForDay(config: DisplayConfig, dayIndex: number) {
  const palette = config.dayColors.length > 0 ? config.dayColors : DEFAULT_DAY_COLORS;
  return palette[dayIndex % palette.length];
}

export function setDayColor(config: DisplayConfig, dayIndex: number, color: string): DisplayConfig {
  const dayColors = [...config.dayColors];
  while (dayColors.length <= dayIndex) dayColors.push(colorForDay(config, dayColors.length));
  dayColors[dayIndex] = color.toLowerCase();
  return { ...config, dayColors };
}

export function loadDisplayConfig() {
  if (typeof window === "undefined") return getDefaultDisplayConfig();

  try {
    const raw = window.localStorage.getItem(DISPLAY_CONFIG_STORAGE_KEY);
    if (!raw) return getDefaultDisplayConfig();
    const parsed = JSON.parse(raw) as unknown;
    return normalizeDisplayConfig(parsed);
  } catch {
    return getDefaultDisplayConfig();
  }
}

export function saveDisplayConfig(config: DisplayConfig) {
  if (typeof window === "undefined") return;
  window.localStorage.setItem(DISPLAY_CONFIG_STORAGE_KEY, JSON.stringify(normalizeDisplayConfig(config)));
}
