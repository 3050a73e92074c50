import { describe, expect, it } from "vitest";
import {
  colorForDay,
  getDefaultDisplayConfig,
  loadDisplayConfig,
  normalizeDisplayConfig,
  setDayColor,
  validateDisplayConfig,
} from "./displayConfig";

describe("display config", () => {
  it("validates the default config", () => {
    const validation = validateDisplayConfig(getDefaultDisplayConfig(), 3);
    expect(validation.errors).toHaveLength(0);
    expect(validation.warnings).toHaveLength(0);
  });

  it("warns when days outnumber the palette", () => {
    const validation = validateDisplayConfig(getDefaultDisplayConfig(), 13);
    expect(validation.warnings).toEqual(["Only 12 colors for 13 days; colors will repeat."]);
  });

  it("flags out-of-range settings", () => {
    const config = { ...getDefaultDisplayConfig(), fontSize: 30, dayColors: ["#zzzzzz"] };
    expect(validateDisplayConfig(config, 1).errors).toEqual(["Font size must be between 8 and 20.", "Color for Day 1 must be a #rrggbb value."]);
  });

  it("normalises stored values", () => {
    expect(normalizeDisplayConfig({ lang: "fr", studentCount: 50, fontSize: 2, dayColors: ["#ABCDEF", "red"] })).toEqual({
      lang: "en",
      studentCount: 20,
      fontSize: 8,
      dayColors: ["#abcdef"],
    });
    expect(normalizeDisplayConfig("broken")).toEqual(getDefaultDisplayConfig());
  });

  it("cycles day colours", () => {
    const config = getDefaultDisplayConfig();
    expect(colorForDay(config, 12)).toBe(colorForDay(config, 0));
  });

  it("extends the palette when a later day is recoloured", () => {
    const config = { ...getDefaultDisplayConfig(), dayColors: ["#111111"] };
    expect(setDayColor(config, 2, "#ABCDEF").dayColors).toEqual(["#111111", "#111111", "#abcdef"]);
    expect(config.dayColors).toEqual(["#111111"]);
  });

  it("falls back to defaults without a browser window", () => {
    expect(loadDisplayConfig()).toEqual(getDefaultDisplayConfig());
  });
});
