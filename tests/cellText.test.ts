import { describe, expect, it } from "vitest";
import { cellTextNormalizer, isClockFormat } from "../src/sheet/cellText";

describe("cellTextNormalizer", () => {
  it("generic mode stringifies values as they are", () => {
    const normalize = cellTextNormalizer("generic");
    expect(normalize(null)).toBe("");
    expect(normalize(undefined)).toBe("");
    expect(normalize(5)).toBe("5");
    expect(normalize(0.25)).toBe("0.25");
    expect(normalize("  Diana ")).toBe("Diana");
  });

  it("typed mode renders day fractions as clock times", () => {
    const normalize = cellTextNormalizer("typed");
    expect(normalize(8 / 24)).toBe("08:00:00");
    expect(normalize(0.25)).toBe("06:00:00");
    expect(normalize(1.25)).toBe("30:00:00");
    expect(normalize(45366.5)).toBe("12:00:00");
  });

  it("typed mode keeps integers, text and booleans readable", () => {
    const normalize = cellTextNormalizer("typed");
    expect(normalize(12)).toBe("12");
    expect(normalize(" 22:00 ")).toBe("22:00");
    expect(normalize(true)).toBe("TRUE");
    expect(normalize(Number.NaN)).toBe("");
    expect(normalize(null)).toBe("");
  });

  it("typed mode reads whole numbers in time formats as clock times", () => {
    const normalize = cellTextNormalizer("typed");
    expect(normalize(0, "hh:mm")).toBe("00:00:00");
    expect(normalize(1, "[h]:mm")).toBe("24:00:00");
    expect(normalize(45366.75, "yyyy-mm-dd hh:mm")).toBe("18:00:00");
    expect(normalize(1, "General")).toBe("1");
    expect(normalize(5, "yyyy-mm-dd")).toBe("5");
  });

  it("typed mode reads the wall-clock time of dates", () => {
    const normalize = cellTextNormalizer("typed");
    expect(normalize(new Date(2024, 0, 1, 8, 30, 5))).toBe("08:30:05");
  });

  it("duration mode decodes ISO-8601 durations", () => {
    const normalize = cellTextNormalizer("duration");
    expect(normalize("PT08H00M00S")).toBe("08:00:00");
    expect(normalize("PT22H30M")).toBe("22:30:00");
    expect(normalize("Diana")).toBe("Diana");
    expect(normalize(0.25)).toBe("06:00:00");
  });
});

describe("isClockFormat", () => {
  it("accepts time and elapsed-time formats only", () => {
    expect(isClockFormat("hh:mm")).toBe(true);
    expect(isClockFormat("[h]:mm:ss")).toBe(true);
    expect(isClockFormat("HH:MM:SS")).toBe(true);
    expect(isClockFormat("General")).toBe(false);
    expect(isClockFormat("0.00")).toBe(false);
    expect(isClockFormat(undefined)).toBe(false);
  });
});
