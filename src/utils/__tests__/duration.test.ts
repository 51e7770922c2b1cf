// src/utils/__tests__/duration.test.ts

import { formatDuration, parseDuration } from "../duration";

describe("parseDuration", () => {
  it("should parse single units", () => {
    expect(parseDuration("500ms")).toBe(500);
    expect(parseDuration("90s")).toBe(90_000);
    expect(parseDuration("5m")).toBe(300_000);
    expect(parseDuration("720h")).toBe(2_592_000_000);
  });

  it("should add up compound durations", () => {
    expect(parseDuration("1h30m")).toBe(5_400_000);
    expect(parseDuration("2m30s")).toBe(150_000);
    expect(parseDuration("1.5h")).toBe(5_400_000);
  });

  it("should accept a bare zero", () => {
    expect(parseDuration("0")).toBe(0);
    expect(parseDuration(" 0 ")).toBe(0);
  });

  it("should reject anything else", () => {
    for (const input of ["", "5", "5 m", "-5m", "1d", "m", "1h30", "fast"]) {
      expect(parseDuration(input)).toBeNull();
    }
  });
});

describe("formatDuration", () => {
  it("should format the largest units first", () => {
    expect(formatDuration(5_400_000)).toBe("1h30m");
    expect(formatDuration(300_000)).toBe("5m");
    expect(formatDuration(1_500)).toBe("1s500ms");
    expect(formatDuration(0)).toBe("0s");
  });
});
