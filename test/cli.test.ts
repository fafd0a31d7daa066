import { describe, expect, it } from "vitest";
import { isConfirmation, parseExtensionList } from "../src/cli/commands/batch";
import { formatDuration, formatProgressBar } from "../src/cli/output";

describe("formatProgressBar", () => {
  it("fills the bar in proportion to progress", () => {
    expect(formatProgressBar(1, 4, 8)).toBe("[==------] 1/4 (25%)");
    expect(formatProgressBar(4, 4, 8)).toBe("[========] 4/4 (100%)");
  });

  it("rounds the percentage", () => {
    expect(formatProgressBar(2, 3, 10)).toBe("[======----] 2/3 (67%)");
  });
});

describe("formatDuration", () => {
  it("formats minutes and hours", () => {
    expect(formatDuration(65.4)).toBe("01:05");
    expect(formatDuration(3725)).toBe("1:02:05");
    expect(formatDuration(undefined)).toBe("unknown");
  });
});

describe("parseExtensionList", () => {
  it("defaults to mp4 and mkv", () => {
    expect(parseExtensionList(undefined)).toEqual([".mp4", ".mkv"]);
    expect(parseExtensionList(" , ")).toEqual([".mp4", ".mkv"]);
  });

  it("normalises a comma-separated list", () => {
    expect(parseExtensionList("MOV, .webm,mp4")).toEqual([".mov", ".webm", ".mp4"]);
  });
});

describe("isConfirmation", () => {
  it.each(["", "y", "Y", "yes", " YES "])("accepts %j", (answer) => {
    expect(isConfirmation(answer)).toBe(true);
  });

  it.each(["n", "no", "nope", "maybe"])("declines %j", (answer) => {
    expect(isConfirmation(answer)).toBe(false);
  });
});
