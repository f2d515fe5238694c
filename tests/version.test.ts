/**
 * Crashlens - version parsing unit tests
 */
import { describe, expect, it } from "vitest";
import { compareVersions, formatVersion, NULL_VERSION, parseVersion, parseVersionText } from "../src/utils/version.js";

describe("parseVersion", () => {
  it("parses dotted numbers only", () => {
    expect(parseVersion("1.28.6")).toEqual([1, 28, 6]);
    expect(parseVersion(" 1.10 ")).toEqual([1, 10]);
    expect(parseVersion("1.x")).toBeNull();
    expect(parseVersion("")).toBeNull();
  });
});

describe("parseVersionText", () => {
  it("takes the last v-prefixed token of a header line", () => {
    expect(parseVersionText("Buffout 4 v1.28.6 Feb 12 2023 22:17:11")).toEqual([1, 28, 6]);
    expect(parseVersionText("Fallout 4 v1.10.163")).toEqual([1, 10, 163]);
  });

  it("falls back to the null version", () => {
    expect(parseVersionText("Fallout 4")).toBe(NULL_VERSION);
    expect(parseVersionText("vr mode")).toBe(NULL_VERSION);
  });
});

describe("compareVersions", () => {
  it("treats missing components as zero", () => {
    expect(compareVersions([1, 37], [1, 37, 0])).toBe(0);
    expect(compareVersions([1, 10, 984], [1, 10, 163])).toBe(1);
    expect(compareVersions([1, 2, 72], [1, 10])).toBe(-1);
  });

  it("formats back to text", () => {
    expect(formatVersion([1, 28, 6])).toBe("1.28.6");
  });
});
