/**
 * Crashlens - MetadataExtractor unit tests
 */
import { describe, expect, it } from "vitest";
import {
  detectGpu,
  extractMetadata,
  extractModuleNames,
  parseCrashgenSettings,
  UNKNOWN,
} from "../src/services/metadata-extractor.js";

describe("extractMetadata", () => {
  it("takes the first matching line of each field", () => {
    const lines = [
      "Fallout 4 v1.10.163",
      "Buffout 4 v1.28.6 Feb 12 2023",
      "Unhandled exception \"EXCEPTION_ACCESS_VIOLATION\" at 0x7FF6 | Fallout4.exe+1B2C | mov rax",
      "Fallout 4 v9.9.9",
      "Unhandled exception second",
    ];
    expect(extractMetadata(lines, "Fallout 4", "Buffout 4")).toEqual({
      gameVersion: "Fallout 4 v1.10.163",
      crashgenVersion: "Buffout 4 v1.28.6 Feb 12 2023",
      mainError: "Unhandled exception \"EXCEPTION_ACCESS_VIOLATION\" at 0x7FF6 \n Fallout4.exe+1B2C | mov rax",
    });
  });

  it("falls back to UNKNOWN for every missing field", () => {
    expect(extractMetadata(["nothing useful"], "Fallout 4", "Buffout 4")).toEqual({
      gameVersion: UNKNOWN,
      crashgenVersion: UNKNOWN,
      mainError: UNKNOWN,
    });
  });

  it("never matches the game version with an empty root name", () => {
    expect(extractMetadata(["Fallout 4 v1.10.163"], "", "Buffout 4").gameVersion).toBe(UNKNOWN);
  });
});

describe("detectGpu", () => {
  it("recognises AMD and Nvidia on the first GPU line", () => {
    expect(detectGpu(["GPU #1: AMD Navi 21 [Radeon RX 6800]"])).toEqual({ name: "AMD", rival: "nvidia" });
    expect(detectGpu(["GPU #1: Nvidia AD104 [GeForce RTX 4070]"])).toEqual({ name: "Nvidia", rival: "amd" });
  });

  it("ignores AMD CPUs and secondary GPUs", () => {
    expect(detectGpu(["CPU: AuthenticAMD AMD Ryzen 7", "GPU #2: AMD Radeon"])).toEqual({ name: "Unknown", rival: null });
  });
});

describe("extractModuleNames", () => {
  it("drops version suffixes and lowercases", () => {
    expect(extractModuleNames(["Buffout4.dll v1.28.6", "X-Cell-OG.dll", "", "MCM.dll v1.41"])).toEqual(
      new Set(["buffout4.dll", "x-cell-og.dll", "mcm.dll"]),
    );
  });
});

describe("parseCrashgenSettings", () => {
  it("types booleans and integers, keeps the rest as text", () => {
    const settings = parseCrashgenSettings([
      "[Compatibility]",
      "F4EE: true",
      "Achievements: false",
      "MaxStdIO: 2048",
      "ScaleformAllocator: auto ",
    ]);
    expect([...settings]).toEqual([
      ["F4EE", true],
      ["Achievements", false],
      ["MaxStdIO", 2048],
      ["ScaleformAllocator", "auto"],
    ]);
  });
});
