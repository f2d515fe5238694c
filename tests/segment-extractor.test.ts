/**
 * Crashlens - SegmentExtractor unit tests
 */
import { describe, expect, it } from "vitest";
import {
  crashLogBoundaries,
  END_OF_FILE,
  extractCrashLogSegments,
  extractSegments,
  transition,
  type BoundaryPair,
} from "../src/services/segment-extractor.js";

const PAIRS: BoundaryPair[] = [
  { start: "A:", end: "B:" },
  { start: "B:", end: "C:" },
  { start: "C:", end: END_OF_FILE },
];

describe("extractSegments", () => {
  it("collects the lines between each pair, stripped", () => {
    const lines = ["head", "A:", "  one ", "B:", "\ttwo", "C:", "three", "four"];
    expect(extractSegments(lines, PAIRS)).toEqual([["one"], ["two"], ["three", "four"]]);
  });

  it("lets one line close a segment and open the next", () => {
    const lines = ["A:", "x", "B:", "C:", "y"];
    expect(extractSegments(lines, PAIRS)).toEqual([["x"], [], ["y"]]);
  });

  it("pads with empty segments when markers are missing", () => {
    expect(extractSegments(["A:", "x", "B:", "y"], PAIRS)).toEqual([["x"], ["y"], []]);
    expect(extractSegments(["nothing", "here"], PAIRS)).toEqual([[], [], []]);
  });

  it("keeps the rest of the file when an end marker never shows up", () => {
    expect(extractSegments(["A:", "x", "y"], PAIRS)).toEqual([["x", "y"], [], []]);
  });

  it("walks pairs strictly in order", () => {
    // A later pair's start before an earlier one is ignored
    expect(extractSegments(["C:", "early", "A:", "x", "B:", "y", "C:", "z"], PAIRS)).toEqual([["x"], ["y"], ["z"]]);
  });

  it("returns nothing for an empty pair table", () => {
    expect(extractSegments(["A:"], [])).toEqual([]);
  });
});

describe("transition", () => {
  it("moves seeking → collecting on a start marker", () => {
    const out: string[][] = [];
    expect(transition({ kind: "seeking", pair: 0 }, ["A:"], 0, PAIRS, out)).toEqual({ kind: "collecting", pair: 0, start: 1 });
    expect(out).toEqual([]);
  });

  it("moves straight to done on a start marker whose end is EOF", () => {
    const out: string[][] = [];
    expect(transition({ kind: "seeking", pair: 2 }, ["C:", "rest"], 0, PAIRS, out)).toEqual({ kind: "done" });
    expect(out).toEqual([["rest"]]);
  });
});

describe("extractCrashLogSegments", () => {
  it("uses the script extender acronym for the module boundaries", () => {
    expect(crashLogBoundaries("f4se")[3]).toEqual({ start: "MODULES:", end: "F4SE PLUGINS:" });
  });

  it("splits a crash log into its six named segments", () => {
    const lines = [
      "\t[Compatibility]", "\t\tF4EE: true",
      "SYSTEM SPECS:", "\tGPU #1: Nvidia",
      "PROBABLE CALL STACK:", "\t[0] Fallout4.exe",
      "MODULES:", "\tX3DAudio1_7.dll",
      "F4SE PLUGINS:", "\tBuffout4.dll v1.28.6",
      "PLUGINS:", "\t[00] Fallout4.esm",
    ];
    expect(extractCrashLogSegments(lines, "F4SE")).toEqual({
      crashgen: ["F4EE: true"],
      system: ["GPU #1: Nvidia"],
      callStack: ["[0] Fallout4.exe"],
      allModules: ["X3DAudio1_7.dll"],
      xseModules: ["Buffout4.dll v1.28.6"],
      plugins: ["[00] Fallout4.esm"],
    });
  });
});
