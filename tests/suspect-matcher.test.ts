/**
 * Crashlens - SuspectMatcher unit tests
 */
import { describe, expect, it } from "vitest";
import { ReportBuffer } from "../src/services/shared.js";
import {
  compileSignals,
  dllNotice,
  evaluateSignals,
  formatSuspectLine,
  isSuspectMatch,
  parseSubSignal,
  scanCallStack,
  scanMainError,
  splitRuleKey,
  type StackSuspectRule,
} from "../src/services/suspect-matcher.js";

function stackRule(name: string, raw: string[], severity = "4"): StackSuspectRule {
  return { severity, name, signals: compileSignals(name, raw) };
}

function matches(raw: string[], mainError: string, callStack: string): boolean {
  const status = evaluateSignals(compileSignals("test", raw), mainError, callStack);
  return status !== null && isSuspectMatch(status);
}

describe("parseSubSignal", () => {
  it("parses every modifier into its tagged form", () => {
    expect(parseSubSignal("ME-REQ|EXCEPTION")).toEqual({ kind: "mainErrorRequired", text: "EXCEPTION" });
    expect(parseSubSignal("ME-OPT|d3d11.dll")).toEqual({ kind: "mainErrorOptional", text: "d3d11.dll" });
    expect(parseSubSignal("NOT|Papyrus")).toEqual({ kind: "stackNot", text: "Papyrus" });
    expect(parseSubSignal("3|BSTask")).toEqual({ kind: "stackCount", text: "BSTask", min: 3 });
    expect(parseSubSignal("PathingCell")).toEqual({ kind: "stack", text: "PathingCell" });
  });

  it("keeps everything after the first bar as the text", () => {
    expect(parseSubSignal("NOT|a|b")).toEqual({ kind: "stackNot", text: "a|b" });
  });

  it("rejects unknown modifiers", () => {
    expect(parseSubSignal("MAYBE|x")).toBeNull();
    expect(compileSignals("rule", ["MAYBE|x", "y"])).toEqual([{ kind: "stack", text: "y" }]);
  });
});

describe("splitRuleKey", () => {
  it("splits severity from name", () => {
    expect(splitRuleKey("5 | Stack Overflow Crash")).toEqual({ severity: "5", name: "Stack Overflow Crash" });
    expect(splitRuleKey("no separator")).toBeNull();
  });
});

describe("evaluateSignals", () => {
  it("requires the ME-REQ text when present, ignoring stack hits", () => {
    expect(matches(["ME-REQ|ACCESS_VIOLATION", "Foo"], "EXCEPTION_ACCESS_VIOLATION", "")).toBe(true);
    expect(matches(["ME-REQ|STACK_OVERFLOW", "Foo"], "EXCEPTION_ACCESS_VIOLATION", "Foo")).toBe(false);
  });

  it("matches on an optional main error hit or any stack hit", () => {
    expect(matches(["ME-OPT|d3d11.dll", "Render"], "crash in d3d11.dll", "")).toBe(true);
    expect(matches(["ME-OPT|d3d11.dll", "Render"], "other", "BSRender")).toBe(true);
    expect(matches(["ME-OPT|d3d11.dll", "Render"], "other", "nothing")).toBe(false);
  });

  it("needs N non-overlapping occurrences for a count signal", () => {
    expect(matches(["2|aa"], "", "aaa")).toBe(false);
    expect(matches(["2|aa"], "", "aaaa")).toBe(true);
  });

  it("is disqualified by a NOT signal wherever it appears", () => {
    expect(evaluateSignals(compileSignals("r", ["Foo", "NOT|Bar"]), "", "Foo\nBar")).toBeNull();
    expect(matches(["NOT|Bar", "Foo"], "", "Foo")).toBe(true);
  });
});

describe("report lines", () => {
  it("pads the rule name with dots", () => {
    expect(formatSuspectLine("Null Crash", "3")).toBe(
      "# Checking for Null Crash.................... SUSPECT FOUND! > Severity : 3 # \n-----\n",
    );
  });

  it("reports main error rules in rule order", () => {
    const report = new ReportBuffer();
    const found = scanMainError(
      [
        { severity: "5", name: "Stack Overflow Crash", signal: "EXCEPTION_STACK_OVERFLOW" },
        { severity: "3", name: "Null Crash", signal: "0x000000000000" },
      ],
      "Unhandled exception \"EXCEPTION_STACK_OVERFLOW\" at 0x000000000000",
      report,
      10,
    );
    expect(found).toBe(true);
    expect(report.fragments).toEqual([
      "# Checking for Stack Overflow Crash SUSPECT FOUND! > Severity : 5 # \n-----\n",
      "# Checking for Null Crash SUSPECT FOUND! > Severity : 3 # \n-----\n",
    ]);
  });

  it("reports nothing when no stack rule matches", () => {
    const report = new ReportBuffer();
    expect(scanCallStack([stackRule("Audio Crash", ["XAudio2_7.dll"])], "", "Fallout4.exe", report)).toBe(false);
    expect(report.length).toBe(0);
  });

  it("reports matching stack rules", () => {
    const report = new ReportBuffer();
    const rules = [stackRule("Pathing", ["PathingCell"], "4"), stackRule("Audio", ["XAudio2_7.dll"], "5")];
    expect(scanCallStack(rules, "", "[1] PathingCell::Update", report, 8)).toBe(true);
    expect(report.toString()).toBe("# Checking for Pathing. SUSPECT FOUND! > Severity : 4 # \n-----\n");
  });
});

describe("dllNotice", () => {
  it("flags a dll in the main error, except tbbmalloc", () => {
    expect(dllNotice("crash at Buffout4.DLL+1234")).toHaveLength(2);
    expect(dllNotice("crash at tbbmalloc.dll+1234")).toEqual([]);
    expect(dllNotice("crash at Fallout4.exe+1234")).toEqual([]);
  });
});
