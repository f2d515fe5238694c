/**
 * SuspectMatcher - known crash signatures matched against the main error and
 * the call stack.
 *
 * Stack rules use a small signal grammar, parsed once when the rules load:
 *   "ME-REQ|text"  main error must contain text
 *   "ME-OPT|text"  main error containing text counts as a hit
 *   "NOT|text"     call stack containing text disqualifies the rule
 *   "<N>|text"     call stack contains text at least N times
 *   "text"         call stack contains text
 */
import { logger } from "../utils/index.js";
import type { ReportBuffer } from "./shared.js";

export type SubSignal =
  | { kind: "mainErrorRequired"; text: string }
  | { kind: "mainErrorOptional"; text: string }
  | { kind: "stackNot"; text: string }
  | { kind: "stackCount"; text: string; min: number }
  | { kind: "stack"; text: string };

export interface ErrorSuspectRule {
  severity: string;
  name: string;
  signal: string;
}

export interface StackSuspectRule {
  severity: string;
  name: string;
  signals: SubSignal[];
}

export interface MatchStatus {
  hasRequired: boolean;
  requiredFound: boolean;
  optionalFound: boolean;
  stackFound: boolean;
}

export const DEFAULT_NAME_WIDTH = 30;

// ── Parsing ───────────────────────────────────────────────

/** "High | Stack Overflow Crash" → severity + name; null when the separator is missing */
export function splitRuleKey(key: string): { severity: string; name: string } | null {
  const at = key.indexOf(" | ");
  if (at === -1) return null;
  return { severity: key.slice(0, at), name: key.slice(at + 3) };
}

/** Unknown modifiers yield null and are dropped by the caller */
export function parseSubSignal(raw: string): SubSignal | null {
  const bar = raw.indexOf("|");
  if (bar === -1) return { kind: "stack", text: raw };

  const modifier = raw.slice(0, bar);
  const text = raw.slice(bar + 1);
  if (modifier === "ME-REQ") return { kind: "mainErrorRequired", text };
  if (modifier === "ME-OPT") return { kind: "mainErrorOptional", text };
  if (modifier === "NOT") return { kind: "stackNot", text };
  if (/^\d+$/.test(modifier)) return { kind: "stackCount", text, min: parseInt(modifier, 10) };
  return null;
}

export function compileSignals(ruleName: string, raw: readonly string[]): SubSignal[] {
  const signals: SubSignal[] = [];
  for (const entry of raw) {
    const signal = parseSubSignal(entry);
    if (signal) signals.push(signal);
    else logger.warn(`Dropping signal with unknown modifier "${entry}" from suspect "${ruleName}"`, { module: "Rules" });
  }
  return signals;
}

// ── Evaluation ────────────────────────────────────────────

function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  for (let at = haystack.indexOf(needle); at !== -1; at = haystack.indexOf(needle, at + needle.length)) count++;
  return count;
}

/** Match status of one rule, or null when a NOT signal disqualified it */
export function evaluateSignals(signals: readonly SubSignal[], mainError: string, callStack: string): MatchStatus | null {
  const status: MatchStatus = { hasRequired: false, requiredFound: false, optionalFound: false, stackFound: false };

  for (const signal of signals) {
    switch (signal.kind) {
      case "mainErrorRequired":
        status.hasRequired = true;
        if (mainError.includes(signal.text)) status.requiredFound = true;
        break;
      case "mainErrorOptional":
        if (mainError.includes(signal.text)) status.optionalFound = true;
        break;
      case "stackNot":
        if (callStack.includes(signal.text)) return null;
        break;
      case "stackCount":
        if (countOccurrences(callStack, signal.text) >= signal.min) status.stackFound = true;
        break;
      case "stack":
        if (callStack.includes(signal.text)) status.stackFound = true;
        break;
    }
  }
  return status;
}

export function isSuspectMatch(status: MatchStatus): boolean {
  if (status.hasRequired) return status.requiredFound;
  return status.optionalFound || status.stackFound;
}

export function formatSuspectLine(name: string, severity: string, width = DEFAULT_NAME_WIDTH): string {
  return `# Checking for ${name.padEnd(width, ".")} SUSPECT FOUND! > Severity : ${severity} # \n-----\n`;
}

/** Rules whose literal signal occurs in the main error, in rule order */
export function scanMainError(rules: readonly ErrorSuspectRule[], mainError: string, report: ReportBuffer, width = DEFAULT_NAME_WIDTH): boolean {
  let found = false;
  for (const rule of rules) {
    if (!mainError.includes(rule.signal)) continue;
    report.add(formatSuspectLine(rule.name, rule.severity, width));
    found = true;
  }
  return found;
}

export function scanCallStack(
  rules: readonly StackSuspectRule[],
  mainError: string,
  callStack: string,
  report: ReportBuffer,
  width = DEFAULT_NAME_WIDTH,
): boolean {
  let found = false;
  for (const rule of rules) {
    const status = evaluateSignals(rule.signals, mainError, callStack);
    if (!status || !isSuspectMatch(status)) continue;
    report.add(formatSuspectLine(rule.name, rule.severity, width));
    found = true;
  }
  return found;
}

export function dllNotice(mainError: string): string[] {
  const lower = mainError.toLowerCase();
  if (!lower.includes(".dll") || lower.includes("tbbmalloc")) return [];
  return [
    "* NOTICE : MAIN ERROR REPORTS THAT A DLL FILE WAS INVOLVED IN THIS CRASH! * \n",
    "If that dll file belongs to a mod, that mod is a prime suspect for the crash. \n-----\n",
  ];
}
