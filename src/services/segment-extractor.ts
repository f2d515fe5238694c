/**
 * SegmentExtractor - splits a crash log into marker-delimited segments.
 *
 * Boundary pairs are walked strictly in order by a small state machine:
 *
 *   Seeking(i)     --line starts with pairs[i].start-->  Collecting(i)
 *   Seeking(i)     --... and pairs[i].end is EOF------>  Done (rest of file)
 *   Collecting(i)  --line starts with pairs[i].end---->  Seeking(i + 1), same line re-examined
 *   Collecting(i)  --end of input-------------------->  Done (rest of file)
 *
 * The result always has one stripped line list per pair, empty when a pair
 * was never reached.
 */
import type { CrashLogSegments, Segment } from "./shared.js";

export const END_OF_FILE = Symbol("END_OF_FILE");

export interface BoundaryPair {
  start: string;
  end: string | typeof END_OF_FILE;
}

export type ExtractorState =
  | { kind: "seeking"; pair: number }
  | { kind: "collecting"; pair: number; start: number }
  | { kind: "done" };

/** Default boundaries of a Buffout-style crash log */
export function crashLogBoundaries(xseAcronym: string): BoundaryPair[] {
  const xse = xseAcronym.toUpperCase();
  return [
    { start: "\t[Compatibility]", end: "SYSTEM SPECS:" },
    { start: "SYSTEM SPECS:", end: "PROBABLE CALL STACK:" },
    { start: "PROBABLE CALL STACK:", end: "MODULES:" },
    { start: "MODULES:", end: `${xse} PLUGINS:` },
    { start: `${xse} PLUGINS:`, end: "PLUGINS:" },
    { start: "PLUGINS:", end: END_OF_FILE },
  ];
}

/**
 * Advance the machine by one line. Closed segments are pushed onto `out`.
 * An end marker hands the same line to the next pair's start marker, so a
 * line may close one segment and open the next.
 */
export function transition(
  state: ExtractorState,
  lines: readonly string[],
  index: number,
  pairs: readonly BoundaryPair[],
  out: string[][],
): ExtractorState {
  const line = lines[index];
  let current = state;

  if (current.kind === "collecting") {
    const { end } = pairs[current.pair];
    if (end === END_OF_FILE || !line.startsWith(end)) return current;
    out.push(lines.slice(current.start, index));
    const next = current.pair + 1;
    if (next >= pairs.length) return { kind: "done" };
    current = { kind: "seeking", pair: next };
  }

  if (current.kind === "seeking") {
    const pair = pairs[current.pair];
    if (!line.startsWith(pair.start)) return current;
    if (pair.end === END_OF_FILE) {
      out.push(lines.slice(index + 1));
      return { kind: "done" };
    }
    return { kind: "collecting", pair: current.pair, start: index + 1 };
  }

  return current;
}

export function extractSegments(lines: readonly string[], pairs: readonly BoundaryPair[]): Segment[] {
  const segments: string[][] = [];
  let state: ExtractorState = pairs.length ? { kind: "seeking", pair: 0 } : { kind: "done" };

  for (let i = 0; i < lines.length && state.kind !== "done"; i++) {
    state = transition(state, lines, i, pairs, segments);
  }
  if (state.kind === "collecting") segments.push(lines.slice(state.start));
  while (segments.length < pairs.length) segments.push([]);

  return segments.map(segment => segment.map(line => line.trim()));
}

export function extractCrashLogSegments(lines: readonly string[], xseAcronym: string): CrashLogSegments {
  const [crashgen, system, callStack, allModules, xseModules, plugins] =
    extractSegments(lines, crashLogBoundaries(xseAcronym));
  return { crashgen, system, callStack, allModules, xseModules, plugins };
}
