/**
 * RecordAndPluginCorrelator - named game records and installed plugins
 * referenced from the call stack, deduplicated and counted.
 */
import type { ReportBuffer, Segment } from "./shared.js";

/** Register dump lines carry a fixed-width address column before the record text */
export const RSP_MARKER = "[RSP+";
export const RSP_OFFSET = 30;
export const MODIFIED_BY_MARKER = "modified by:";

export function byText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Sorted (text, count) pairs of a list of matches */
export function countSorted(items: readonly string[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const item of [...items].sort(byText)) counts.set(item, (counts.get(item) ?? 0) + 1);
  return [...counts];
}

// ── Named records ─────────────────────────────────────────

/** A line qualifies when it names a record of interest and no ignored term */
export function findNamedRecords(callStack: Segment, records: readonly string[], ignore: readonly string[]): string[] {
  const wanted = records.map(r => r.toLowerCase());
  const unwanted = ignore.map(r => r.toLowerCase());
  const matches: string[] = [];

  for (const line of callStack) {
    const lower = line.toLowerCase();
    if (!wanted.some(r => lower.includes(r)) || unwanted.some(r => lower.includes(r))) continue;
    matches.push(line.includes(RSP_MARKER) ? line.slice(RSP_OFFSET).trim() : line.trim());
  }
  return matches;
}

export function reportNamedRecords(matches: readonly string[], crashgenName: string, report: ReportBuffer): void {
  if (!matches.length) {
    report.add("* COULDN'T FIND ANY NAMED RECORDS *\n\n");
    return;
  }
  for (const [record, count] of countSorted(matches)) report.add(`- ${record} | ${count}\n`);
  report.add(
    "\n[Last number counts how many times each Named Record shows up in the crash log.]\n",
    `These records were caught by ${crashgenName} and some of them might be related to this crash.\n`,
    "Named records should give extra info on involved game objects, record types or mod files.\n\n",
  );
}

// ── Plugins in the call stack ─────────────────────────────

/**
 * Per-plugin hit counts over the call stack, case-insensitive.
 * Sorted by count descending, then name ascending.
 */
export function countPluginsInStack(
  callStack: Segment,
  pluginNames: Iterable<string>,
  ignore: readonly string[],
): Array<[string, number]> {
  const ignored = new Set(ignore.map(p => p.toLowerCase()));
  const plugins = [...new Set([...pluginNames].map(p => p.toLowerCase()))].filter(p => !ignored.has(p));
  const counts = new Map<string, number>();

  for (const line of callStack) {
    const lower = line.toLowerCase();
    if (lower.includes(MODIFIED_BY_MARKER)) continue;
    for (const plugin of plugins) {
      if (lower.includes(plugin)) counts.set(plugin, (counts.get(plugin) ?? 0) + 1);
    }
  }

  return [...counts].sort((a, b) => b[1] - a[1] || byText(a[0], b[0]));
}

export function reportPluginSuspects(matches: Array<[string, number]>, crashgenName: string, report: ReportBuffer): void {
  if (!matches.length) {
    report.add("* COULDN'T FIND ANY PLUGIN SUSPECTS *\n\n");
    return;
  }
  report.add("The following PLUGINS were found in the CRASH STACK:\n");
  for (const [plugin, count] of matches) report.add(`- ${plugin} | ${count}\n`);
  report.add(
    "\n[Last number counts how many times each Plugin Suspect shows up in the crash log.]\n",
    `These Plugins were caught by ${crashgenName} and some of them might be responsible for this crash.\n`,
    "You can try disabling these plugins and check if the game still crashes, though this method can be unreliable.\n\n",
  );
}
