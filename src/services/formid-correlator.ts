/**
 * FormID correlation: call stack FormIDs → owning plugin by load order slot,
 * optionally annotated with a record description from the lookup sources.
 */
import { countSorted } from "./record-correlator.js";
import type { PluginMap, ReportBuffer, Segment } from "./shared.js";

const FORMID_LINE = /^\s*Form ID:\s*(?:0x)?([0-9A-F]{8})\b/i;

export interface FormIdLookup {
  /** Description of `formId` (local id, slot stripped) in `plugin`, if any source knows it */
  lookup(formId: string, plugin: string): Promise<string | undefined>;
}

/** "Form ID: 0x0001A332" → "Form ID: 0001A332"; runtime-created (FF) ids are skipped */
export function extractFormIds(callStack: Segment): string[] {
  const ids: string[] = [];
  for (const line of callStack) {
    const match = FORMID_LINE.exec(line);
    if (!match) continue;
    const id = match[1].toUpperCase();
    if (!id.startsWith("FF")) ids.push(`Form ID: ${id}`);
  }
  return ids;
}

/**
 * Owning plugin and local id of an 8-digit FormID. Full plugins own the
 * first two digits; light plugins (FE) own "FE" plus the next three.
 */
export function resolveFormId(formId: string, plugins: PluginMap): { plugin: string; localId: string } | null {
  const prefix = formId.slice(0, 2);
  const slot = prefix === "FE" ? formId.slice(0, 5) : prefix;
  for (const [plugin, origin] of plugins) {
    if (origin === slot) return { plugin, localId: formId.slice(slot.length) };
  }
  return null;
}

export interface FormIdReportOptions {
  showValues: boolean;
  /** Null when no lookup source is configured */
  lookup: FormIdLookup | null;
}

export async function reportFormIds(
  formIds: readonly string[],
  plugins: PluginMap,
  options: FormIdReportOptions,
  crashgenName: string,
  report: ReportBuffer,
): Promise<void> {
  if (!formIds.length) {
    report.add("* COULDN'T FIND ANY FORM ID SUSPECTS *\n\n");
    return;
  }

  for (const [entry, count] of countSorted(formIds)) {
    const separator = entry.indexOf(": ");
    if (separator === -1) continue;
    const resolved = resolveFormId(entry.slice(separator + 2), plugins);
    if (!resolved) continue;

    const description = options.showValues && options.lookup
      ? await options.lookup.lookup(resolved.localId, resolved.plugin)
      : undefined;
    report.add(description
      ? `- ${entry} | [${resolved.plugin}] | ${description} | ${count}\n`
      : `- ${entry} | [${resolved.plugin}] | ${count}\n`);
  }

  report.add(
    "\n[Last number counts how many times each Form ID shows up in the crash log.]\n",
    `These Form IDs were caught by ${crashgenName} and some of them might be related to this crash.\n`,
    "You can try searching any listed Form IDs in xEdit and see if they lead to relevant records.\n\n",
  );
}
