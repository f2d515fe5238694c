/**
 * Mod detection against the curated mod lists of the rule set.
 * Mod keys are case-insensitive fragments of plugin file names.
 */
import type { GpuVendor, PluginMap, ReportBuffer } from "./shared.js";

function findPlugin(plugins: PluginMap, fragment: string): [string, string] | null {
  const needle = fragment.toLowerCase();
  for (const entry of plugins) {
    if (entry[0].toLowerCase().includes(needle)) return entry;
  }
  return null;
}

/** Mods that crash or misbehave on their own: one finding per listed mod */
export function detectSingleMods(mods: Record<string, string>, plugins: PluginMap, report: ReportBuffer): boolean {
  let found = false;
  for (const [fragment, warning] of Object.entries(mods)) {
    const hit = findPlugin(plugins, fragment);
    if (!hit) continue;
    report.add(`[!] FOUND : [${hit[1]}] ${warning.trimEnd()}\n-----\n`);
    found = true;
  }
  return found;
}

/** Pairs "A | B" that conflict when both are installed */
export function detectConflictingMods(mods: Record<string, string>, plugins: PluginMap, report: ReportBuffer): boolean {
  let found = false;
  for (const [pair, warning] of Object.entries(mods)) {
    const [first, second] = pair.split(" | ");
    if (!first || !second) continue;
    if (!findPlugin(plugins, first) || !findPlugin(plugins, second)) continue;
    report.add(`[!] CAUTION : ${warning.trimEnd()}\n-----\n`);
    found = true;
  }
  return found;
}

/**
 * Patches every setup should have, keyed "fragment | Display Name".
 * A warning naming the GPU vendor the user does not have marks a
 * vendor-specific mod: installed it gets flagged, missing it is fine.
 */
export function detectImportantMods(
  mods: Record<string, string>,
  plugins: PluginMap,
  gpuRival: GpuVendor | null,
  report: ReportBuffer,
): void {
  for (const [key, warning] of Object.entries(mods)) {
    const at = key.indexOf(" | ");
    const fragment = at === -1 ? key : key.slice(0, at);
    const name = at === -1 ? key : key.slice(at + 3);
    const forRival = gpuRival !== null && warning.toLowerCase().includes(gpuRival);

    if (findPlugin(plugins, fragment)) {
      if (forRival && gpuRival) {
        report.add(
          `❓ ${name} is installed, BUT IT SEEMS YOU DON'T HAVE AN ${gpuRival.toUpperCase()} GPU?\n`,
          "IF THIS IS CORRECT, COMPLETELY UNINSTALL THIS MOD TO AVOID ANY PROBLEMS! \n-----\n",
        );
      } else {
        report.add(`✔️ ${name} is installed!\n-----\n`);
      }
    } else if (!forRival) {
      report.add(`❌ ${name} is not installed!\n${warning.trimEnd()}\n-----\n`);
    }
  }
}
