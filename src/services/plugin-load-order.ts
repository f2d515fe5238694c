/**
 * PluginLoadOrderResolver - builds the plugin → origin map for one crash log,
 * either from a user supplied loadorder.txt or from the log's PLUGINS segment.
 */
import { readFile } from "fs/promises";
import { compareVersions, parseVersion, type Version } from "../utils/index.js";
import { ORIGIN_DLL, ORIGIN_LOADORDER, ORIGIN_UNKNOWN, type PluginMap, type Segment } from "./shared.js";

export const PLUGIN_LIMIT_MARKER = "[FF]";

/** First crash generator release that reports the light plugin limit itself */
export const LIMIT_CHECK_VERSION: Version = [1, 37, 0];

/**
 * "[2A] Foo.esp", "[FE:001] Bar.esl" or a bare "Baz.esm" / "Qux.dll".
 * Group 1 is the slot id and group 2 its file name, which may itself start
 * with a bracket ("[0A] [SS2] Patch.esp"); group 3 is a bare file name.
 */
const PLUGIN_LINE =
  /^\s*(?:\[(FE:[0-9A-F]{3}|[0-9A-F]{2})\]\s*(.+?(?:\.(?:es[pml]|dll))+)|([^[\s].*?(?:\.(?:es[pml]|dll))+))/i;

export interface GameVersions {
  original: string;
  vr: string;
  nextGen: string;
}

export interface LogPluginScan {
  plugins: PluginMap;
  /** An [FF] slot on an original release: the plugin limit was hit */
  limitTriggered: boolean;
  /** An [FF] slot on next-gen with a crash generator too old to check the limit */
  limitCheckDisabled: boolean;
}

export interface LoadOrderFileResult {
  plugins: PluginMap;
  loaded: boolean;
  /** Report lines: the override notice, plus a read error if any */
  notices: string[];
}

/** Header line skipped, every other non-blank line is a plugin */
export function parseLoadOrderText(text: string): PluginMap {
  const plugins: PluginMap = new Map();
  for (const raw of text.split(/\r?\n/).slice(1)) {
    const name = raw.trim();
    if (name && !plugins.has(name)) plugins.set(name, ORIGIN_LOADORDER);
  }
  return plugins;
}

export async function readLoadOrderFile(path: string, scannerName: string): Promise<LoadOrderFileResult> {
  const notices = [
    `* ✔️ LOADORDER.TXT FILE FOUND IN THE MAIN ${scannerName.toUpperCase()} FOLDER! *\n`,
    `${scannerName} will now ignore plugins in all crash logs and only detect plugins in this file.\n`,
    `[ To disable this functionality, simply remove loadorder.txt from your ${scannerName} folder. ]\n\n`,
  ];
  try {
    const plugins = parseLoadOrderText(await readFile(path, "utf-8"));
    return { plugins, loaded: plugins.size > 0, notices };
  } catch (e) {
    notices.push(`Error reading loadorder.txt: ${(e as Error).message}`);
    return { plugins: new Map(), loaded: false, notices };
  }
}

export function scanLogPlugins(
  segment: Segment,
  gameVersion: Version,
  crashgenVersion: Version,
  versions: GameVersions,
): LogPluginScan {
  const plugins: PluginMap = new Map();
  let limitTriggered = false;
  let limitCheckDisabled = false;

  const isVersion = (text: string) => {
    const v = parseVersion(text);
    return v !== null && compareVersions(gameVersion, v) === 0;
  };
  const nextGen = parseVersion(versions.nextGen);
  const isOriginal = isVersion(versions.original) || isVersion(versions.vr);
  const isNextGenOldCrashgen = nextGen !== null
    && compareVersions(gameVersion, nextGen) >= 0
    && compareVersions(crashgenVersion, LIMIT_CHECK_VERSION) < 0;

  for (const line of segment) {
    if (line.includes(PLUGIN_LIMIT_MARKER)) {
      if (isOriginal) limitTriggered = true;
      else if (isNextGenOldCrashgen) limitCheckDisabled = true;
    }

    const match = PLUGIN_LINE.exec(line);
    if (!match) continue;
    const [, slot, slotted, bare] = match;
    const name = slotted ?? bare;
    if (!name || plugins.has(name)) continue;

    if (slot !== undefined) plugins.set(name, slot.replace(":", ""));
    else plugins.set(name, name.toLowerCase().includes("dll") ? ORIGIN_DLL : ORIGIN_UNKNOWN);
  }

  return { plugins, limitTriggered, limitCheckDisabled };
}

/**
 * Script extender modules not already covered by a plugin name join as DLLs,
 * as do Vulkan layers that only show up under MODULES.
 */
export function mergeModulePlugins(plugins: PluginMap, xseModules: ReadonlySet<string>, allModules: Segment): void {
  const keys = [...plugins.keys()];
  for (const module of xseModules) {
    if (keys.every(key => !key.includes(module))) plugins.set(module, ORIGIN_DLL);
  }
  for (const line of allModules) {
    if (!line.toLowerCase().includes("vulkan")) continue;
    const [name] = line.trim().split(" ", 1);
    if (name) plugins.set(name, ORIGIN_DLL);
  }
}

export function removeIgnoredPlugins(plugins: PluginMap, ignore: readonly string[]): void {
  if (!ignore.length) return;
  const ignored = new Set(ignore.map(name => name.toLowerCase()));
  for (const name of [...plugins.keys()]) {
    if (ignored.has(name.toLowerCase())) plugins.delete(name);
  }
}

/** The game master in the plugin list means the crash generator got the full load order */
export function hasGameMaster(segment: Segment, gameName: string): boolean {
  const master = `${gameName}.esm`;
  return segment.some(line => line.includes(master));
}
