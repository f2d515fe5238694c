/**
 * Checks of the crash generator's own settings, read from the log's
 * [Compatibility] block, against the script extender modules installed.
 */
import { compareVersions, type Version } from "../utils/index.js";
import type { CrashgenSettings, ReportBuffer } from "./shared.js";

const XCELL_MODULES = ["x-cell-fo4.dll", "x-cell-og.dll", "x-cell-ng2.dll"];
const BAKA_MODULE = "bakascrapheap.dll";
const ARCHIVE_LIMIT_SINCE: Version = [1, 27, 0];

/** Allocators X-Cell replaces; the crash generator must leave them off */
const XCELL_ALLOCATORS: Array<[string, string]> = [
  ["HavokMemorySystem", "Havok Memory System"],
  ["BSTextureStreamerLocalHeap", "BSTextureStreamerLocalHeap"],
  ["ScaleformAllocator", "Scaleform Allocator"],
  ["SmallBlockAllocator", "Small Block Allocator"],
];

export interface CrashgenCheckOptions {
  crashgenName: string;
  crashgenVersion: Version;
  latestVersion: Version;
  /** Settings that may be off without a notice */
  ignore: readonly string[];
  fcxMode: boolean;
}

export function hasXCell(modules: ReadonlySet<string>): boolean {
  return XCELL_MODULES.some(m => modules.has(m));
}

export function checkCrashgenSettings(
  settings: CrashgenSettings,
  modules: ReadonlySet<string>,
  options: CrashgenCheckOptions,
  report: ReportBuffer,
): void {
  const name = options.crashgenName;
  const xcell = hasXCell(modules);
  const baka = modules.has(BAKA_MODULE);

  const ok = (message: string) => report.add(`✔️ ${message}\n-----\n`);
  const caution = (warning: string, fix: string) => report.add(`# ❌ CAUTION : ${warning} # \n`, ` FIX: ${fix}\n-----\n`);

  // Without FCX mode the memory checks below already cover these settings
  const ignore = new Set(options.ignore);
  if (!options.fcxMode) {
    if (xcell) {
      for (const key of ["MemoryManager", "HavokMemorySystem", "ScaleformAllocator", "SmallBlockAllocator"]) ignore.add(key);
    } else if (baka) {
      ignore.add("MemoryManager");
    }
  }

  if (!settings.size) return;

  for (const [key, value] of settings) {
    if (value === false && !ignore.has(key)) {
      report.add(`* NOTICE : ${key} is disabled in your ${name} settings, is this intentional? * \n-----\n`);
    }
  }

  // Achievements
  if (settings.get("Achievements") && (modules.has("achievements.dll") || modules.has("unlimitedsurvivalmode.dll"))) {
    caution(
      "The Achievements Mod and/or Unlimited Survival Mode is installed, but Achievements is set to TRUE",
      `Open ${name}'s TOML file and change Achievements to FALSE, this prevents conflicts with ${name}.`,
    );
  } else {
    ok(`Achievements parameter is correctly configured in your ${name} settings! `);
  }

  // Memory management
  if (settings.get("MemoryManager")) {
    if (xcell) {
      caution(
        "X-Cell is installed, but MemoryManager parameter is set to TRUE",
        `Open ${name}'s TOML file and change MemoryManager to FALSE, this prevents conflicts with X-Cell.`,
      );
    } else if (baka) {
      caution(
        `The Baka ScrapHeap Mod is installed, but is redundant with ${name}`,
        `Uninstall the Baka ScrapHeap Mod, this prevents conflicts with ${name}.`,
      );
    } else {
      ok(`Memory Manager parameter is correctly configured in your ${name} settings!`);
    }
  } else if (xcell) {
    if (baka) {
      caution(
        "The Baka ScrapHeap Mod is installed, but is redundant with X-Cell",
        "Uninstall the Baka ScrapHeap Mod, this prevents conflicts with X-Cell.",
      );
    } else {
      ok(`Memory Manager parameter is correctly configured for use with X-Cell in your ${name} settings!`);
    }
  } else if (baka) {
    caution(
      `The Baka ScrapHeap Mod is installed, but is redundant with ${name}`,
      `Uninstall the Baka ScrapHeap Mod and open ${name}'s TOML file and change MemoryManager to TRUE, this improves performance.`,
    );
  }

  if (xcell) {
    for (const [key, label] of XCELL_ALLOCATORS) {
      if (settings.get(key)) {
        caution(
          `X-Cell is installed, but ${key} parameter is set to TRUE`,
          `Open ${name}'s TOML file and change ${key} to FALSE, this prevents conflicts with X-Cell.`,
        );
      } else {
        ok(`${label} parameter is correctly configured for use with X-Cell in your ${name} settings!`);
      }
    }
  }

  // ArchiveLimit only exists on current releases
  if (compareVersions(options.latestVersion, options.crashgenVersion) <= 0
    && compareVersions(options.crashgenVersion, ARCHIVE_LIMIT_SINCE) >= 0) {
    if (settings.get("ArchiveLimit")) {
      caution(
        "ArchiveLimit is set to TRUE, this setting is known to cause instability.",
        `Open ${name}'s TOML file and change ArchiveLimit to FALSE.`,
      );
    } else {
      ok(`ArchiveLimit parameter is correctly configured in your ${name} settings! `);
    }
  }

  // Looks Menu
  if (settings.has("F4EE")) {
    if (!settings.get("F4EE") && modules.has("f4ee.dll")) {
      caution(
        "Looks Menu is installed, but F4EE parameter under [Compatibility] is set to FALSE",
        `Open ${name}'s TOML file and change F4EE to TRUE, this prevents bugs and crashes from Looks Menu.`,
      );
    } else {
      ok(`F4EE (Looks Menu) parameter is correctly configured in your ${name} settings! `);
    }
  }
}
