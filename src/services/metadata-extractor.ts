/**
 * MetadataExtractor - header facts of a crash log plus the small parsers
 * that turn raw segments into structured values.
 */
import type { CrashgenSettings, GpuInfo, Segment } from "./shared.js";

export const UNKNOWN = "UNKNOWN";

export interface CrashLogMetadata {
  /** e.g. "Fallout 4 v1.10.163" */
  gameVersion: string;
  /** e.g. "Buffout 4 v1.28.6" */
  crashgenVersion: string;
  /** "Unhandled exception ..." with its first "|" turned back into a newline */
  mainError: string;
}

/** Each field takes the first matching line, independently of the other two */
export function extractMetadata(lines: readonly string[], gameRootName: string, crashgenName: string): CrashLogMetadata {
  let gameVersion: string | null = null;
  let crashgenVersion: string | null = null;
  let mainError: string | null = null;

  for (const line of lines) {
    if (gameVersion === null && gameRootName && line.startsWith(gameRootName)) gameVersion = line.trim();
    if (crashgenVersion === null && line.startsWith(crashgenName)) crashgenVersion = line.trim();
    if (mainError === null && line.startsWith("Unhandled exception")) mainError = line.replace("|", "\n");
    if (gameVersion !== null && crashgenVersion !== null && mainError !== null) break;
  }

  return {
    gameVersion: gameVersion ?? UNKNOWN,
    crashgenVersion: crashgenVersion ?? UNKNOWN,
    mainError: mainError ?? UNKNOWN,
  };
}

export function detectGpu(system: Segment): GpuInfo {
  if (system.some(line => line.includes("GPU #1") && line.includes("AMD"))) return { name: "AMD", rival: "nvidia" };
  if (system.some(line => line.includes("GPU #1") && line.includes("Nvidia"))) return { name: "Nvidia", rival: "amd" };
  return { name: "Unknown", rival: null };
}

/**
 * Script extender modules, version suffix dropped and lowercased:
 * "Buffout4.dll v1.28.6" → "buffout4.dll"
 */
export function extractModuleNames(xseModules: Segment): Set<string> {
  const names = new Set<string>();
  for (const raw of xseModules) {
    const text = raw.trim();
    if (!text) continue;
    const match = /^(.*?\.dll)\s*v?.*$/i.exec(text);
    names.add((match ? match[1] : text).toLowerCase());
  }
  return names;
}

/**
 * "key: value" pairs of the crash generator's own settings block.
 * Booleans and plain decimals are typed, everything else stays text.
 */
export function parseCrashgenSettings(crashgen: Segment): CrashgenSettings {
  const settings: CrashgenSettings = new Map();
  for (const line of crashgen) {
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    const key = line.slice(0, colon);
    const value = line.slice(colon + 1);
    const trimmed = value.trim();
    if (value === " true") settings.set(key, true);
    else if (value === " false") settings.set(key, false);
    else if (/^\d+$/.test(trimmed)) settings.set(key, parseInt(trimmed, 10));
    else settings.set(key, trimmed);
  }
  return settings;
}
