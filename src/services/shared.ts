/**
 * Shared types for the crash log analysis services
 */
import type { RowDataPacket } from "mysql2/promise";

/** A single row returned by mysql2 queries */
export type Row = RowDataPacket & Record<string, unknown>;

/** Stripped lines between two boundary markers; empty when the markers are missing */
export type Segment = string[];

export interface CrashLogSegments {
  crashgen: Segment;
  system: Segment;
  callStack: Segment;
  allModules: Segment;
  xseModules: Segment;
  plugins: Segment;
}

export const ORIGIN_DLL = "DLL";
export const ORIGIN_UNKNOWN = "???";
export const ORIGIN_LOADORDER = "LO";

/**
 * Plugin file name → origin tag: a load order slot ("2A", "FE001"), "DLL",
 * "???" or "LO". Insertion ordered, first occurrence wins.
 */
export type PluginMap = Map<string, string>;

export type CrashgenSettingValue = boolean | number | string;
export type CrashgenSettings = Map<string, CrashgenSettingValue>;

export type GpuVendor = "nvidia" | "amd";

export interface GpuInfo {
  name: "AMD" | "Nvidia" | "Unknown";
  rival: GpuVendor | null;
}

export interface ScanStats {
  scanned: number;
  incomplete: number;
  failed: number;
}

export function emptyStats(): ScanStats {
  return { scanned: 0, incomplete: 0, failed: 0 };
}

/** Ordered, append-only report fragments, joined once at the end */
export class ReportBuffer {
  private readonly parts: string[] = [];

  add(...fragments: string[]): this {
    this.parts.push(...fragments);
    return this;
  }

  get fragments(): readonly string[] {
    return this.parts;
  }

  get length(): number {
    return this.parts.length;
  }

  toString(): string {
    return this.parts.join("");
  }
}
