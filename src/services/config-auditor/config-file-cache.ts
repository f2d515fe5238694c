/**
 * ConfigFileCache - every *.ini / *.conf file under the game folder, keyed
 * by lowercased file name, loaded lazily and typed on read.
 *
 * A second file with a known name counts as a duplicate when it has the
 * same SHA-256, the same size and mtime, or (for INI files) the same parsed
 * content. Files inside a whitelisted folder (F4EE keeps per-preset copies)
 * are never reported.
 */
import { createHash } from "crypto";
import { readdir, readFile, stat, writeFile } from "fs/promises";
import path from "path";
import { logger } from "../../utils/index.js";
import { IniFile, sameIniContent } from "./ini-file.js";

const CONFIG_FILE = /\.(ini|conf)$/i;
const BOOLEAN_STATES: Record<string, boolean> = {
  "1": true, yes: true, true: true, on: true,
  "0": false, no: false, false: false, off: false,
};

export const DEFAULT_DUPLICATE_WHITELIST = ["F4EE"];

async function sha256(file: string): Promise<string> {
  return createHash("sha256").update(await readFile(file)).digest("hex");
}

export class ConfigFileCache {
  private readonly files = new Map<string, string>();
  private readonly loaded = new Map<string, IniFile>();
  /** lowercased name → every copy after the first */
  readonly duplicates = new Map<string, string[]>();

  private constructor(readonly root: string) {}

  static async scan(root: string, whitelist: readonly string[] = DEFAULT_DUPLICATE_WHITELIST): Promise<ConfigFileCache> {
    const cache = new ConfigFileCache(root);
    let entries: string[];
    try {
      entries = (await readdir(root, { recursive: true })).sort();
    } catch (e) {
      logger.warn(`Cannot list ${root}: ${(e as Error).message}`, { module: "ConfigAudit" });
      return cache;
    }

    for (const relative of entries) {
      const name = path.basename(relative);
      if (!CONFIG_FILE.test(name)) continue;
      const full = path.join(root, relative);
      try {
        if (!(await stat(full)).isFile()) continue;
      } catch (e) {
        logger.warn(`Skipping ${full}: ${(e as Error).message}`, { module: "ConfigAudit" });
        continue;
      }

      const key = name.toLowerCase();
      const first = cache.files.get(key);
      if (first === undefined) {
        cache.files.set(key, full);
        continue;
      }
      const folders = path.dirname(relative).split(/[\\/]/);
      if (folders.some(folder => whitelist.includes(folder))) continue;
      if (await cache.isDuplicate(first, full)) {
        const copies = cache.duplicates.get(key) ?? [];
        copies.push(full);
        cache.duplicates.set(key, copies);
      }
    }

    logger.debug(`Found ${cache.files.size} config files under ${root}`, { module: "ConfigAudit" });
    return cache;
  }

  /** A copy that cannot be read is logged and not counted */
  private async isDuplicate(first: string, other: string): Promise<boolean> {
    try {
      if ((await sha256(first)) === (await sha256(other))) return true;
      const [a, b] = await Promise.all([stat(first), stat(other)]);
      if (a.size === b.size && a.mtimeMs === b.mtimeMs) return true;
      if (!first.toLowerCase().endsWith(".ini") || !other.toLowerCase().endsWith(".ini")) return false;
      const [left, right] = await Promise.all([readFile(first), readFile(other)]);
      return sameIniContent(IniFile.fromBuffer(left), IniFile.fromBuffer(right));
    } catch (e) {
      logger.warn(`Cannot compare ${other} with ${first}: ${(e as Error).message}`, { module: "ConfigAudit" });
      return false;
    }
  }

  has(name: string): boolean {
    return this.files.has(name.toLowerCase());
  }

  pathOf(name: string): string | undefined {
    return this.files.get(name.toLowerCase());
  }

  names(): string[] {
    return [...this.files.keys()];
  }

  /** Parsed file, or null when it is unknown or unreadable */
  async load(name: string): Promise<IniFile | null> {
    const key = name.toLowerCase();
    const cached = this.loaded.get(key);
    if (cached) return cached;
    const file = this.files.get(key);
    if (!file) return null;
    try {
      const ini = IniFile.fromBuffer(await readFile(file));
      this.loaded.set(key, ini);
      return ini;
    } catch (e) {
      logger.warn(`Cannot read ${file}: ${(e as Error).message}`, { module: "ConfigAudit" });
      return null;
    }
  }

  async getString(name: string, section: string, key: string): Promise<string | undefined> {
    return (await this.load(name))?.get(section, key);
  }

  async getBoolean(name: string, section: string, key: string): Promise<boolean | undefined> {
    const value = await this.getString(name, section, key);
    return value === undefined ? undefined : BOOLEAN_STATES[value.toLowerCase()];
  }

  async getInt(name: string, section: string, key: string): Promise<number | undefined> {
    const value = await this.getString(name, section, key);
    return value !== undefined && /^[+-]?\d+$/.test(value) ? parseInt(value, 10) : undefined;
  }

  async getFloat(name: string, section: string, key: string): Promise<number | undefined> {
    const value = await this.getString(name, section, key);
    return value !== undefined && /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(value) ? parseFloat(value) : undefined;
  }

  /** Update a setting; written to disk unless `dryRun`. A failed write rejects */
  async set(name: string, section: string, key: string, value: string, dryRun = false): Promise<boolean> {
    const ini = await this.load(name);
    const file = this.pathOf(name);
    if (!ini || !file) return false;
    ini.set(section, key, value);
    if (!dryRun) await writeFile(file, ini.toBuffer());
    return true;
  }
}
