/**
 * Read-through cache of crash log bytes, keyed by file name. Filled once
 * before the analyses start so workers never touch the disk for input.
 */
import { readFile } from "fs/promises";
import path from "path";
import { logger, LogReadError } from "../utils/index.js";

/** Line split that drops the terminators, like splitting on \n, \r\n or \r */
export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export class LogCache {
  private readonly entries = new Map<string, Buffer>();
  private readonly paths = new Map<string, string>();

  static async load(files: readonly string[]): Promise<LogCache> {
    const cache = new LogCache();
    await Promise.all(files.map(async file => {
      const name = path.basename(file);
      cache.paths.set(name, file);
      try {
        cache.entries.set(name, await readFile(file));
      } catch (e) {
        logger.warn(`Cannot cache ${file}: ${(e as Error).message}`, { module: "LogCache" });
      }
    }));
    return cache;
  }

  /** Cached bytes, read from disk on a miss */
  async get(name: string): Promise<Buffer> {
    const cached = this.entries.get(name);
    if (cached) return cached;
    const file = this.paths.get(name);
    if (!file) throw new LogReadError(name, new Error("not part of this scan"));
    try {
      const buffer = await readFile(file);
      this.entries.set(name, buffer);
      return buffer;
    } catch (e) {
      throw new LogReadError(name, e);
    }
  }

  /** Decoded as UTF-8, invalid bytes replaced */
  async readLines(name: string): Promise<string[]> {
    return splitLines((await this.get(name)).toString("utf-8"));
  }

  pathOf(name: string): string | undefined {
    return this.paths.get(name);
  }

  names(): string[] {
    return [...this.paths.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
