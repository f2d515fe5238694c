/**
 * Crash log normalisation, run once over every log before it is read.
 *
 * Older crash generator builds pad load order slots with spaces ("[ 1]",
 * "[FE:  0]"); they become zeros ("[01]", "[FE:000]") so one pattern parses
 * every version. With simplify on, lines holding an excluded record are
 * dropped. Running it twice changes nothing.
 */
import { readFile, writeFile } from "fs/promises";
import { logger } from "../utils/index.js";

export interface ReformatOptions {
  simplify: boolean;
  /** Substrings whose lines are removed when simplifying */
  removeList: readonly string[];
}

/** Split keeping each line's terminator so a rewrite is byte-faithful */
export function splitKeepingEol(text: string): string[] {
  if (!text) return [];
  return text.split(/(?<=\n)/);
}

export function reformatLines(lines: readonly string[], options: ReformatOptions): string[] {
  const removeList = options.removeList.filter(Boolean);
  const out: string[] = [];
  // Walk bottom-up: everything below the last "PLUGINS:" line is the plugin list
  let inPlugins = true;

  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (inPlugins && line.startsWith("PLUGINS:")) inPlugins = false;
    if (options.simplify && removeList.some(s => line.includes(s))) continue;

    const open = line.indexOf("[");
    const close = open === -1 ? -1 : line.indexOf("]", open + 1);
    if (inPlugins && close !== -1) {
      out.push(`${line.slice(0, open + 1)}${line.slice(open + 1, close).replaceAll(" ", "0")}${line.slice(close)}`);
    } else {
      out.push(line);
    }
  }
  return out.reverse();
}

export function reformatText(text: string, options: ReformatOptions): string {
  return reformatLines(splitKeepingEol(text), options).join("");
}

/** Rewrites each file in place; a file that cannot be read or written is logged and left alone */
export async function reformatCrashLogs(paths: readonly string[], options: ReformatOptions): Promise<number> {
  let rewritten = 0;
  for (const path of paths) {
    try {
      const original = await readFile(path, "utf-8");
      const formatted = reformatText(original, options);
      if (formatted !== original) {
        await writeFile(path, formatted, "utf-8");
        rewritten++;
      }
    } catch (e) {
      logger.warn(`Cannot reformat ${path}: ${(e as Error).message}`, { module: "Reformat" });
    }
  }
  logger.debug(`Reformatted ${rewritten}/${paths.length} crash logs`, { module: "Reformat" });
  return rewritten;
}
