/**
 * ScanSession - one pass over every crash log in the configured folders.
 *
 *   discover → reformat in place → cache bytes → read loadorder.txt once
 *   → analyse through a bounded pool → write <stem>-AUTOSCAN.md per log
 *   → copy unsolved logs to the backup folder
 *
 * A log that fails never stops its siblings; it only shows up in the stats.
 */
import { copyFile, mkdir, readdir, stat, writeFile } from "fs/promises";
import path from "path";
import { logger, Once, runPool, type ScanConfig } from "../utils/index.js";
import { CrashLogAnalyzer, type AnalysisResult } from "./crashlog-analyzer.js";
import { reformatCrashLogs } from "./crashlog-reformatter.js";
import { checkFileIntegrity } from "./file-integrity.js";
import type { FormIdLookup } from "./formid-correlator.js";
import { LogCache } from "./log-cache.js";
import { readLoadOrderFile, type LoadOrderFileResult } from "./plugin-load-order.js";
import type { RuleSet } from "./rules-loader.js";
import { emptyStats, type ScanStats } from "./shared.js";

const CRASH_LOG = /^crash-.*\.log$/i;
const CRASH_TEXT = /^crash-.*\.txt$/i;
export const REPORT_SUFFIX = "-AUTOSCAN.md";

export interface DiscoveredLogs {
  logs: string[];
  /** crash-*.txt files: renamed or re-saved logs the scanner will not read */
  invalid: string[];
}

export interface ScanSummary {
  stats: ScanStats;
  /** Written report paths, in log order */
  reports: string[];
  invalid: string[];
  failedLogs: string[];
  durationMs: number;
}

export interface ScanSessionOptions {
  config: ScanConfig;
  rules: RuleSet;
  formIdLookup?: FormIdLookup | null;
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await stat(file);
    return true;
  } catch {
    return false;
  }
}

export function reportPathFor(logPath: string): string {
  const ext = path.extname(logPath);
  return path.join(path.dirname(logPath), `${path.basename(logPath, ext)}${REPORT_SUFFIX}`);
}

/**
 * crash-*.log under `scanDir` (recursive) and directly in `customDir`.
 * The first file with a given name wins; results are sorted by name.
 */
export async function discoverCrashLogs(scanDir: string, customDir: string | null = null): Promise<DiscoveredLogs> {
  const seen = new Map<string, string>();
  const invalid: string[] = [];

  const visit = async (dir: string, recursive: boolean) => {
    if (!(await isDirectory(dir))) {
      logger.warn(`Scan folder ${dir} does not exist`, { module: "Scan" });
      return;
    }
    const entries = (await readdir(dir, { recursive })).sort();
    for (const relative of entries) {
      const name = path.basename(relative);
      const full = path.join(dir, relative);
      if (CRASH_TEXT.test(name)) invalid.push(full);
      if (!CRASH_LOG.test(name) || seen.has(name)) continue;
      try {
        if ((await stat(full)).isFile()) seen.set(name, full);
      } catch (e) {
        logger.warn(`Skipping ${full}: ${(e as Error).message}`, { module: "Scan" });
      }
    }
  };

  await visit(scanDir, true);
  if (customDir && path.resolve(customDir) !== path.resolve(scanDir)) await visit(customDir, false);

  const logs = [...seen.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, full]) => full);
  return { logs, invalid };
}

export class ScanSession {
  private analyzer: Promise<CrashLogAnalyzer> | null = null;

  constructor(private readonly options: ScanSessionOptions) {}

  /** Built on first use: loadorder.txt is read once per session */
  getAnalyzer(): Promise<CrashLogAnalyzer> {
    if (!this.analyzer) this.analyzer = this.createAnalyzer();
    return this.analyzer;
  }

  private async createAnalyzer(): Promise<CrashLogAnalyzer> {
    const { config, rules } = this.options;
    let loadOrder: LoadOrderFileResult | null = null;
    if (await exists(config.loadOrderPath)) {
      loadOrder = await readLoadOrderFile(config.loadOrderPath, rules.scanner.name);
      logger.info(`Using ${loadOrder.plugins.size} plugins from ${config.loadOrderPath}`, { module: "Scan" });
    }
    const integrity = config.fcxMode
      ? new Once(() => checkFileIntegrity(rules, { gameRoot: config.gameRoot }))
      : null;

    return new CrashLogAnalyzer({
      rules,
      settings: {
        fcxMode: config.fcxMode,
        showFormIdValues: config.showFormIdValues,
        ignorePlugins: config.ignorePlugins,
      },
      loadOrder,
      formIdLookup: this.options.formIdLookup ?? null,
      integrity,
    });
  }

  async run(): Promise<ScanSummary> {
    const start = Date.now();
    const { config, rules } = this.options;
    const stats = emptyStats();

    const { logs, invalid } = await discoverCrashLogs(config.scanDir, config.customScanDir);
    logger.info(`Found ${logs.length} crash logs`, { module: "Scan" });
    for (const file of invalid) logger.warn(`Not a crash log (.txt): ${file}`, { module: "Scan" });

    await reformatCrashLogs(logs, { simplify: config.simplifyLogs, removeList: rules.excludeLogRecords });
    const cache = await LogCache.load(logs);
    const analyzer = await this.getAnalyzer();

    const outcomes = await runPool(logs, config.workers, async (file): Promise<AnalysisResult> => {
      const name = path.basename(file);
      const result = await analyzer.analyze(name, await cache.readLines(name));
      await writeFile(reportPathFor(file), result.report, "utf-8");
      return result;
    });

    const reports: string[] = [];
    const failedLogs: string[] = [];
    outcomes.forEach((outcome, i) => {
      const file = logs[i];
      if (outcome.status === "rejected") {
        const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        logger.error(`Scan of ${path.basename(file)} failed: ${reason}`, { module: "Scan", file });
        stats.failed++;
        failedLogs.push(file);
        return;
      }
      reports.push(reportPathFor(file));
      if (outcome.value.failed) {
        stats.failed++;
        failedLogs.push(file);
      } else {
        stats.scanned++;
        if (outcome.value.incomplete) stats.incomplete++;
      }
    });

    if (config.moveUnsolvedLogs && failedLogs.length) await this.backupUnsolved(failedLogs);

    const durationMs = Date.now() - start;
    logger.info(
      `Scanned ${stats.scanned}, incomplete ${stats.incomplete}, failed ${stats.failed}`,
      { module: "Scan", duration: `${durationMs}ms` },
    );
    return { stats, reports, invalid, failedLogs, durationMs };
  }

  /** Copies, never moves: the original logs stay where the game wrote them */
  private async backupUnsolved(files: readonly string[]): Promise<void> {
    const dir = this.options.config.backupDir;
    await mkdir(dir, { recursive: true });
    for (const file of files) {
      for (const source of [file, reportPathFor(file)]) {
        if (!(await exists(source))) continue;
        await copyFile(source, path.join(dir, path.basename(source)));
      }
    }
    logger.info(`Copied ${files.length} unsolved logs to ${dir}`, { module: "Scan" });
  }
}
