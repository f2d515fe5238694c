/**
 * Centralised configuration - every value comes from the environment (.env),
 * CLI flags override on top via `{ ...loadScanConfig(), ...overrides }`.
 */
import { cpus } from "os";

type Env = Record<string, string | undefined>;

export interface ScanConfig {
  /** Directory searched recursively for crash-*.log files */
  scanDir: string;
  /** Extra directory searched at top level only */
  customScanDir: string | null;
  rulesPath: string;
  loadOrderPath: string;
  /** Game install folder; needed for FCX checks and the config audit */
  gameRoot: string | null;
  workers: number;
  fcxMode: boolean;
  showFormIdValues: boolean;
  simplifyLogs: boolean;
  moveUnsolvedLogs: boolean;
  backupDir: string;
  /** Plugins the user never wants to see in a report (case-insensitive) */
  ignorePlugins: string[];
}

export const DEFAULT_WORKERS = Math.max(1, Math.min(cpus().length || 4, 8));

function flag(value: string | undefined, def = false): boolean {
  if (value === undefined || value === "") return def;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function list(value: string | undefined): string[] {
  return (value || "").split(",").map(s => s.trim()).filter(Boolean);
}

export function loadScanConfig(env: Env = process.env): ScanConfig {
  const workers = parseInt(env.SCAN_WORKERS || "", 10);
  return {
    scanDir: env.SCAN_DIR || process.cwd(),
    customScanDir: env.SCAN_CUSTOM_DIR || null,
    rulesPath: env.RULES_PATH || "data/fallout4.json",
    loadOrderPath: env.LOADORDER_PATH || "loadorder.txt",
    gameRoot: env.GAME_ROOT || null,
    workers: Number.isInteger(workers) && workers > 0 ? workers : DEFAULT_WORKERS,
    fcxMode: flag(env.FCX_MODE),
    showFormIdValues: flag(env.SHOW_FORMID_VALUES),
    simplifyLogs: flag(env.SIMPLIFY_LOGS),
    moveUnsolvedLogs: flag(env.MOVE_UNSOLVED_LOGS),
    backupDir: env.BACKUP_DIR || "crashlens-backup/unsolved-logs",
    ignorePlugins: list(env.IGNORE_PLUGINS),
  };
}

export interface FormIdDbConfig {
  uris: string[];
  /** Table holding (formid, plugin, entry) rows, named after the game by default */
  table: string | null;
  connectionLimit: number;
}

export function loadFormIdDbConfig(env: Env = process.env): FormIdDbConfig {
  return {
    uris: list(env.FORMID_DB_URIS),
    table: env.FORMID_TABLE || null,
    connectionLimit: parseInt(env.FORMID_DB_CONNECTIONS || "4", 10),
  };
}
