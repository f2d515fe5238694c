#!/usr/bin/env node
/**
 * Crashlens CLI
 *
 * Scans crash-*.log files and writes an AUTOSCAN report next to each one,
 * or audits the settings files of a game install.
 *
 * Usage:
 *   npx tsx scan.ts scan [--dir <path>] [--rules <path>] [--workers <n>]
 *   npx tsx scan.ts audit [--game-root <path>] [--dry-run]
 *
 * Environment variables (or .env file): see .env.example
 */
import "dotenv/config";
import {
  ConfigurationAuditor,
  FormIdLookupService,
  loadRuleSet,
  renderAudit,
  ScanSession,
  type RuleSet,
  type ScanSummary,
} from "./src/services/index.js";
import { loadFormIdDbConfig, loadScanConfig, logger, RuleDataError, type ScanConfig } from "./src/utils/index.js";

const HELP = `
Crashlens - crash log analyzer

Usage:
  npx tsx scan.ts scan [options]
  npx tsx scan.ts audit [options]

Scan options:
  --dir, -d <path>      Folder searched recursively for crash-*.log (SCAN_DIR)
  --custom <path>       Extra folder, top level only (SCAN_CUSTOM_DIR)
  --rules, -r <path>    Rule dataset JSON (RULES_PATH, default data/fallout4.json)
  --workers, -w <n>     Logs analysed in parallel (SCAN_WORKERS)
  --fcx                 Check game files and settings too (FCX_MODE)
  --formid-values       Show FormID descriptions from FORMID_DB_URIS (SHOW_FORMID_VALUES)
  --simplify            Remove excluded records from the logs (SIMPLIFY_LOGS)
  --move-unsolved       Copy failed logs to BACKUP_DIR (MOVE_UNSOLVED_LOGS)

Audit options:
  --game-root, -g <path>  Game install folder (GAME_ROOT)
  --dry-run               Report fixes without writing them

  --help, -h            Show this help

Environment:
  LOG_LEVEL             debug | info | warn | error (default: info)
`;

type Command = "scan" | "audit";

interface CliArgs {
  command: Command;
  overrides: Partial<ScanConfig>;
  dryRun: boolean;
}

// ── Parse CLI args ──────────────────────────────────────────
function parseArgs(argv: string[]): CliArgs {
  const args = [...argv];
  let command: Command = "scan";
  if (args[0] === "scan" || args[0] === "audit") command = args.shift() === "audit" ? "audit" : "scan";

  const overrides: Partial<ScanConfig> = {};
  let dryRun = false;
  const value = (i: number, flag: string): string => {
    const next = args[i + 1];
    if (next === undefined || next.startsWith("-")) {
      console.error(`Error: ${flag} needs a value.`);
      process.exit(1);
    }
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--help":
      case "-h":
        console.log(HELP);
        process.exit(0);
      case "--dir":
      case "-d":
        overrides.scanDir = value(i++, arg);
        break;
      case "--custom":
        overrides.customScanDir = value(i++, arg);
        break;
      case "--rules":
      case "-r":
        overrides.rulesPath = value(i++, arg);
        break;
      case "--workers":
      case "-w": {
        const workers = parseInt(value(i++, arg), 10);
        if (!Number.isInteger(workers) || workers < 1) {
          console.error("Error: --workers must be a positive integer.");
          process.exit(1);
        }
        overrides.workers = workers;
        break;
      }
      case "--game-root":
      case "-g":
        overrides.gameRoot = value(i++, arg);
        break;
      case "--fcx":
        overrides.fcxMode = true;
        break;
      case "--formid-values":
        overrides.showFormIdValues = true;
        break;
      case "--simplify":
        overrides.simplifyLogs = true;
        break;
      case "--move-unsolved":
        overrides.moveUnsolvedLogs = true;
        break;
      case "--dry-run":
        dryRun = true;
        break;
      default:
        console.error(`Error: unknown option ${arg}. Use --help for usage.`);
        process.exit(1);
    }
  }

  return { command, overrides, dryRun };
}

function randomHint(rules: RuleSet): string | null {
  if (!rules.hints.length) return null;
  return rules.hints[Math.floor(Math.random() * rules.hints.length)];
}

function printSummary(summary: ScanSummary, rules: RuleSet): void {
  const { stats } = summary;
  logger.info("═══════════════════════════════════════════");
  logger.info(`✅ Scan complete in ${(summary.durationMs / 1000).toFixed(1)}s`);
  logger.info(`   Scanned:      ${stats.scanned}`);
  logger.info(`   Incomplete:   ${stats.incomplete}`);
  logger.info(`   Failed:       ${stats.failed}`);
  if (summary.invalid.length) {
    logger.warn(`   Invalid (.txt): ${summary.invalid.length}`);
    for (const file of summary.invalid) logger.warn(`     - ${file}`);
  }
  if (stats.failed) {
    logger.warn("   Logs shorter than 20 lines or unreadable cannot be analysed:");
    for (const file of summary.failedLogs) logger.warn(`     - ${file}`);
  }
  logger.info("═══════════════════════════════════════════");
  const hint = randomHint(rules);
  if (hint) logger.info(hint);
}

// ── Commands ────────────────────────────────────────────────
async function runScan(config: ScanConfig, rules: RuleSet): Promise<void> {
  const formIdLookup = config.showFormIdValues
    ? FormIdLookupService.fromConfig(loadFormIdDbConfig(), rules.game.name)
    : null;
  if (config.showFormIdValues && !formIdLookup) {
    logger.warn("SHOW_FORMID_VALUES is on but FORMID_DB_URIS is empty, FormID values will not be shown");
  }

  try {
    const summary = await new ScanSession({ config, rules, formIdLookup }).run();
    printSummary(summary, rules);
  } finally {
    if (formIdLookup) await formIdLookup.close();
  }
}

async function runAudit(config: ScanConfig, rules: RuleSet, dryRun: boolean): Promise<void> {
  if (!config.gameRoot) {
    console.error("Error: game folder required. Use --game-root <path> or set GAME_ROOT.");
    process.exit(1);
  }
  const auditor = await ConfigurationAuditor.forGameRoot(config.gameRoot, { gameName: rules.game.name, dryRun });
  const report = renderAudit(await auditor.audit());
  console.log(report || "No settings problems found.");
}

// ── Main ────────────────────────────────────────────────────
async function main() {
  const { command, overrides, dryRun } = parseArgs(process.argv.slice(2));
  const config: ScanConfig = { ...loadScanConfig(), ...overrides };

  let rules: RuleSet;
  try {
    rules = loadRuleSet(config.rulesPath);
  } catch (e) {
    if (e instanceof RuleDataError) {
      console.error(`Error: ${e.message}`);
      process.exit(1);
    }
    throw e;
  }

  if (command === "audit") await runAudit(config, rules, dryRun);
  else await runScan(config, rules);
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
