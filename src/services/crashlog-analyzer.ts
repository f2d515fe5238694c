/**
 * CrashLogAnalyzer - turns the lines of one crash log into its AUTOSCAN
 * report. Everything session-wide (rules, load order override, FormID
 * lookup, integrity check) comes in through the context; a single analyzer
 * serves every log of a scan concurrently.
 */
import { compareVersions, logger, parseVersionText, type Once } from "../utils/index.js";
import { checkCrashgenSettings } from "./crashgen-settings.js";
import { extractFormIds, reportFormIds, type FormIdLookup } from "./formid-correlator.js";
import {
  detectGpu,
  extractMetadata,
  extractModuleNames,
  parseCrashgenSettings,
  type CrashLogMetadata,
} from "./metadata-extractor.js";
import { detectConflictingMods, detectImportantMods, detectSingleMods } from "./mod-detector.js";
import {
  hasGameMaster,
  mergeModulePlugins,
  removeIgnoredPlugins,
  scanLogPlugins,
  type LoadOrderFileResult,
} from "./plugin-load-order.js";
import { countPluginsInStack, findNamedRecords, reportNamedRecords, reportPluginSuspects } from "./record-correlator.js";
import type { RuleSet } from "./rules-loader.js";
import { extractCrashLogSegments } from "./segment-extractor.js";
import { ReportBuffer, type PluginMap } from "./shared.js";
import { dllNotice, scanCallStack, scanMainError } from "./suspect-matcher.js";

/** Logs shorter than this cannot hold a usable crash report */
export const MIN_LOG_LINES = 20;

const SEPARATOR = "====================================================\n";

export interface AnalyzerSettings {
  fcxMode: boolean;
  showFormIdValues: boolean;
  /** User ignore list, on top of the rule set's own */
  ignorePlugins: readonly string[];
}

export interface AnalyzerContext {
  rules: RuleSet;
  settings: AnalyzerSettings;
  /** Result of reading loadorder.txt; null when there is no such file */
  loadOrder: LoadOrderFileResult | null;
  formIdLookup: FormIdLookup | null;
  /** Game file checks, shared by every log of the session (FCX mode) */
  integrity: Once<string> | null;
}

export interface AnalysisResult {
  fileName: string;
  report: string;
  /** Too short to analyse; the report is still written */
  failed: boolean;
  /** Plugin list missing or cut short */
  incomplete: boolean;
  metadata: CrashLogMetadata;
}

function section(title: string): string[] {
  return [SEPARATOR, `${title}\n`, SEPARATOR];
}

export class CrashLogAnalyzer {
  constructor(private readonly context: AnalyzerContext) {}

  get rules(): RuleSet {
    return this.context.rules;
  }

  async analyze(fileName: string, lines: readonly string[], overrides: Partial<AnalyzerSettings> = {}): Promise<AnalysisResult> {
    const { rules, loadOrder } = this.context;
    const settings = { ...this.context.settings, ...overrides };
    const crashgenName = rules.crashgen.name;
    const report = new ReportBuffer();

    // ── Evidence ──────────────────────────────────────────
    const metadata = extractMetadata(lines, rules.game.rootName, crashgenName);
    const segments = extractCrashLogSegments(lines, rules.game.xseAcronym);
    const gameVersion = parseVersionText(metadata.gameVersion);
    const crashgenVersion = parseVersionText(metadata.crashgenVersion);
    const latest = parseVersionText(rules.crashgen.latest);
    const latestVr = parseVersionText(rules.crashgen.latestVr);

    const failed = lines.length < MIN_LOG_LINES;
    const logHasMaster = hasGameMaster(segments.plugins, rules.game.name);
    const incomplete = !failed && (!segments.plugins.length || !logHasMaster);

    report.add(
      `${fileName} -> AUTOSCAN REPORT GENERATED BY ${rules.scanner.version} \n`,
      "# FOR BEST VIEWING EXPERIENCE OPEN THIS FILE IN NOTEPAD++ OR SIMILAR # \n",
      "# PLEASE READ EVERYTHING CAREFULLY AND BEWARE OF FALSE POSITIVES # \n",
      SEPARATOR,
      `\nMain Error: ${metadata.mainError}\n`,
      `Detected ${crashgenName} Version: ${metadata.crashgenVersion} \n`,
      compareVersions(crashgenVersion, latest) >= 0 || compareVersions(crashgenVersion, latestVr) >= 0
        ? `* You have the latest version of ${crashgenName}! *\n\n`
        : `${rules.warnings.outdated} \n`,
    );

    const gpu = detectGpu(segments.system);
    const modules = extractModuleNames(segments.xseModules);

    let plugins: PluginMap;
    let pluginsLoaded: boolean;
    let limitTriggered = false;
    let limitCheckDisabled = false;
    if (loadOrder) {
      report.add(...loadOrder.notices);
      plugins = new Map(loadOrder.plugins);
      pluginsLoaded = loadOrder.loaded;
    } else {
      const scan = scanLogPlugins(segments.plugins, gameVersion, crashgenVersion, rules.game.versions);
      plugins = scan.plugins;
      pluginsLoaded = logHasMaster;
      limitTriggered = scan.limitTriggered;
      limitCheckDisabled = scan.limitCheckDisabled;
    }
    mergeModulePlugins(plugins, modules, segments.allModules);
    removeIgnoredPlugins(plugins, settings.ignorePlugins);

    // ── Known crash suspects ──────────────────────────────
    report.add(...section("CHECKING IF LOG MATCHES ANY KNOWN CRASH SUSPECTS..."));
    report.add(...dllNotice(metadata.mainError));
    const errorFound = scanMainError(rules.suspects.error, metadata.mainError, report);
    const stackFound = scanCallStack(rules.suspects.stack, metadata.mainError, segments.callStack.join("\n"), report);
    if (errorFound || stackFound) {
      report.add("* FOR DETAILED DESCRIPTIONS AND POSSIBLE SOLUTIONS TO ANY ABOVE DETECTED CRASH SUSPECTS *\n");
      report.add(rules.links.suspects ? `* SEE: ${rules.links.suspects} *\n\n` : "\n");
    } else {
      report.add(
        "# FOUND NO CRASH ERRORS / SUSPECTS THAT MATCH THE CURRENT DATABASE #\n",
        "Check below for mods that can cause frequent crashes and other problems.\n\n",
      );
    }

    // ── Files and settings ────────────────────────────────
    report.add(...section("CHECKING IF NECESSARY FILES/SETTINGS ARE CORRECT..."));
    await this.reportIntegrity(settings.fcxMode, report);
    checkCrashgenSettings(parseCrashgenSettings(segments.crashgen), modules, {
      crashgenName,
      crashgenVersion,
      latestVersion: latest,
      ignore: rules.crashgen.ignoreSettings,
      fcxMode: settings.fcxMode,
    }, report);

    // ── Mod lists ─────────────────────────────────────────
    report.add(...section("CHECKING FOR MODS THAT CAN CAUSE FREQUENT CRASHES..."));
    if (pluginsLoaded) {
      detectSingleMods(rules.mods.frequent, plugins, report);
    } else {
      report.add(
        `* [!] NOTICE : ${crashgenName.toUpperCase()} WAS NOT ABLE TO LOAD THE PLUGIN LIST FOR THIS CRASH LOG! *\n`,
        `  ${rules.scanner.name} cannot perform the full scan. Provide or scan a different crash log\n`,
        `  OR copy-paste your *loadorder.txt* into your main ${rules.scanner.name} folder.\n`,
      );
    }

    report.add(...section("CHECKING FOR MODS THAT CONFLICT WITH OTHER MODS..."));
    if (!pluginsLoaded) {
      report.add(rules.warnings.noPlugins);
    } else if (detectConflictingMods(rules.mods.conflicting, plugins, report)) {
      report.add(
        "# [!] CAUTION : FOUND MODS THAT ARE INCOMPATIBLE OR CONFLICT WITH YOUR OTHER MODS # \n",
        "* YOU SHOULD CHOOSE WHICH MOD TO KEEP AND DISABLE OR COMPLETELY REMOVE THE OTHER MOD * \n\n",
      );
    } else {
      report.add("# FOUND NO MODS THAT ARE INCOMPATIBLE OR CONFLICT WITH YOUR OTHER MODS # \n\n");
    }

    report.add(...section("CHECKING FOR MODS WITH SOLUTIONS & COMMUNITY PATCHES"));
    if (!pluginsLoaded) {
      report.add(rules.warnings.noPlugins);
    } else if (detectSingleMods(rules.mods.solutions, plugins, report)) {
      report.add(
        "# [!] CAUTION : FOUND PROBLEMATIC MODS WITH SOLUTIONS AND COMMUNITY PATCHES # \n",
        `[Due to limitations, ${rules.scanner.name} will show warnings for some mods even if fixes or patches are already installed.] \n`,
        "[To hide these warnings, add their plugin names to IGNORE_PLUGINS. ONE PLUGIN PER ENTRY.] \n\n",
      );
    } else {
      report.add("# FOUND NO PROBLEMATIC MODS WITH AVAILABLE SOLUTIONS AND COMMUNITY PATCHES # \n\n");
    }

    if (rules.game.name === "Fallout4") {
      report.add(...section("CHECKING FOR MODS PATCHED THROUGH OPC INSTALLER..."));
      if (!pluginsLoaded) {
        report.add(rules.warnings.noPlugins);
      } else if (detectSingleMods(rules.mods.opc, plugins, report)) {
        report.add("\n* FOR PATCH REPOSITORY THAT PREVENTS CRASHES AND FIXES PROBLEMS IN THESE AND OTHER MODS,* \n");
        report.add(rules.links.patches ? `* VISIT OPTIMIZATION PATCHES COLLECTION: ${rules.links.patches} * \n\n` : "\n");
      } else {
        report.add("# FOUND NO PROBLEMATIC MODS THAT ARE ALREADY PATCHED THROUGH THE OPC INSTALLER # \n\n");
      }
    }

    report.add(...section("CHECKING IF IMPORTANT PATCHES & FIXES ARE INSTALLED"));
    if (pluginsLoaded) {
      const london = [...plugins.keys()].some(name => name.toLowerCase().includes("londonworldspace"));
      detectImportantMods(london ? rules.mods.coreLondon : rules.mods.core, plugins, gpu.rival, report);
    } else {
      report.add(rules.warnings.noPlugins);
    }
    if (limitTriggered && pluginsLoaded) {
      report.add("# 💀 CRITICAL : THE '[FF]' PLUGIN MEANS YOU REACHED THE PLUGIN LIMIT OF 255-ish PLUGINS # \n");
    }
    if (limitCheckDisabled && pluginsLoaded) {
      report.add(
        "# ⚠️ WARNING : THE '[FF]' PLUGIN WAS DETECTED BUT PLUGIN LIMIT CHECK IS DISABLED. # \n",
        `This could indicates that your version of ${crashgenName} is out of date. \n`,
        `Recommendation: Consider updating ${crashgenName} to the latest version. \n-----\n`,
      );
    }

    // ── Specific suspects ─────────────────────────────────
    report.add(...section("SCANNING THE LOG FOR SPECIFIC (POSSIBLE) SUSPECTS..."));
    const ignored = [...rules.ignorePlugins, ...settings.ignorePlugins];

    report.add("# LIST OF (POSSIBLE) PLUGIN SUSPECTS #\n");
    reportPluginSuspects(countPluginsInStack(segments.callStack, plugins.keys(), ignored), crashgenName, report);

    report.add("\n# LIST OF (POSSIBLE) FORM ID SUSPECTS #\n");
    await reportFormIds(extractFormIds(segments.callStack), plugins, {
      showValues: settings.showFormIdValues,
      lookup: this.context.formIdLookup,
    }, crashgenName, report);

    report.add("\n# LIST OF DETECTED (NAMED) RECORDS #\n");
    reportNamedRecords(findNamedRecords(segments.callStack, rules.records.catch, rules.records.ignore), crashgenName, report);

    if (rules.game.name === "Fallout4") report.add(rules.autoscanText);
    report.add(`${rules.scanner.version} | ${rules.scanner.versionDate} | END OF AUTOSCAN \n`);

    if (failed) logger.warn(`${fileName} has only ${lines.length} lines`, { module: "Analyzer", file: fileName });
    return { fileName, report: report.toString(), failed, incomplete, metadata };
  }

  private async reportIntegrity(fcxMode: boolean, report: ReportBuffer): Promise<void> {
    const name = this.context.rules.scanner.name;
    if (fcxMode) {
      report.add(
        `* NOTICE: FCX MODE IS ENABLED. ${name.toUpperCase()} MUST BE RUN BY THE ORIGINAL USER FOR CORRECT DETECTION * \n`,
        "[ To disable mod & game files detection, unset FCX_MODE or drop the --fcx flag ] \n\n",
      );
      if (this.context.integrity) report.add(await this.context.integrity.get());
    } else {
      report.add(
        "* NOTICE: FCX MODE IS DISABLED. YOU CAN ENABLE IT TO DETECT PROBLEMS IN YOUR MOD & GAME FILES * \n",
        "[ FCX Mode can be enabled with FCX_MODE=true or the --fcx flag. ] \n\n",
      );
    }
  }
}
