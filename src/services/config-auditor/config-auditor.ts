/**
 * ConfigurationAuditor - checks mod and game settings files under the game
 * folder, applies the known-safe fixes in place and reports what it did.
 */
import path from "path";
import { logger } from "../../utils/index.js";
import { ConfigFileCache, DEFAULT_DUPLICATE_WHITELIST } from "./config-file-cache.js";

const CONSOLE_COMMAND_SECTION = "General";
const CONSOLE_COMMAND_SETTING = "sStartingConsoleCommand";
const CONSOLE_COMMAND_NOTICE =
  "In rare cases, this setting can slow down the initial game startup time for some players.\n" +
  "You can test your initial startup time difference by removing this setting from the INI file.\n-----\n";

export interface AuditOptions {
  /** Game name as used in file names ("Fallout4") */
  gameName: string;
  dryRun?: boolean;
  duplicateWhitelist?: readonly string[];
}

export interface AppliedFix {
  description: string;
  file: string;
  setting: string;
  value: string;
}

export interface AuditResult {
  /** Console command notices and performed fixes, in report order */
  messages: string[];
  fixes: AppliedFix[];
  /** `<path> | SETTING: <name>` for every file that forces VSync */
  vsync: string[];
  /** Every copy of a duplicated file, originals included, sorted by file name */
  duplicates: string[];
}

type VsyncSetting = readonly [file: string, section: string, setting: string];

function vsyncSettings(gameName: string): VsyncSetting[] {
  return [
    ["dxvk.conf", `${gameName}.exe`, "dxgi.syncInterval"],
    ["enblocal.ini", "ENGINE", "ForceVSync"],
    ["longloadingtimesfix.ini", "Limiter", "EnableVSync"],
    ["reshade.ini", "APP", "ForceVsync"],
    ["fallout4_test.ini", "CreationKit", "VSyncRender"],
    ["highfpsphysicsfix.ini", "Main", "EnableVSync"],
  ];
}

function titleCase(text: string): string {
  return text.toLowerCase().replace(/\b[a-z]/g, c => c.toUpperCase());
}

export class ConfigurationAuditor {
  constructor(private readonly files: ConfigFileCache, private readonly options: AuditOptions) {}

  static async forGameRoot(gameRoot: string, options: AuditOptions): Promise<ConfigurationAuditor> {
    const files = await ConfigFileCache.scan(gameRoot, options.duplicateWhitelist ?? DEFAULT_DUPLICATE_WHITELIST);
    return new ConfigurationAuditor(files, options);
  }

  async audit(): Promise<AuditResult> {
    const result: AuditResult = { messages: [], fixes: [], vsync: [], duplicates: [] };
    await this.checkConsoleCommand(result);
    await this.applyFixes(result);
    await this.checkVsync(result);
    this.checkDuplicates(result);
    return result;
  }

  // ── Checks ──────────────────────────────────────────────

  private async checkConsoleCommand(result: AuditResult): Promise<void> {
    const game = this.options.gameName.toLowerCase();
    for (const name of this.files.names()) {
      if (!name.startsWith(game)) continue;
      const ini = await this.files.load(name);
      if (!ini?.has(CONSOLE_COMMAND_SECTION, CONSOLE_COMMAND_SETTING)) continue;
      result.messages.push(
        `[!] NOTICE: ${this.files.pathOf(name)} contains the *${CONSOLE_COMMAND_SETTING}* setting.\n`,
        CONSOLE_COMMAND_NOTICE,
      );
    }
  }

  private async checkVsync(result: AuditResult): Promise<void> {
    for (const [file, section, setting] of vsyncSettings(this.options.gameName)) {
      if (await this.files.getBoolean(file, section, setting)) {
        result.vsync.push(`${this.files.pathOf(file)} | SETTING: ${setting}\n`);
      }
    }
  }

  private checkDuplicates(result: AuditResult): void {
    const all: string[] = [];
    for (const [name, copies] of this.files.duplicates) {
      all.push(...copies);
      const original = this.files.pathOf(name);
      if (original) all.push(original);
    }
    all.sort((a, b) => {
      const left = path.basename(a);
      const right = path.basename(b);
      return left < right ? -1 : left > right ? 1 : 0;
    });
    result.duplicates.push(...all.map(p => `${p}\n`));
  }

  // ── Fixes ───────────────────────────────────────────────

  private async applyFixes(result: AuditResult): Promise<void> {
    const hotkey = (await this.files.getString("espexplorer.ini", "General", "HotKey")) ?? "";
    if (hotkey.includes("; F10")) {
      await this.fix(result, "espexplorer.ini", "General", "HotKey", "0x79", "INI HOTKEY");
    }

    if (((await this.files.getInt("epo.ini", "Particles", "iMaxDesired")) ?? 0) > 5000) {
      await this.fix(result, "epo.ini", "Particles", "iMaxDesired", "5000", "INI PARTICLE COUNT");
    }

    if (this.files.has("f4ee.ini")) {
      if ((await this.files.getInt("f4ee.ini", "CharGen", "bUnlockHeadParts")) === 0) {
        await this.fix(result, "f4ee.ini", "CharGen", "bUnlockHeadParts", "1", "INI HEAD PARTS UNLOCK");
      }
      if ((await this.files.getInt("f4ee.ini", "CharGen", "bUnlockTints")) === 0) {
        await this.fix(result, "f4ee.ini", "CharGen", "bUnlockTints", "1", "INI FACE TINTS UNLOCK");
      }
    }

    // A missing LoadingScreenFPS reads as 0 and gets written
    if (
      this.files.has("highfpsphysicsfix.ini") &&
      ((await this.files.getFloat("highfpsphysicsfix.ini", "Limiter", "LoadingScreenFPS")) ?? 0) < 600
    ) {
      await this.fix(result, "highfpsphysicsfix.ini", "Limiter", "LoadingScreenFPS", "600.0", "INI LOADING SCREEN FPS");
    }
  }

  private async fix(
    result: AuditResult,
    file: string,
    section: string,
    setting: string,
    value: string,
    description: string,
  ): Promise<void> {
    const location = this.files.pathOf(file) ?? file;
    let written: boolean;
    try {
      written = await this.files.set(file, section, setting, value, this.options.dryRun);
    } catch (e) {
      logger.error(`${description} FIX FOR ${location} FAILED: ${(e as Error).message}`, { module: "ConfigAudit" });
      result.messages.push(`❌ ${titleCase(description)} Fix could not be written to : ${location}\n-----\n`);
      return;
    }
    if (!written) return;
    logger.info(`> > > PERFORMED ${description} FIX FOR ${location}`, { module: "ConfigAudit" });
    result.messages.push(`> Performed ${titleCase(description)} Fix For : ${location}\n`);
    result.fixes.push({ description, file: location, setting, value });
  }
}

/** Report text for an audit, in the order the checks ran */
export function renderAudit(result: AuditResult): string {
  const parts = [...result.messages];
  if (result.vsync.length) parts.push("* NOTICE : VSYNC IS CURRENTLY ENABLED IN THE FOLLOWING FILES *\n", ...result.vsync);
  if (result.duplicates.length) parts.push("* NOTICE : DUPLICATES FOUND OF THE FOLLOWING FILES *\n", ...result.duplicates);
  return parts.join("");
}
