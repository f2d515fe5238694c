/**
 * Game file integrity - executable hash against the known releases, install
 * location, and the settings-file audit. Run at most once per scan session.
 */
import { createHash } from "crypto";
import { createReadStream } from "fs";
import { stat } from "fs/promises";
import path from "path";
import { logger } from "../utils/index.js";
import { ConfigurationAuditor, renderAudit } from "./config-auditor/index.js";
import type { RuleSet } from "./rules-loader.js";

export interface IntegrityOptions {
  gameRoot: string | null;
  dryRun?: boolean;
}

export function sha256File(file: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash("sha256");
    createReadStream(file)
      .on("data", chunk => hash.update(chunk))
      .on("error", reject)
      .on("end", () => resolve(hash.digest("hex")));
  });
}

async function isFile(file: string): Promise<boolean> {
  try {
    return (await stat(file)).isFile();
  } catch {
    return false;
  }
}

export async function checkGameExecutable(rules: RuleSet, gameRoot: string): Promise<string> {
  const { rootName, exeName, exeHashes } = rules.game;
  const exe = path.join(gameRoot, exeName);
  if (!(await isFile(exe))) {
    return `❌ CAUTION : ${exeName} WAS NOT FOUND IN ${gameRoot} \n-----\n`;
  }

  const messages: string[] = [];
  const digest = (await sha256File(exe)).toLowerCase();
  const release = Object.entries(exeHashes).find(([, hash]) => hash.toLowerCase() === digest)?.[0];
  if (release) {
    logger.debug(`${exeName} matches the ${release} release`, { module: "Integrity" });
    messages.push(`✔️ You have the latest version of ${rootName}! \n-----\n`);
  } else {
    messages.push(`❌ CAUTION : YOUR ${rootName} GAME / EXE VERSION IS OUT OF DATE \n-----\n`);
  }

  if (!exe.includes("Program Files")) {
    messages.push(`✔️ Your ${rootName} game files are installed outside of the Program Files folder! \n-----\n`);
  } else {
    messages.push(rules.warnings.rootPath);
  }
  return messages.join("");
}

/** Full integrity report: executable checks followed by the settings audit */
export async function checkFileIntegrity(rules: RuleSet, options: IntegrityOptions): Promise<string> {
  const { gameRoot } = options;
  if (!gameRoot) {
    return "❌ CAUTION : GAME FOLDER IS NOT CONFIGURED, SET GAME_ROOT TO RUN GAME FILE CHECKS \n-----\n";
  }
  try {
    if (!(await stat(gameRoot)).isDirectory()) throw new Error("not a directory");
  } catch {
    return `❌ CAUTION : GAME FOLDER ${gameRoot} DOES NOT EXIST \n-----\n`;
  }

  const start = Date.now();
  const exeReport = await checkGameExecutable(rules, gameRoot).catch((e: unknown) => {
    logger.error(`Executable check failed: ${(e as Error).message}`, { module: "Integrity" });
    return `❌ CAUTION : ${rules.game.exeName} COULD NOT BE CHECKED: ${(e as Error).message} \n-----\n`;
  });
  const audit = await auditGameSettings(rules, gameRoot, options.dryRun);
  logger.info("Game file integrity checked", { module: "Integrity", duration: `${Date.now() - start}ms` });
  return exeReport + audit;
}

/** Settings audit as report text; an audit that throws becomes one report line */
async function auditGameSettings(rules: RuleSet, gameRoot: string, dryRun: boolean | undefined): Promise<string> {
  try {
    const auditor = await ConfigurationAuditor.forGameRoot(gameRoot, { gameName: rules.game.name, dryRun });
    return renderAudit(await auditor.audit());
  } catch (e) {
    logger.error(`Settings audit of ${gameRoot} failed: ${(e as Error).message}`, { module: "Integrity" });
    return `❌ CAUTION : SETTINGS FILES UNDER ${gameRoot} COULD NOT BE AUDITED: ${(e as Error).message} \n-----\n`;
  }
}
