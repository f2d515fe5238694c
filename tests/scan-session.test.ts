/**
 * Crashlens - ScanSession tests
 * Scans a throwaway folder of crash logs built from the sample fixture
 */
import { mkdir, mkdtemp, readdir, readFile, rm, symlink, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadRuleSet } from "../src/services/rules-loader.js";
import { discoverCrashLogs, reportPathFor, ScanSession } from "../src/services/scan-session.js";
import { loadScanConfig } from "../src/utils/config.js";

const rules = loadRuleSet(fileURLToPath(new URL("../data/fallout4.json", import.meta.url)));

let root: string;
let sample: string;

async function put(relative: string, content: string): Promise<string> {
  const file = path.join(root, relative);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, content);
  return file;
}

beforeEach(async () => {
  root = await mkdtemp(path.join(tmpdir(), "crashlens-scan-"));
  sample = await readFile(new URL("./fixtures/crash-sample.log", import.meta.url), "utf-8");
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("reportPathFor", () => {
  it("puts the report beside the log", () => {
    expect(reportPathFor("/logs/crash-2024.log")).toBe("/logs/crash-2024-AUTOSCAN.md");
  });
});

describe("discoverCrashLogs", () => {
  it("searches the scan folder recursively and the custom folder at top level", async () => {
    const main = await put("logs/crash-a.log", sample);
    await put("custom/crash-a.log", sample);
    const extra = await put("custom/crash-b.log", sample);
    await put("custom/nested/crash-c.log", sample);
    const text = await put("logs/crash-note.txt", "renamed");
    await put("logs/notes.log", "unrelated");

    const found = await discoverCrashLogs(path.join(root, "logs"), path.join(root, "custom"));
    expect(found.logs).toEqual([main, extra]);
    expect(found.invalid).toEqual([text]);
  });

  it("skips a crash log link whose target is gone", async () => {
    const main = await put("logs/crash-a.log", sample);
    await symlink(path.join(root, "logs/gone.log"), path.join(root, "logs/crash-b.log"));
    const found = await discoverCrashLogs(path.join(root, "logs"));
    expect(found.logs).toEqual([main]);
  });

  it("returns nothing for a missing folder", async () => {
    expect(await discoverCrashLogs(path.join(root, "missing"))).toEqual({ logs: [], invalid: [] });
  });
});

describe("ScanSession", () => {
  it("writes a report per log and counts the outcomes", async () => {
    const complete = await put("logs/crash-sample.log", sample);
    const noMaster = await put(
      "logs/sub/crash-nomaster.log",
      sample.split("\n").filter(line => !line.includes("Fallout4.esm")).join("\n"),
    );
    const short = await put("logs/crash-short.log", sample.split("\n").slice(0, 5).join("\n"));
    const backupDir = path.join(root, "backup");

    const session = new ScanSession({
      rules,
      config: {
        ...loadScanConfig({}),
        scanDir: path.join(root, "logs"),
        loadOrderPath: path.join(root, "loadorder.txt"),
        workers: 2,
        moveUnsolvedLogs: true,
        backupDir,
      },
    });
    const summary = await session.run();

    expect(summary.stats).toEqual({ scanned: 2, incomplete: 1, failed: 1 });
    expect(summary.failedLogs).toEqual([short]);
    expect(summary.reports).toEqual([reportPathFor(noMaster), reportPathFor(complete), reportPathFor(short)]);

    const report = await readFile(reportPathFor(complete), "utf-8");
    expect(report.startsWith("crash-sample.log -> AUTOSCAN REPORT GENERATED BY Crashlens v1.0.0 \n")).toBe(true);
    expect((await readdir(backupDir)).sort()).toEqual(["crash-short-AUTOSCAN.md", "crash-short.log"]);
    expect(await readFile(short, "utf-8")).toContain("Fallout 4 v1.10.163");
  });

  it("reuses one analyzer for the session", async () => {
    const session = new ScanSession({
      rules,
      config: { ...loadScanConfig({}), scanDir: root, loadOrderPath: path.join(root, "loadorder.txt") },
    });
    expect(await session.getAnalyzer()).toBe(await session.getAnalyzer());
  });

  it("prefers loadorder.txt over the log's plugin list", async () => {
    const loadOrder = await put("loadorder.txt", "# comment\nFallout4.esm\nWeaponsFramework.esm\nTacticalReload.esp\n");
    const log = await put("logs/crash-sample.log", sample);
    const session = new ScanSession({
      rules,
      config: { ...loadScanConfig({}), scanDir: path.join(root, "logs"), loadOrderPath: loadOrder },
    });
    await session.run();
    const report = await readFile(reportPathFor(log), "utf-8");
    expect(report).toContain("# [!] CAUTION : FOUND MODS THAT ARE INCOMPATIBLE OR CONFLICT WITH YOUR OTHER MODS # \n");
  });
});
