/**
 * Crashlens - CrashLogReformatter unit tests
 */
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { afterAll, describe, expect, it } from "vitest";
import { reformatCrashLogs, reformatText, splitKeepingEol } from "../src/services/crashlog-reformatter.js";

const LOG = [
  "Unhandled exception at [ 1] (void*)\r\n",
  "PLUGINS:\r\n",
  "\t[ 0]     Fallout4.esm\r\n",
  "\t[FE:  1] LightMod.esl\r\n",
  "\t[0A]     TestMod.esp (size_t)\r\n",
].join("");

describe("splitKeepingEol", () => {
  it("keeps each terminator with its line", () => {
    expect(splitKeepingEol("a\r\nb\nc")).toEqual(["a\r\n", "b\n", "c"]);
    expect(splitKeepingEol("")).toEqual([]);
  });
});

describe("reformatText", () => {
  it("zero-fills load order brackets below the PLUGINS line only", () => {
    expect(reformatText(LOG, { simplify: false, removeList: ["(size_t)"] })).toBe([
      "Unhandled exception at [ 1] (void*)\r\n",
      "PLUGINS:\r\n",
      "\t[00]     Fallout4.esm\r\n",
      "\t[FE:001] LightMod.esl\r\n",
      "\t[0A]     TestMod.esp (size_t)\r\n",
    ].join(""));
  });

  it("drops excluded lines everywhere when simplifying", () => {
    expect(reformatText(LOG, { simplify: true, removeList: ["(size_t)", "(void*)", ""] })).toBe([
      "PLUGINS:\r\n",
      "\t[00]     Fallout4.esm\r\n",
      "\t[FE:001] LightMod.esl\r\n",
    ].join(""));
  });

  it("is idempotent", () => {
    const options = { simplify: true, removeList: ["(void*)"] };
    const once = reformatText(LOG, options);
    expect(reformatText(once, options)).toBe(once);
  });

  it("treats the whole file as the plugin list when there is no PLUGINS line", () => {
    expect(reformatText("[ 1] a\n", { simplify: false, removeList: [] })).toBe("[01] a\n");
  });
});

describe("reformatCrashLogs", () => {
  const dir = mkdtempSync(path.join(tmpdir(), "crashlens-reformat-"));
  afterAll(() => rmSync(dir, { recursive: true, force: true }));

  it("rewrites changed files in place and counts them", async () => {
    const changed = path.join(dir, "crash-a.log");
    const clean = path.join(dir, "crash-b.log");
    writeFileSync(changed, "PLUGINS:\n[ 1] a.esp\n");
    writeFileSync(clean, "PLUGINS:\n[01] b.esp\n");

    const count = await reformatCrashLogs([changed, clean, path.join(dir, "missing.log")], { simplify: false, removeList: [] });
    expect(count).toBe(1);
    expect(readFileSync(changed, "utf-8")).toBe("PLUGINS:\n[01] a.esp\n");
  });
});
