/**
 * Crashlens - environment configuration unit tests
 */
import { describe, expect, it } from "vitest";
import { DEFAULT_WORKERS, loadFormIdDbConfig, loadScanConfig } from "../src/utils/config.js";
import { LogReadError, RuleDataError } from "../src/utils/errors.js";

describe("loadScanConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadScanConfig({});
    expect(config.scanDir).toBe(process.cwd());
    expect(config.customScanDir).toBeNull();
    expect(config.rulesPath).toBe("data/fallout4.json");
    expect(config.workers).toBe(DEFAULT_WORKERS);
    expect(config.fcxMode).toBe(false);
    expect(config.ignorePlugins).toEqual([]);
  });

  it("reads flags, lists and worker counts", () => {
    const config = loadScanConfig({
      SCAN_DIR: "/logs",
      SCAN_WORKERS: "3",
      FCX_MODE: "Yes",
      SIMPLIFY_LOGS: "0",
      IGNORE_PLUGINS: " TestMod.esp, ,Other.esm ",
    });
    expect(config.scanDir).toBe("/logs");
    expect(config.workers).toBe(3);
    expect(config.fcxMode).toBe(true);
    expect(config.simplifyLogs).toBe(false);
    expect(config.ignorePlugins).toEqual(["TestMod.esp", "Other.esm"]);
  });

  it("ignores a worker count that is not a positive integer", () => {
    expect(loadScanConfig({ SCAN_WORKERS: "-2" }).workers).toBe(DEFAULT_WORKERS);
  });
});

describe("loadFormIdDbConfig", () => {
  it("splits source URIs", () => {
    expect(loadFormIdDbConfig({ FORMID_DB_URIS: "mysql://a/db,mysql://b/db" })).toEqual({
      uris: ["mysql://a/db", "mysql://b/db"],
      table: null,
      connectionLimit: 4,
    });
  });
});

describe("errors", () => {
  it("carry their source", () => {
    expect(new RuleDataError("Broken", "rules.json").message).toBe("Broken (rules.json)");
    const error = new LogReadError("crash-1.log", new Error("EACCES"));
    expect(error.message).toBe("Cannot read crash log crash-1.log: EACCES");
    expect(error.fileName).toBe("crash-1.log");
  });
});
