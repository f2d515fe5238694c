/**
 * Crashlens - mod list detection unit tests
 */
import { describe, expect, it } from "vitest";
import { detectConflictingMods, detectImportantMods, detectSingleMods } from "../src/services/mod-detector.js";
import { ReportBuffer } from "../src/services/shared.js";

const PLUGINS = new Map([
  ["Fallout4.esm", "00"],
  ["TacticalReload.esp", "0B"],
  ["BetterConsole.esp", "0C"],
  ["x-cell-og.dll", "DLL"],
]);

describe("detectSingleMods", () => {
  it("reports each listed mod found, case-insensitively", () => {
    const report = new ReportBuffer();
    const found = detectSingleMods({
      tacticalreload: "Tactical Reload\n    - Known to crash with weapon mods.\n",
      missingmod: "Never installed",
    }, PLUGINS, report);
    expect(found).toBe(true);
    expect(report.toString()).toBe("[!] FOUND : [0B] Tactical Reload\n    - Known to crash with weapon mods.\n-----\n");
  });

  it("returns false when nothing matches", () => {
    const report = new ReportBuffer();
    expect(detectSingleMods({ missingmod: "Never installed" }, PLUGINS, report)).toBe(false);
    expect(report.length).toBe(0);
  });
});

describe("detectConflictingMods", () => {
  it("needs both sides of a pair", () => {
    const report = new ReportBuffer();
    const found = detectConflictingMods({
      "tacticalreload | betterconsole": "Both hook the HUD.",
      "tacticalreload | missingmod": "Only one side installed.",
      "malformed": "No pair separator.",
    }, PLUGINS, report);
    expect(found).toBe(true);
    expect(report.fragments).toEqual(["[!] CAUTION : Both hook the HUD.\n-----\n"]);
  });
});

describe("detectImportantMods", () => {
  const MODS = {
    "x-cell | X-Cell (Memory Manager)": "Improves memory handling.",
    "buffout | Buffout 4": "Required crash logger.",
    "vlibrary | Vulkan Renderer": "Only for AMD GPUs.",
    "nvflex | Nvidia Flex": "Only for NVIDIA GPUs.",
  };

  it("marks installed, missing and vendor-only mods for an Nvidia user", () => {
    const report = new ReportBuffer();
    detectImportantMods(MODS, PLUGINS, "amd", report);
    expect(report.fragments).toEqual([
      "✔️ X-Cell (Memory Manager) is installed!\n-----\n",
      "❌ Buffout 4 is not installed!\nRequired crash logger.\n-----\n",
      "❌ Nvidia Flex is not installed!\nOnly for NVIDIA GPUs.\n-----\n",
    ]);
  });

  it("flags a mod for the rival vendor that is installed", () => {
    const report = new ReportBuffer();
    detectImportantMods({ "tactical | Tactical Reload": "Only for AMD GPUs." }, PLUGINS, "amd", report);
    expect(report.toString()).toBe(
      "❓ Tactical Reload is installed, BUT IT SEEMS YOU DON'T HAVE AN AMD GPU?\n"
      + "IF THIS IS CORRECT, COMPLETELY UNINSTALL THIS MOD TO AVOID ANY PROBLEMS! \n-----\n",
    );
  });

  it("treats every mod as required when the GPU is unknown", () => {
    const report = new ReportBuffer();
    detectImportantMods({ "vlibrary | Vulkan Renderer": "Only for AMD GPUs." }, PLUGINS, null, report);
    expect(report.toString()).toBe("❌ Vulkan Renderer is not installed!\nOnly for AMD GPUs.\n-----\n");
  });
});
