/**
 * Services barrel exports
 */
export { ConfigurationAuditor, renderAudit } from "./config-auditor/index.js";
export type { AuditResult } from "./config-auditor/index.js";
export { CrashLogAnalyzer, MIN_LOG_LINES } from "./crashlog-analyzer.js";
export type { AnalysisResult, AnalyzerContext, AnalyzerSettings } from "./crashlog-analyzer.js";
export { reformatCrashLogs, reformatText } from "./crashlog-reformatter.js";
export { checkFileIntegrity } from "./file-integrity.js";
export type { FormIdLookup } from "./formid-correlator.js";
export { FormIdLookupService } from "./formid-lookup.js";
export { LogCache, splitLines } from "./log-cache.js";
export { loadRuleSet, compileRuleSet } from "./rules-loader.js";
export type { RuleSet } from "./rules-loader.js";
export { discoverCrashLogs, reportPathFor, ScanSession } from "./scan-session.js";
export type { ScanSummary } from "./scan-session.js";
export type { ScanStats } from "./shared.js";
