export { DEFAULT_WORKERS, loadFormIdDbConfig, loadScanConfig } from "./config.js";
export type { FormIdDbConfig, ScanConfig } from "./config.js";
export { LogReadError, RuleDataError } from "./errors.js";
export { default as logger } from "./logger.js";
export { Once } from "./once.js";
export { runPool } from "./pool.js";
export { compareVersions, formatVersion, NULL_VERSION, parseVersion, parseVersionText } from "./version.js";
export type { Version } from "./version.js";
