export { ConfigurationAuditor, renderAudit } from "./config-auditor.js";
export type { AppliedFix, AuditOptions, AuditResult } from "./config-auditor.js";
export { ConfigFileCache, DEFAULT_DUPLICATE_WHITELIST } from "./config-file-cache.js";
export { decodeConfig, encodeConfig, IniFile, sameIniContent } from "./ini-file.js";
export type { IniEncoding } from "./ini-file.js";
