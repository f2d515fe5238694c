/**
 * Zod schemas - rule dataset and HTTP request bodies.
 *
 * Kept free of side effects so tests can import them without touching
 * the logger, the environment or a database.
 */
import { z } from "zod";

// ── Rule dataset ──────────────────────────────────────────

/** "<severity> | <name>" → value; insertion order is report order */
const RuleMap = <T extends z.ZodTypeAny>(value: T) => z.record(z.string().min(1), value);

const VersionText = z.string().regex(/^\d+(\.\d+)*$/, "expected a dotted version such as 1.10.163");

export const RuleSetSchema = z.object({
  scanner: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
    versionDate: z.string().min(1),
  }),
  game: z.object({
    name: z.string().min(1),
    rootName: z.string().min(1),
    xseAcronym: z.string().min(1),
    exeName: z.string().min(1),
    exeHashes: z.record(z.string(), z.string().regex(/^[0-9a-f]{64}$/i)).default({}),
    versions: z.object({
      original: VersionText,
      vr: VersionText,
      nextGen: VersionText,
    }),
  }),
  crashgen: z.object({
    name: z.string().min(1),
    latest: z.string().min(1),
    latestVr: z.string().min(1),
    ignoreSettings: z.array(z.string()).default([]),
  }),
  excludeLogRecords: z.array(z.string().min(1)).default([]),
  records: z.object({
    catch: z.array(z.string().min(1)),
    ignore: z.array(z.string().min(1)).default([]),
  }),
  ignorePlugins: z.array(z.string().min(1)).default([]),
  suspects: z.object({
    error: RuleMap(z.string().min(1)),
    stack: RuleMap(z.array(z.string().min(1)).min(1)),
  }),
  mods: z.object({
    frequent: RuleMap(z.string()),
    conflicting: RuleMap(z.string()),
    solutions: RuleMap(z.string()),
    opc: RuleMap(z.string()).default({}),
    core: RuleMap(z.string()),
    coreLondon: RuleMap(z.string()).default({}),
  }),
  warnings: z.object({
    outdated: z.string().min(1),
    noPlugins: z.string().min(1),
    rootPath: z.string().default(""),
  }),
  links: z.object({
    /** Descriptions of every crash suspect */
    suspects: z.string().default(""),
    /** Patch collection for the OPC-patched mods */
    patches: z.string().default(""),
  }).default({}),
  autoscanText: z.string().default(""),
  hints: z.array(z.string()).default([]),
});

export type RuleSetData = z.infer<typeof RuleSetSchema>;

// ── Route schemas ─────────────────────────────────────────

export const AnalyzeBody = z.object({
  fileName: z.string().min(1, "fileName is required")
    .regex(/^[^/\\]+$/, "fileName must not contain a path")
    .default("crash-upload.log"),
  content: z.string().min(1, "content is required"),
  options: z.object({
    showFormIdValues: z.boolean().default(false),
  }).default({}),
});

export const AuditBody = z.object({
  gameRoot: z.string().min(1).optional(),
  dryRun: z.boolean().default(true),
});
