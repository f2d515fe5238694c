/**
 * Crashlens HTTP routes
 *
 * Public: rules(1), analyze(1)
 * Admin:  audit(1)
 * System: health
 */
import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import { ZodError } from "zod";
import { authMiddleware } from "./middleware/index.js";
import { AnalyzeBody, AuditBody } from "./schemas.js";
import {
  ConfigurationAuditor,
  renderAudit,
  splitLines,
  type CrashLogAnalyzer,
  type FormIdLookupService,
} from "./services/index.js";
import { logger, RuleDataError } from "./utils/index.js";

// ── Helpers ───────────────────────────────────────────────

/** Wrap async route handler - catches errors (including ZodErrors → 400) */
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, _next: NextFunction) => {
    fn(req, res).catch((e: unknown) => {
      if (e instanceof ZodError) {
        return res.status(400).json({
          success: false,
          error: "Validation error",
          details: e.issues.map(err => ({ path: err.path.join("."), message: err.message })),
        });
      }
      const err = e instanceof Error ? e : new Error(String(e));
      logger.error(`${req.method} ${req.path} error`, err);
      const status = err instanceof RuleDataError ? 503 : 500;
      res.status(status).json({ success: false, error: err.message });
    });
  };
}

// ── Routes factory ────────────────────────────────────────

export interface RouteDependencies {
  analyzer: CrashLogAnalyzer;
  formIdLookup?: FormIdLookupService | null;
  /** Default game folder for /admin/audit */
  gameRoot?: string | null;
}

export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();
  const { analyzer, formIdLookup } = deps;
  const rules = analyzer.rules;

  // ── RULES ───────────────────────────────────────────────

  router.get("/api/v1/rules", asyncHandler(async (_req, res) => {
    res.json({
      success: true,
      data: {
        scanner: rules.scanner,
        game: { name: rules.game.name, rootName: rules.game.rootName, versions: rules.game.versions },
        crashgen: { name: rules.crashgen.name, latest: rules.crashgen.latest, latestVr: rules.crashgen.latestVr },
        suspects: {
          error: rules.suspects.error.map(({ severity, name }) => ({ severity, name })),
          stack: rules.suspects.stack.map(({ severity, name }) => ({ severity, name })),
        },
        mods: Object.fromEntries(Object.entries(rules.mods).map(([list, mods]) => [list, Object.keys(mods).length])),
      },
    });
  }));

  // ── ANALYZE ─────────────────────────────────────────────

  router.post("/api/v1/analyze", asyncHandler(async (req, res) => {
    const body = AnalyzeBody.parse(req.body);
    const result = await analyzer.analyze(body.fileName, splitLines(body.content), {
      showFormIdValues: body.options.showFormIdValues,
    });
    res.json({
      success: true,
      data: {
        fileName: result.fileName,
        failed: result.failed,
        incomplete: result.incomplete,
        metadata: result.metadata,
        report: result.report,
      },
    });
  }));

  // ── ADMIN (require X-API-Key header) ────────────────────

  router.use("/admin", authMiddleware);

  router.post("/admin/audit", asyncHandler(async (req, res) => {
    const body = AuditBody.parse(req.body);
    const gameRoot = body.gameRoot ?? deps.gameRoot;
    if (!gameRoot) {
      return void res.status(400).json({ success: false, error: "gameRoot is required (no GAME_ROOT configured)" });
    }
    const auditor = await ConfigurationAuditor.forGameRoot(gameRoot, { gameName: rules.game.name, dryRun: body.dryRun });
    const result = await auditor.audit();
    res.json({ success: true, data: { ...result, dryRun: body.dryRun, report: renderAudit(result) } });
  }));

  // ── HEALTH ──────────────────────────────────────────────

  router.get("/health", asyncHandler(async (_req, res) => {
    res.json({
      status: "ok",
      rules: `${rules.game.name} (${rules.scanner.version})`,
      formIdSources: formIdLookup ? formIdLookup.sourceCount : 0,
    });
  }));

  return router;
}
