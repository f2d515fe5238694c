/**
 * Crashlens - crash log analysis API
 *
 * Architecture:
 *   POST /api/v1/analyze ← CrashLogAnalyzer ← rule dataset (data/*.json)
 *                                           ← FormIdLookupService ← MySQL (optional)
 *   POST /admin/audit    ← ConfigurationAuditor ← GAME_ROOT settings files
 *
 * Features: Zod validation, rate limiting, API key protected admin routes
 */
import 'dotenv/config';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import rateLimit from 'express-rate-limit';
import slowDown from 'express-slow-down';
import helmet from 'helmet';

import { createRoutes } from './src/routes.js';
import { CrashLogAnalyzer, FormIdLookupService, loadRuleSet } from './src/services/index.js';
import { loadFormIdDbConfig, loadScanConfig, logger } from './src/utils/index.js';

const PORT = process.env.PORT || 3000;

const app = express();
let formIdLookup: FormIdLookupService | null = null;
let httpServer: ReturnType<typeof app.listen> | null = null;

// ===== MIDDLEWARE =====

// Trust proxy (Traefik/nginx in front)
app.set('trust proxy', 1);

app.use(
  helmet({
    contentSecurityPolicy: false, // API returns JSON, not HTML
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  }),
);

app.use(cors({ origin: process.env.CORS_ORIGIN || '*', credentials: true }));
app.use(compression());
// Crash logs run to a few hundred KB
app.use(express.json({ limit: '5mb' }));

// ── Rate limiting (multi-layer, disabled in test) ────────

const isTest = process.env.NODE_ENV === 'test';

// Layer 1: Speed limiter - after 50 req/15min, add 500ms delay per request
const speedLimiter = slowDown({
  windowMs: 15 * 60 * 1000,
  delayAfter: 50,
  delayMs: (hits) => (hits - 50) * 500,
  maxDelayMs: 20_000,
  skip: () => isTest,
});

// Layer 2: Hard rate limit - 100 req/15min per IP (then 429)
const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: parseInt(process.env.RATE_LIMIT_MAX || '100', 10),
  standardHeaders: true,
  legacyHeaders: false,
  message: { success: false, error: 'Too many requests, please try again later' },
  skip: () => isTest,
});

// Layer 3: Strict limit on admin endpoints - 20 req/15min
const adminLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 20,
  standardHeaders: true,
  legacyHeaders: false,
  message: { success: false, error: 'Admin rate limit exceeded' },
  skip: () => isTest,
});

// Layer 4: Burst protection - configurable req/min max
const burstLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: parseInt(process.env.RATE_LIMIT_BURST || '20', 10),
  standardHeaders: false,
  legacyHeaders: false,
  message: { success: false, error: 'Too many requests per minute, slow down' },
  skip: () => isTest,
});

app.use('/api', burstLimiter, speedLimiter, apiLimiter);
app.use('/admin', adminLimiter);

// Request logging (skip /health to avoid noise)
app.use((req, res, next) => {
  if (req.path === '/health') return next();
  const start = Date.now();
  res.on('finish', () => {
    const ms = Date.now() - start;
    const status = res.statusCode;
    const color = status >= 400 ? 'warn' : 'info';
    logger[color](`${req.method} ${req.path} → ${status}`, { module: 'HTTP', duration: `${ms}ms` });
  });
  next();
});

// ===== ROOT =====
app.get('/', (_, res) =>
  res.json({
    name: 'Crashlens',
    version: '1.0.0',
    endpoints: {
      rules: '/api/v1/rules',
      analyze: 'POST /api/v1/analyze',
      audit: 'POST /admin/audit (requires X-API-Key)',
      health: '/health',
    },
  }),
);

// ===== STARTUP =====
async function start() {
  const config = loadScanConfig();

  // 1. Rule dataset (fatal when missing or malformed)
  const rules = loadRuleSet(config.rulesPath);

  // 2. Optional FormID lookup sources
  formIdLookup = FormIdLookupService.fromConfig(loadFormIdDbConfig(), rules.game.name);

  // 3. Uploaded logs come from other machines: no loadorder.txt, no local file checks
  const analyzer = new CrashLogAnalyzer({
    rules,
    settings: { fcxMode: false, showFormIdValues: false, ignorePlugins: config.ignorePlugins },
    loadOrder: null,
    formIdLookup,
    integrity: null,
  });

  // 4. Mount routes
  app.use('/', createRoutes({ analyzer, formIdLookup, gameRoot: config.gameRoot }));

  httpServer = app.listen(PORT, () => logger.info(`✅ Crashlens listening on :${PORT}`, { module: 'Server' }));
}

// Graceful shutdown: close HTTP server + lookup pools
async function shutdown(signal: string) {
  logger.info(`${signal} received - shutting down…`, { module: 'Server' });
  if (httpServer) httpServer.close();
  if (formIdLookup) await formIdLookup.close();
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

start().catch((e: unknown) => {
  logger.error(`Startup failed: ${e instanceof Error ? e.message : String(e)}`, { module: 'Server' });
  process.exit(1);
});
