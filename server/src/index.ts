import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { applications, getEvaluationRouteStats } from './routes/applications.js';
import { decisions } from './routes/decisions.js';
import { observations } from './routes/observations.js';
import { teams } from './routes/teams.js';
import { store } from './lib/store.js';
import { getCouncilMetrics, getRequestMetrics, recordRequestMetric } from './lib/metrics.js';
import {
  NotFoundError,
  OutcomeNotApplicableError,
  PipelineAbortError,
  StatusTransitionError,
  errorMessage,
} from './lib/errors.js';
import { parsePositiveInt } from './lib/validate.js';
import logger from './lib/logger.js';
import { initSentry, captureError, flushSentry } from './lib/sentry.js';

const app = new Hono();
let shuttingDown = false;

// Initialize Sentry error tracking (no-op if SENTRY_DSN not set)
initSentry();

const isProduction = process.env.NODE_ENV === 'production';
const healthCheckCacheTtlMs = parsePositiveInt(process.env.HEALTH_CHECK_CACHE_TTL_MS, 5_000);
const allowedOrigins = process.env.ALLOWED_ORIGINS
  ? process.env.ALLOWED_ORIGINS.split(',').map((o) => o.trim())
  : isProduction
    ? [] // Block all CORS in production if not configured
    : ['http://localhost:5173', 'http://localhost:3000'];

if (isProduction && !process.env.ALLOWED_ORIGINS) {
  logger.error('ALLOWED_ORIGINS not set in production, all cross-origin requests will be blocked');
}

app.use('*', requestIdMiddleware);

app.use('*', async (c, next) => {
  const startedAt = Date.now();
  let status = 500;
  try {
    const bypass = c.req.path === '/health' || c.req.path === '/metrics';
    if (shuttingDown && !bypass) {
      status = 503;
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
    status = c.res.status;
  } finally {
    recordRequestMetric(status, Date.now() - startedAt);
  }
});

app.use('*', async (c, next) => {
  await next();
  c.header('X-Content-Type-Options', 'nosniff');
  c.header('X-Frame-Options', 'DENY');
  c.header('Referrer-Policy', 'no-referrer');
});

app.use('*', cors({
  origin: allowedOrigins,
  credentials: true,
}));

let cachedStoreCheck: { checkedAt: number; storeOk: boolean } | null = null;

function llmKeyPresent(): boolean {
  return process.env.LLM_PROVIDER?.toLowerCase() === 'anthropic'
    ? Boolean(process.env.ANTHROPIC_API_KEY)
    : Boolean(process.env.OPENROUTER_API_KEY);
}

async function checkStore(now = Date.now()): Promise<boolean> {
  if (cachedStoreCheck && now - cachedStoreCheck.checkedAt < healthCheckCacheTtlMs) {
    return cachedStoreCheck.storeOk;
  }
  let storeOk = false;
  try {
    await store.get('application', 'health-check');
    storeOk = true;
  } catch (err) {
    logger.warn({ error: errorMessage(err) }, 'Record store health check failed');
  }
  cachedStoreCheck = { checkedAt: now, storeOk };
  return storeOk;
}

app.get('/health', async (c) => {
  c.header('Cache-Control', 'no-store');
  const storeOk = await checkStore();
  const keyOk = llmKeyPresent();
  const status = shuttingDown ? 'draining' : (storeOk && keyOk ? 'ok' : 'degraded');
  return c.json({
    status,
    shutting_down: shuttingDown,
    store_ok: storeOk,
    llm_key_ok: keyOk,
    timestamp: new Date().toISOString(),
  });
});

const startTime = Date.now();

app.get('/metrics', (c) => {
  c.header('Cache-Control', 'no-store');
  const metricsKey = process.env.METRICS_KEY;
  if (metricsKey) {
    if (c.req.header('Authorization') !== `Bearer ${metricsKey}`) {
      return c.json({ error: 'Unauthorized' }, 401);
    }
  } else if (isProduction) {
    return c.json({ error: 'Not found' }, 404);
  }

  const memUsage = process.memoryUsage();
  return c.json({
    uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
    shutting_down: shuttingDown,
    evaluation_runtime: getEvaluationRouteStats(),
    council_runtime: getCouncilMetrics(),
    http_runtime: getRequestMetrics(),
    memory: {
      rss_mb: Math.round(memUsage.rss / 1024 / 1024),
      heap_used_mb: Math.round(memUsage.heapUsed / 1024 / 1024),
    },
    node_version: process.version,
  });
});

app.route('/api/applications', applications);
app.route('/api/decisions', decisions);
app.route('/api/observations', observations);
app.route('/api/teams', teams);

app.notFound((c) => {
  return c.json({ error: 'Not found' }, 404);
});

app.onError((err, c) => {
  const requestId = c.get('requestId');
  if (err instanceof NotFoundError) {
    return c.json({ error: err.message }, 404);
  }
  if (err instanceof StatusTransitionError || err instanceof OutcomeNotApplicableError) {
    return c.json({ error: err.message }, 409);
  }
  if (err instanceof PipelineAbortError) {
    return c.json({ error: err.message }, 422);
  }
  captureError(err, { path: c.req.path, method: c.req.method, requestId });
  logger.error({ err, requestId }, 'Unhandled error');
  return c.json({ error: 'Internal server error', request_id: requestId }, 500);
});

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  // Close HTTP server (stop accepting new connections)
  server.close(() => {
    void Promise.race([
      flushSentry(2000),
      new Promise((resolve) => setTimeout(resolve, 3_000)),
    ]).finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

const port = parsePositiveInt(process.env.PORT, 3001);

export function startServer() {
  if (server) return server;

  logger.info({ port }, 'Grants council server starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { app };
