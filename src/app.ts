import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Config } from './config.js';
import { createAuthMiddleware, secretsMatch } from './middleware/auth.js';
import { validateSolveInput } from './security/policy.js';
import type { FileSessionStore } from './sessions/sessionStore.js';
import type { SessionSupervisor } from './supervisor/supervisor.js';
import { CapacityExceededError, errorMessage } from './utils/errors.js';
import { silentLogger, type Logger } from './utils/logger.js';

export interface AppDeps {
  config: Pick<Config, 'secret' | 'adminToken'>;
  supervisor: SessionSupervisor;
  store: FileSessionStore;
  logger?: Logger;
}

// Express 4 does not forward rejected promises to the error handler by itself
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function isJsonParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp({ config, supervisor, store, logger = silentLogger }: AppDeps) {
  const app = express();
  const startedAt = Date.now();

  app.use(express.json());

  // --- POST /solve ---
  app.post('/solve', asyncHandler(async (req, res) => {
    const validation = validateSolveInput(req.body);
    if (!validation.valid || !validation.sanitized) {
      res.status(400).json({ error: 'Invalid request', errors: validation.errors });
      return;
    }
    const { identity, url } = validation.sanitized;

    if (!secretsMatch(identity.secret, config.secret)) {
      res.status(403).json({ error: 'Invalid secret' });
      return;
    }

    try {
      const sessionId = await supervisor.start(identity, url);
      res.json({ status: 'ok', session_id: sessionId });
    } catch (err: unknown) {
      if (err instanceof CapacityExceededError) {
        res.status(503).json({ error: 'Server busy', active_sessions: supervisor.activeCount() });
        return;
      }
      throw err;
    }
  }));

  // --- GET /healthz ---
  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      active_sessions: supervisor.activeCount(),
    });
  });

  const admin = express.Router();
  admin.use(createAuthMiddleware(config.adminToken));

  // --- GET /v1/sessions ---
  admin.get('/sessions', asyncHandler(async (_req, res) => {
    res.json(await store.listSessions());
  }));

  // --- GET /v1/sessions/:id/state ---
  admin.get('/sessions/:id/state', asyncHandler(async (req, res) => {
    const record = await supervisor.getRecord(req.params.id);
    if (!record) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json(record);
  }));

  // --- POST /v1/sessions/:id/abort ---
  admin.post('/sessions/:id/abort', asyncHandler(async (req, res) => {
    const sessionId = req.params.id;
    const status = await supervisor.status(sessionId);
    if (!status) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    if (status !== 'running') {
      res.status(409).json({ error: 'Session is not running', status });
      return;
    }
    // The loop reaches `aborted` on its own; the record changes once it does
    if (!supervisor.abort(sessionId) && !supervisor.activeSessionIds().includes(sessionId)) {
      res.status(409).json({ error: 'Session is not active in this process', status });
      return;
    }
    res.json({ status: 'aborting' });
  }));

  // --- GET /v1/sessions/:id/artifacts ---
  admin.get('/sessions/:id/artifacts', asyncHandler(async (req, res) => {
    const record = await supervisor.getRecord(req.params.id);
    if (!record) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json({
      artifacts: Object.entries(record.artifacts).map(([name, meta]) => ({ name, ...meta })),
    });
  }));

  app.use('/v1', admin);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isJsonParseError(err)) {
      res.status(400).json({ error: 'Invalid JSON' });
      return;
    }
    logger.error(`request failed: ${errorMessage(err)}`, err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
