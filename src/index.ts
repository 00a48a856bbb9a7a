import 'dotenv/config';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { HttpPlanner } from './planner/httpPlanner.js';
import { FileSessionStore } from './sessions/sessionStore.js';
import { SubmissionManager } from './submission/submissionManager.js';
import { SessionSupervisor } from './supervisor/supervisor.js';
import { createToolHandlers } from './tools/index.js';
import { createLogger } from './utils/logger.js';

const config = loadConfig();
const logger = createLogger('qcr', [config.secret, config.adminToken, config.plannerApiKey]);

// Mark any sessions that were running when the server last stopped
const store = new FileSessionStore(config.dataDir);
const stale = await store.markAbortedOnStartup();
if (stale.length > 0) {
  logger.warn(`marked ${stale.length} interrupted session(s) aborted`);
}

const supervisor = new SessionSupervisor({
  store,
  planner: new HttpPlanner({
    url: config.plannerUrl,
    apiKey: config.plannerApiKey || undefined,
    timeoutMs: config.plannerTimeoutMs,
    logger: logger.child('planner'),
  }),
  submissions: new SubmissionManager({
    policy: config,
    timeoutMs: config.submissionTimeoutMs,
    logger: logger.child('submit'),
  }),
  tools: createToolHandlers(config),
  settings: config,
  maxConcurrentSessions: config.maxConcurrentSessions,
  logger: logger.child('session'),
});

const app = createApp({ config, supervisor, store, logger: logger.child('http') });

const server = app.listen(config.port, config.bind, () => {
  logger.info(`quiz-chain-runner listening on ${config.bind}:${config.port}`);
});

let stopping = false;
const stop = async (signal: string) => {
  if (stopping) return;
  stopping = true;
  logger.info(`${signal} received, draining ${supervisor.activeCount()} session(s)`);
  server.close();
  await supervisor.shutdown();
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    stop(signal).catch((err: unknown) => {
      logger.error('shutdown failed', err);
      process.exit(1);
    });
  });
}
