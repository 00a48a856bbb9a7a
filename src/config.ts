export interface RetryPolicy {
  maxSubmissionAttempts: number;
  baseBackoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
  /** Bound on time spent retrying submissions for one target. */
  maxTargetElapsedMs: number;
}

export interface Config extends RetryPolicy {
  port: number;
  bind: string;
  secret: string;
  adminToken: string;
  dataDir: string;
  plannerUrl: string;
  plannerApiKey: string;
  plannerTimeoutMs: number;
  plannerMaxRetries: number;
  plannerBackoffMs: number;
  plannerHistoryTurns: number;
  maxConcurrentSessions: number;
  maxTurns: number;
  sessionWallClockBudgetMs: number;
  maxRejectionsPerTarget: number;
  /** After this long on one target the planner is told to submit. */
  targetTimeLimitMs: number;
  toolTimeoutMs: number;
  submissionTimeoutMs: number;
  executeCommand: string[];
  installCommand: string[];
  denyGlobs: string[];
  renderMaxChars: number;
  outputMaxChars: number;
}

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} is required but not set`);
  }
  return value;
}

function intEnv(name: string, fallback: number, min: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function floatEnv(name: string, fallback: number, min: number): number {
  const parsed = parseFloat(process.env[name] || '');
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function listEnv(name: string, fallback: string, separator: string | RegExp): string[] {
  return (process.env[name] ?? fallback).split(separator).map(s => s.trim()).filter(Boolean);
}

export function loadConfig(): Config {
  const secret = required('QCR_SECRET');
  const adminToken = required('QCR_ADMIN_TOKEN');
  const plannerUrl = required('QCR_PLANNER_URL');

  const port = intEnv('QCR_PORT', 7860, 1);
  const baseBackoffMs = intEnv('QCR_BASE_BACKOFF_MS', 1000, 1);

  const executeCommand = listEnv('QCR_EXECUTE_COMMAND', 'uv run', /\s+/);
  if (executeCommand.length === 0) {
    throw new Error('QCR_EXECUTE_COMMAND must name a command');
  }
  const installCommand = listEnv('QCR_INSTALL_COMMAND', 'uv add', /\s+/);
  if (installCommand.length === 0) {
    throw new Error('QCR_INSTALL_COMMAND must name a command');
  }

  return {
    port: port <= 65535 ? port : 7860,
    bind: process.env.QCR_BIND || '0.0.0.0',
    secret,
    adminToken,
    dataDir: process.env.QCR_DATA_DIR || './data/sessions',
    plannerUrl,
    plannerApiKey: process.env.QCR_PLANNER_API_KEY || '',
    plannerTimeoutMs: intEnv('QCR_PLANNER_TIMEOUT_SECONDS', 120, 1) * 1000,
    plannerMaxRetries: intEnv('QCR_PLANNER_MAX_RETRIES', 3, 0),
    plannerBackoffMs: intEnv('QCR_PLANNER_BACKOFF_MS', 2000, 0),
    plannerHistoryTurns: intEnv('QCR_PLANNER_HISTORY_TURNS', 12, 1),
    maxConcurrentSessions: intEnv('QCR_MAX_CONCURRENT_SESSIONS', 4, 1),
    maxTurns: intEnv('QCR_MAX_TURNS', 200, 1),
    sessionWallClockBudgetMs: intEnv('QCR_SESSION_BUDGET_SECONDS', 3600, 1) * 1000,
    maxSubmissionAttempts: intEnv('QCR_MAX_SUBMISSION_ATTEMPTS', 5, 1),
    baseBackoffMs,
    backoffMultiplier: floatEnv('QCR_BACKOFF_MULTIPLIER', 2, 1),
    maxBackoffMs: Math.max(intEnv('QCR_MAX_BACKOFF_MS', 30_000, 1), baseBackoffMs),
    maxTargetElapsedMs: intEnv('QCR_TARGET_BUDGET_SECONDS', 180, 1) * 1000,
    maxRejectionsPerTarget: intEnv('QCR_MAX_REJECTIONS_PER_TARGET', 3, 1),
    targetTimeLimitMs: intEnv('QCR_TARGET_TIME_LIMIT_SECONDS', 180, 1) * 1000,
    toolTimeoutMs: intEnv('QCR_TOOL_TIMEOUT_SECONDS', 120, 1) * 1000,
    submissionTimeoutMs: intEnv('QCR_SUBMISSION_TIMEOUT_SECONDS', 30, 1) * 1000,
    executeCommand,
    installCommand,
    denyGlobs: listEnv('QCR_DENY_GLOBS', '**/.env,**/.ssh/**', ','),
    renderMaxChars: 300_000,
    outputMaxChars: 10_000,
  };
}
