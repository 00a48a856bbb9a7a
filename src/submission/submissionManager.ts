import * as fs from 'node:fs/promises';
import type { RetryPolicy } from '../config.js';
import type { SessionState } from '../sessions/sessionState.js';
import type { AnswerValue, SubmissionOutcome, SubmissionReport } from '../sessions/types.js';
import { deadlineSignal, isTimeoutError, sleep as defaultSleep, type Sleep } from '../utils/abort.js';
import { errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { backoffDelay } from './backoff.js';
import { classifySubmissionResponse } from './classify.js';

export const ARTIFACT_ANSWER_PREFIX = 'artifact-base64:';

export interface SubmissionManagerOptions {
  policy: RetryPolicy;
  /** Bound on a single POST. */
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
  logger?: Logger;
}

type RetryableOutcome = Extract<SubmissionOutcome, { kind: 'RateLimited' | 'TransientError' }>;

function isRetryable(outcome: SubmissionOutcome): outcome is RetryableOutcome {
  return outcome.kind === 'RateLimited' || outcome.kind === 'TransientError';
}

function describe(outcome: RetryableOutcome): string {
  return outcome.kind === 'RateLimited'
    ? `rate limited (retry after ${outcome.retryAfterMs}ms)`
    : outcome.reason;
}

function preview(answer: AnswerValue): string {
  const text = typeof answer === 'string' ? answer : JSON.stringify(answer);
  return text.length > 100 ? `${text.slice(0, 100)}...` : text;
}

/**
 * Sends answers for the session's current target and absorbs rate limiting
 * and transient failures with bounded backoff. Content rejections are
 * returned to the caller as they are; nothing here ever resends an answer
 * the server judged wrong.
 */
export class SubmissionManager {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: SubmissionManagerOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  async submit(
    session: SessionState,
    answer: AnswerValue,
    submitUrl?: string,
    signal?: AbortSignal,
  ): Promise<SubmissionReport> {
    const { policy } = this.options;
    const log = this.logger.child(session.sessionId.slice(0, 8), [session.identity.secret]);
    const target = session.currentTarget;

    let endpoint: string;
    try {
      endpoint = new URL(submitUrl ?? '/submit', target).href;
    } catch {
      return { outcome: { kind: 'FatalError', reason: `Invalid submission URL: ${submitUrl ?? '/submit'} for target ${target}` }, attempts: 0, delaysMs: [] };
    }

    const resolved = await this.resolveAnswer(session, answer);
    if (!resolved.ok) {
      return { outcome: { kind: 'Rejected', reason: resolved.reason, nextTarget: null }, attempts: 0, delaysMs: [] };
    }

    const body = JSON.stringify({
      email: session.identity.email,
      secret: session.identity.secret,
      url: target,
      answer: resolved.answer,
    });
    log.info(`submitting to ${endpoint}: ${preview(answer)}`);

    if (session.retryState('submission').windowStartedAt === null) {
      session.updateRetryState('submission', { windowStartedAt: this.now() });
    }

    const delaysMs: number[] = [];
    let previousDelay = 0;
    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();
      const outcome = await this.attempt(endpoint, body, signal);

      if (outcome.kind === 'Accepted') {
        session.resetRetryState('submission');
        log.info(outcome.nextTarget ? `accepted, next target ${outcome.nextTarget}` : 'accepted, chain complete');
        return { outcome, attempts: attempt, delaysMs };
      }
      if (!isRetryable(outcome)) {
        log.warn(`${outcome.kind}: ${outcome.reason}`);
        return { outcome, attempts: attempt, delaysMs };
      }

      const reason = describe(outcome);
      if (attempt >= policy.maxSubmissionAttempts) {
        log.warn(`giving up after ${attempt} attempts: ${reason}`);
        return { outcome: { kind: 'FatalError', reason: `Gave up after ${attempt} attempts: ${reason}` }, attempts: attempt, delaysMs };
      }

      const retryAfter = outcome.kind === 'RateLimited' ? outcome.retryAfterMs : 0;
      const delay = backoffDelay(attempt, policy, previousDelay, retryAfter, this.random);
      const state = session.retryState('submission');
      const windowStart = state.windowStartedAt ?? this.now();
      if (this.now() + delay - windowStart > policy.maxTargetElapsedMs) {
        log.warn(`retry budget for ${target} exhausted: ${reason}`);
        return {
          outcome: { kind: 'FatalError', reason: `Retry budget for target exhausted: ${reason}` },
          attempts: attempt,
          delaysMs,
        };
      }

      session.updateRetryState('submission', {
        consecutiveFailures: state.consecutiveFailures + 1,
        nextAttemptAt: this.now() + delay,
        lastDelayMs: delay,
      });
      log.warn(`attempt ${attempt} failed (${reason}), retrying in ${delay}ms`);
      delaysMs.push(delay);
      previousDelay = delay;
      await this.sleep(delay, signal);
    }
  }

  private async attempt(endpoint: string, body: string, signal?: AbortSignal): Promise<SubmissionOutcome> {
    const bound = deadlineSignal(this.options.timeoutMs, signal);
    try {
      const res = await this.fetchImpl(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: bound,
      });
      const text = await res.text();
      let parsed: unknown = text;
      let isJson = false;
      try {
        parsed = JSON.parse(text);
        isJson = true;
      } catch {
        isJson = false;
      }
      return classifySubmissionResponse(
        { status: res.status, retryAfter: res.headers.get('retry-after'), body: parsed, isJson },
        this.now(),
        endpoint,
      );
    } catch (err: unknown) {
      if (signal?.aborted) throw err;
      if (bound.aborted || isTimeoutError(err)) {
        return { kind: 'TransientError', reason: `No response within ${this.options.timeoutMs}ms` };
      }
      return { kind: 'TransientError', reason: `Network error: ${errorMessage(err)}` };
    }
  }

  private async resolveAnswer(
    session: SessionState,
    answer: AnswerValue,
  ): Promise<{ ok: true; answer: AnswerValue } | { ok: false; reason: string }> {
    if (typeof answer !== 'string' || !answer.startsWith(ARTIFACT_ANSWER_PREFIX)) {
      return { ok: true, answer };
    }
    const name = answer.slice(ARTIFACT_ANSWER_PREFIX.length).trim();
    const artifact = session.artifact(name);
    if (!artifact) {
      return { ok: false, reason: `Unknown artifact: ${name}` };
    }
    try {
      const content = await fs.readFile(artifact.localPath);
      return { ok: true, answer: content.toString('base64') };
    } catch (err: unknown) {
      return { ok: false, reason: `Could not read artifact ${name}: ${errorMessage(err)}` };
    }
  }
}
