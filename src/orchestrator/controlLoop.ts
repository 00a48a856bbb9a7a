import type { PlannerAdapter } from '../planner/types.js';
import type { SessionState } from '../sessions/sessionState.js';
import {
  isTerminal,
  isToolName,
  type Action,
  type AnswerValue,
  type SubmissionReport,
  type TerminalStatus,
  type Turn,
} from '../sessions/types.js';
import type { SubmissionManager } from '../submission/submissionManager.js';
import type { ToolGateway } from '../tools/gateway.js';
import { raceAbort, sleep as defaultSleep, type Sleep } from '../utils/abort.js';
import { RunnerError, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export type Phase = 'Planning' | 'Executing' | 'Evaluating' | 'Submitting' | 'Terminating';

export interface ControlLoopSettings {
  maxTurns: number;
  sessionWallClockBudgetMs: number;
  /** Backoff retries after the immediate re-query. */
  plannerMaxRetries: number;
  plannerBackoffMs: number;
  plannerHistoryTurns: number;
  maxRejectionsPerTarget: number;
  targetTimeLimitMs: number;
  toolTimeoutMs: number;
}

export interface ControlLoopDeps {
  planner: PlannerAdapter;
  gateway: Pick<ToolGateway, 'invoke'>;
  submissions: Pick<SubmissionManager, 'submit'>;
  settings: ControlLoopSettings;
  sleep?: Sleep;
  logger?: Logger;
  /** Called after every recorded turn, typically to persist the session. */
  onTurn?: (session: SessionState, turn: Turn) => Promise<void>;
}

export const DUPLICATE_ANSWER_REASON = 'Identical answer was already rejected for this target';

class BudgetExceededError extends RunnerError {
  constructor(budgetMs: number) {
    super(`Session exceeded its wall-clock budget of ${budgetMs}ms`, 'BUDGET_EXCEEDED');
    this.name = 'BudgetExceededError';
  }
}

/** JSON with object keys sorted, so equal answers compare equal. */
export function answerKey(answer: AnswerValue): string {
  if (Array.isArray(answer)) return `[${answer.map(answerKey).join(',')}]`;
  if (answer !== null && typeof answer === 'object') {
    const record = answer;
    const entries = Object.keys(record)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${answerKey(record[key] ?? null)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(answer);
}

function wasRejectedBefore(session: SessionState, key: string): boolean {
  return session.turnHistory.some(
    (turn) =>
      turn.target === session.currentTarget &&
      turn.action.type === 'submit_answer' &&
      turn.result.kind === 'submission' &&
      turn.result.report.outcome.kind === 'Rejected' &&
      answerKey(turn.action.answer) === key,
  );
}

/**
 * Drives one session from its first planning call to a terminal status. Turns
 * run strictly one after another; the returned status is already applied to
 * `session`. Never throws.
 */
export async function runControlLoop(
  session: SessionState,
  deps: ControlLoopDeps,
  signal: AbortSignal,
): Promise<TerminalStatus> {
  const { planner, gateway, submissions, settings } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const log = (deps.logger ?? silentLogger).child(session.sessionId.slice(0, 8), [session.identity.secret]);

  if (isTerminal(session.status)) return session.status;

  const budget = new AbortController();
  const budgetTimer = setTimeout(
    () => budget.abort(new BudgetExceededError(settings.sessionWallClockBudgetMs)),
    settings.sessionWallClockBudgetMs,
  );
  const loopSignal = AbortSignal.any([signal, budget.signal]);

  let phase: Phase | 'Starting' = 'Starting';
  const enter = (next: Phase) => {
    log.debug(`${phase} -> ${next}`);
    phase = next;
  };

  const terminate = (status: TerminalStatus, summary: string | null): TerminalStatus => {
    if (isTerminal(session.status)) return session.status;
    enter('Terminating');
    session.finish(status, summary);
    const message = `session ${status} after ${session.turnCount} turns${summary ? `: ${summary}` : ''}`;
    if (status === 'succeeded') log.info(message);
    else log.warn(message);
    return status;
  };

  const persist = async (turn: Turn): Promise<void> => {
    if (!deps.onTurn) return;
    try {
      await deps.onTurn(session, turn);
    } catch (err: unknown) {
      log.error(`failed to persist turn ${turn.index}: ${errorMessage(err)}`, err);
    }
  };

  // One call, one immediate re-query, then backoff retries
  const plan = async (): Promise<Action | null> => {
    const attempts = 2 + settings.plannerMaxRetries;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 2) await sleep(settings.plannerBackoffMs, loopSignal);
      try {
        return await raceAbort(
          planner.decide(session.snapshot(settings.plannerHistoryTurns, settings.targetTimeLimitMs), loopSignal),
          loopSignal,
        );
      } catch (err: unknown) {
        if (loopSignal.aborted) throw err;
        log.warn(`planner attempt ${attempt}/${attempts} failed: ${errorMessage(err)}`);
      }
    }
    return null;
  };

  const submit = async (action: Extract<Action, { type: 'submit_answer' }>): Promise<SubmissionReport> => {
    if (wasRejectedBefore(session, answerKey(action.answer))) {
      log.warn('planner repeated a rejected answer; not resending');
      return { outcome: { kind: 'Rejected', reason: DUPLICATE_ANSWER_REASON, nextTarget: null }, attempts: 0, delaysMs: [] };
    }
    return submissions.submit(session, action.answer, action.submitUrl, loopSignal);
  };

  const evaluate = (report: SubmissionReport): { status: TerminalStatus; summary: string | null } | null => {
    const { outcome } = report;
    switch (outcome.kind) {
      case 'Accepted':
        if (!outcome.nextTarget) return { status: 'succeeded', summary: null };
        log.info(`advancing to ${outcome.nextTarget}`);
        session.advanceTarget(outcome.nextTarget);
        return null;
      case 'Rejected': {
        const rejections = session.noteRejection();
        log.info(`answer rejected (${rejections}/${settings.maxRejectionsPerTarget}): ${outcome.reason}`);
        if (rejections < settings.maxRejectionsPerTarget) return null;
        if (!outcome.nextTarget) {
          return { status: 'failed', summary: `${rejections} rejected answers for ${session.currentTarget}` };
        }
        log.info(`giving up on ${session.currentTarget}, moving on to ${outcome.nextTarget}`);
        session.advanceTarget(outcome.nextTarget);
        return null;
      }
      case 'FatalError':
        return { status: 'failed', summary: outcome.reason };
      default:
        return { status: 'failed', summary: `Unexpected submission outcome ${outcome.kind}` };
    }
  };

  try {
    for (;;) {
      if (signal.aborted) return terminate('aborted', 'Cancelled');
      if (budget.signal.aborted) return terminate('failed', errorMessage(budget.signal.reason));
      if (session.turnCount >= settings.maxTurns) {
        return terminate('failed', `Turn limit of ${settings.maxTurns} reached`);
      }

      enter('Planning');
      const action = await plan();
      if (!action) {
        return terminate('failed', `Planner failed ${2 + settings.plannerMaxRetries} times in a row`);
      }
      log.debug(`turn ${session.turnCount + 1}: ${action.type}`);

      switch (action.type) {
        case 'invoke_tool':
        case 'request_dependency': {
          enter('Executing');
          const tool = action.type === 'invoke_tool' ? action.tool : 'install';
          const args = action.type === 'invoke_tool' ? action.args : { packages: action.packages };
          const result = await gateway.invoke(tool, args, settings.toolTimeoutMs, loopSignal);
          const turn = session.appendTurn(action, { kind: 'tool', tool, result });
          if (isToolName(tool)) {
            for (const artifact of result.artifacts) session.recordArtifact(artifact, tool, turn.index);
          }
          await persist(turn);
          enter('Evaluating');
          break;
        }

        case 'submit_answer': {
          enter('Submitting');
          const report = await submit(action);
          const turn = session.appendTurn(action, { kind: 'submission', report });
          enter('Evaluating');
          const ending = evaluate(report);
          await persist(turn);
          if (ending) return terminate(ending.status, ending.summary);
          break;
        }

        case 'stop':
          await persist(session.appendTurn(action, { kind: 'stop', reason: action.reason }));
          return terminate('aborted', action.reason);
      }
    }
  } catch (err: unknown) {
    if (signal.aborted) return terminate('aborted', 'Cancelled');
    if (budget.signal.aborted) return terminate('failed', errorMessage(budget.signal.reason));
    log.error(`control loop crashed: ${errorMessage(err)}`, err);
    return terminate('failed', `Unexpected error: ${errorMessage(err)}`);
  } finally {
    clearTimeout(budgetTimer);
  }
}
