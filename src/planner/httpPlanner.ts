import { buildPlannerPrompt } from '../security/promptTemplate.js';
import type { Action, SessionSnapshot } from '../sessions/types.js';
import { deadlineSignal } from '../utils/abort.js';
import { PlannerError, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { parseDecision } from './schema.js';
import type { PlannerAdapter } from './types.js';

export interface HttpPlannerOptions {
  url: string;
  apiKey?: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

/** Planner backed by a JSON-over-HTTP decision service. */
export class HttpPlanner implements PlannerAdapter {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: HttpPlannerOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  async decide(snapshot: SessionSnapshot, signal: AbortSignal): Promise<Action> {
    const { prompt, templateHash } = buildPlannerPrompt(snapshot);
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const bound = deadlineSignal(this.options.timeoutMs, signal);
    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          session_id: snapshot.session_id,
          prompt,
          template_hash: templateHash,
          snapshot,
        }),
        signal: bound,
      });
      text = await res.text();
    } catch (err: unknown) {
      if (signal.aborted) throw err;
      if (bound.aborted) {
        throw new PlannerError(`Planner did not answer within ${this.options.timeoutMs}ms`, err);
      }
      throw new PlannerError(`Planner unreachable: ${errorMessage(err)}`, err);
    }

    if (!res.ok) {
      throw new PlannerError(`Planner returned HTTP ${res.status}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err: unknown) {
      throw new PlannerError('Planner response is not JSON', err);
    }

    const action = parseDecision(body);
    this.logger.debug(`planner chose ${action.type}`);
    return action;
  }
}
