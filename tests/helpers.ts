import type { PlannerAdapter } from '../src/planner/types.js';
import { SessionState } from '../src/sessions/sessionState.js';
import type { Action, SessionSnapshot, ToolResult } from '../src/sessions/types.js';
import { PlannerError } from '../src/utils/errors.js';

export const TARGET = 'https://quiz.example/task/1';
export const IDENTITY = { email: 'student@example.com', secret: 'test-secret' };

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: string | null;
}

type Handler = (req: RecordedRequest, signal: AbortSignal | null) => Response | Promise<Response>;

/** In-process stand-in for `fetch`; records every request it sees. */
export function fakeFetch(handler: Handler) {
  const calls: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const req: RecordedRequest = {
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : null,
    };
    calls.push(req);
    return handler(req, init?.signal ?? null);
  };
  return { fetchImpl, calls };
}

/** A fetch that answers the queued responses in order, repeating the last one. */
export function sequenceFetch(responses: Array<() => Response>) {
  let next = 0;
  return fakeFetch(() => {
    const make = responses[Math.min(next, responses.length - 1)];
    next++;
    if (!make) throw new Error('no responses queued');
    return make();
  });
}

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

/** Never settles on its own; rejects with the signal's reason once it aborts. */
export function untilAborted(signal: AbortSignal | null): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export function makeSession(now: () => number = Date.now, target = TARGET, id = 'sess-0001'): SessionState {
  return new SessionState(id, IDENTITY, target, now);
}

/** Planner that replays a fixed script; an Error entry is thrown as a planner failure. */
export class ScriptedPlanner implements PlannerAdapter {
  readonly snapshots: SessionSnapshot[] = [];
  private step = 0;

  constructor(private readonly script: Array<Action | Error>) {}

  get calls(): number {
    return this.snapshots.length;
  }

  async decide(snapshot: SessionSnapshot): Promise<Action> {
    this.snapshots.push(snapshot);
    const entry = this.script[this.step++];
    if (!entry) throw new PlannerError('script exhausted');
    if (entry instanceof Error) throw entry;
    return entry;
  }
}

export function toolResult(patch: Partial<ToolResult> = {}): ToolResult {
  return {
    ok: true,
    payload: null,
    errorKind: null,
    errorDetail: null,
    artifacts: [],
    durationMs: 1,
    ...patch,
  };
}
