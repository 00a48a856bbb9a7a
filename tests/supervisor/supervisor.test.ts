import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { ControlLoopSettings } from '../../src/orchestrator/controlLoop.js';
import type { PlannerAdapter } from '../../src/planner/types.js';
import { FileSessionStore } from '../../src/sessions/sessionStore.js';
import type { SubmissionReport } from '../../src/sessions/types.js';
import { SessionSupervisor, type SupervisorOptions } from '../../src/supervisor/supervisor.js';
import { CapacityExceededError } from '../../src/utils/errors.js';
import { IDENTITY, ScriptedPlanner, TARGET, untilAborted } from '../helpers.js';

const settings: ControlLoopSettings = {
  maxTurns: 20,
  sessionWallClockBudgetMs: 60_000,
  plannerMaxRetries: 0,
  plannerBackoffMs: 0,
  plannerHistoryTurns: 12,
  maxRejectionsPerTarget: 3,
  targetTimeLimitMs: 180_000,
  toolTimeoutMs: 1000,
};

const acceptAll = {
  submit: async (): Promise<SubmissionReport> => ({
    outcome: { kind: 'Accepted', nextTarget: null },
    attempts: 1,
    delaysMs: [],
  }),
};

// Waits until the session is cancelled
const stalledPlanner: PlannerAdapter = { decide: (_snapshot, signal) => untilAborted(signal) };

describe('SessionSupervisor', () => {
  let tmpDir: string;
  let store: FileSessionStore;

  function supervisor(overrides: Partial<SupervisorOptions> = {}) {
    return new SessionSupervisor({
      store,
      planner: new ScriptedPlanner([{ type: 'submit_answer', answer: '42' }]),
      submissions: acceptAll,
      tools: [],
      settings,
      maxConcurrentSessions: 2,
      ...overrides,
    });
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qcr-supervisor-'));
    store = new FileSessionStore(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('starts a session in the background and persists its final state', async () => {
    const sup = supervisor();

    const sessionId = await sup.start(IDENTITY, TARGET);
    expect(sessionId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    await sup.settled(sessionId);

    expect(sup.activeCount()).toBe(0);
    expect(await sup.status(sessionId)).toBe('succeeded');
    const record = await store.getRecord(sessionId);
    expect(record?.status).toBe('succeeded');
    expect(record?.turns).toHaveLength(1);
    expect(record?.ended_at).not.toBeNull();
    expect(JSON.stringify(record)).not.toContain('test-secret');
  });

  it('rejects new sessions at capacity and admits again after one ends', async () => {
    const sup = supervisor({ planner: stalledPlanner, maxConcurrentSessions: 1 });

    const first = await sup.start(IDENTITY, TARGET);
    await expect(sup.start(IDENTITY, TARGET)).rejects.toBeInstanceOf(CapacityExceededError);
    expect(await sup.status(first)).toBe('running');

    expect(sup.abort(first)).toBe(true);
    await sup.settled(first);

    expect(await sup.status(first)).toBe('aborted');
    expect((await store.getRecord(first))?.error_summary).toBe('Cancelled');
    const second = await sup.start(IDENTITY, TARGET);
    expect(sup.activeSessionIds()).toEqual([second]);
    await sup.shutdown();
  });

  it('refuses to abort unknown or finished sessions', async () => {
    const sup = supervisor();
    expect(sup.abort('no-such-session')).toBe(false);

    const sessionId = await sup.start(IDENTITY, TARGET);
    await sup.settled(sessionId);
    expect(sup.abort(sessionId)).toBe(false);
    expect(await sup.status('no-such-session')).toBeNull();
  });

  it('serves the live record while a session runs', async () => {
    const sup = supervisor({ planner: stalledPlanner });
    const sessionId = await sup.start(IDENTITY, TARGET);

    const record = await sup.getRecord(sessionId);
    expect(record?.status).toBe('running');
    expect(record?.current_target).toBe(TARGET);
    await sup.shutdown();
  });

  it('drains every running session on shutdown and stops admitting', async () => {
    const sup = supervisor({ planner: stalledPlanner });
    const a = await sup.start(IDENTITY, TARGET);
    const b = await sup.start(IDENTITY, TARGET);

    await sup.shutdown();

    expect(sup.activeCount()).toBe(0);
    expect(await sup.status(a)).toBe('aborted');
    expect(await sup.status(b)).toBe('aborted');
    await expect(sup.start(IDENTITY, TARGET)).rejects.toThrow('Supervisor is shutting down');
  });

  it('frees the slot when the session record cannot be created', async () => {
    const blocker = path.join(tmpDir, 'not-a-directory');
    fs.writeFileSync(blocker, '');
    const sup = supervisor({ store: new FileSessionStore(blocker) });

    await expect(sup.start(IDENTITY, TARGET)).rejects.toThrow();
    expect(sup.activeCount()).toBe(0);
  });

  it('persists each turn and records tool artifacts', async () => {
    const planner = new ScriptedPlanner([
      { type: 'invoke_tool', tool: 'execute', args: { code: 'print(1)' } },
      { type: 'submit_answer', answer: '1' },
    ]);
    const sup = supervisor({
      planner,
      tools: [
        {
          name: 'execute',
          invoke: async (_args, ctx) => {
            const file = path.join(ctx.workDir, 'out.txt');
            fs.writeFileSync(file, '1');
            return { payload: { stdout: '1\n' }, artifacts: [{ name: 'out.txt', localPath: file, bytes: 1, sha256: 'abc' }] };
          },
        },
      ],
    });

    const sessionId = await sup.start(IDENTITY, TARGET);
    await sup.settled(sessionId);

    const record = await store.getRecord(sessionId);
    expect(record?.turns.map(t => t.action.type)).toEqual(['invoke_tool', 'submit_answer']);
    expect(record?.artifacts['out.txt']).toMatchObject({ sourceTool: 'execute', turnIndex: 1 });
    expect(fs.existsSync(path.join(tmpDir, sessionId, 'files', 'out.txt'))).toBe(true);
  });
});
