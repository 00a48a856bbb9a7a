import { v4 as uuidv4 } from 'uuid';
import { runControlLoop, type ControlLoopSettings } from '../orchestrator/controlLoop.js';
import type { PlannerAdapter } from '../planner/types.js';
import { SessionState } from '../sessions/sessionState.js';
import type { FileSessionStore } from '../sessions/sessionStore.js';
import type { Identity, SessionRecord, SessionStatus } from '../sessions/types.js';
import type { SubmissionManager } from '../submission/submissionManager.js';
import { ToolGateway } from '../tools/gateway.js';
import type { ToolHandler } from '../tools/types.js';
import type { Sleep } from '../utils/abort.js';
import { CapacityExceededError, RunnerError, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { SessionRegistry } from './sessionRegistry.js';

export interface SupervisorOptions {
  store: FileSessionStore;
  planner: PlannerAdapter;
  submissions: Pick<SubmissionManager, 'submit'>;
  tools: ToolHandler[];
  settings: ControlLoopSettings;
  maxConcurrentSessions: number;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
}

interface RunningSession {
  session: SessionState;
  controller: AbortController;
  gateway: ToolGateway;
  done: Promise<void>;
  released: boolean;
}

/**
 * Owns the set of running sessions: admits new ones up to the concurrency
 * limit, runs each control loop in the background and tears it down exactly
 * once when the loop ends.
 */
export class SessionSupervisor {
  private readonly registry: SessionRegistry<RunningSession>;
  private readonly logger: Logger;
  private readonly now: () => number;
  private closing = false;

  constructor(private readonly options: SupervisorOptions) {
    this.registry = new SessionRegistry(options.maxConcurrentSessions);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /** Returns as soon as the session is recorded; the chain runs in the background. */
  async start(identity: Identity, initialTarget: string): Promise<string> {
    if (this.closing) {
      throw new RunnerError('Supervisor is shutting down', 'SHUTTING_DOWN');
    }

    const sessionId = uuidv4();
    const session = new SessionState(sessionId, identity, initialTarget, this.now);
    const entry: RunningSession = {
      session,
      controller: new AbortController(),
      gateway: new ToolGateway(
        this.options.tools,
        this.options.store.workDir(sessionId),
        this.logger.child(`tools:${sessionId.slice(0, 8)}`, [identity.secret]),
        this.now,
      ),
      done: Promise.resolve(),
      released: false,
    };

    // Slot is taken before any await so concurrent starts cannot overshoot the limit
    if (!this.registry.acquire(sessionId, entry)) {
      throw new CapacityExceededError(this.registry.maxConcurrent);
    }

    try {
      await this.options.store.create(session.toRecord());
    } catch (err: unknown) {
      entry.gateway.close();
      this.registry.release(sessionId, entry);
      throw err;
    }

    this.logger.info(`session ${sessionId} started for ${identity.email} at ${initialTarget}`);
    entry.done = this.run(entry);
    return sessionId;
  }

  async status(sessionId: string): Promise<SessionStatus | null> {
    const live = this.registry.get(sessionId);
    if (live) return live.session.status;
    const record = await this.options.store.getRecord(sessionId);
    return record?.status ?? null;
  }

  async getRecord(sessionId: string): Promise<SessionRecord | null> {
    const live = this.registry.get(sessionId);
    if (live) return live.session.toRecord();
    return this.options.store.getRecord(sessionId);
  }

  /** Requests cancellation. False when the session is not running here. */
  abort(sessionId: string, reason = 'Aborted by client request'): boolean {
    const live = this.registry.get(sessionId);
    if (!live || live.session.status !== 'running' || live.controller.signal.aborted) {
      return false;
    }
    this.logger.info(`aborting session ${sessionId}: ${reason}`);
    live.controller.abort(new DOMException(reason, 'AbortError'));
    return true;
  }

  /** Resolves once the session has been released; immediately for unknown ids. */
  settled(sessionId: string): Promise<void> {
    return this.registry.get(sessionId)?.done ?? Promise.resolve();
  }

  activeCount(): number {
    return this.registry.size;
  }

  activeSessionIds(): string[] {
    return this.registry.ids();
  }

  /** Stops admitting sessions, cancels the running ones and waits for them to drain. */
  async shutdown(): Promise<void> {
    this.closing = true;
    const running = this.registry.values();
    for (const entry of running) {
      this.abort(entry.session.sessionId, 'Server shutting down');
    }
    await Promise.all(running.map(entry => entry.done));
  }

  private async run(entry: RunningSession): Promise<void> {
    const { session, controller, gateway } = entry;
    const { store } = this.options;
    try {
      const status = await runControlLoop(
        session,
        {
          planner: this.options.planner,
          gateway,
          submissions: this.options.submissions,
          settings: this.options.settings,
          sleep: this.options.sleep,
          logger: this.logger,
          onTurn: (s) => store.save(s.toRecord()),
        },
        controller.signal,
      );
      this.logger.info(`session ${session.sessionId} finished: ${status}`);
    } catch (err: unknown) {
      this.logger.error(`session ${session.sessionId} loop error: ${errorMessage(err)}`, err);
    } finally {
      await this.release(entry);
    }
  }

  private async release(entry: RunningSession): Promise<void> {
    if (entry.released) return;
    entry.released = true;
    const { session } = entry;

    entry.gateway.close();
    try {
      await this.options.store.save(session.toRecord());
    } catch (err: unknown) {
      this.logger.error(`could not save final record for ${session.sessionId}: ${errorMessage(err)}`, err);
    }
    this.registry.release(session.sessionId, entry);
  }
}
