import { SessionClosedError } from '../utils/errors.js';
import {
  isTerminal,
  type Action,
  type ArtifactMeta,
  type ArtifactRef,
  type Identity,
  type RetryKind,
  type RetryState,
  type SessionRecord,
  type SessionSnapshot,
  type SessionStatus,
  type TerminalStatus,
  type ToolName,
  type Turn,
  type TurnResult,
} from './types.js';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function emptyRetryState(): RetryState {
  return { consecutiveFailures: 0, nextAttemptAt: null, lastDelayMs: 0, windowStartedAt: null };
}

/**
 * Mutable state of one quiz chain. Owned by exactly one control loop, which is
 * the only writer; once the status is terminal every mutator throws.
 */
export class SessionState {
  readonly sessionId: string;
  readonly identity: Readonly<Identity>;
  readonly initialTarget: string;
  readonly createdAt: string;

  private target: string;
  private currentStatus: SessionStatus = 'running';
  private readonly turns: Turn[] = [];
  private readonly artifactMap = new Map<string, ArtifactMeta>();
  private readonly retries = new Map<RetryKind, RetryState>();
  private rejections = 0;
  private completedTargets = 0;
  private targetSince: number;
  private updated: string;
  private ended: string | null = null;
  private summary: string | null = null;

  constructor(
    sessionId: string,
    identity: Identity,
    initialTarget: string,
    private readonly now: () => number = Date.now,
  ) {
    this.sessionId = sessionId;
    this.identity = Object.freeze({ ...identity });
    this.initialTarget = initialTarget;
    this.target = initialTarget;
    this.targetSince = now();
    this.createdAt = new Date(this.targetSince).toISOString();
    this.updated = this.createdAt;
  }

  get status(): SessionStatus {
    return this.currentStatus;
  }

  get currentTarget(): string {
    return this.target;
  }

  get turnCount(): number {
    return this.turns.length;
  }

  get turnHistory(): readonly Turn[] {
    return this.turns;
  }

  get rejectionsForTarget(): number {
    return this.rejections;
  }

  get targetStartedAt(): number {
    return this.targetSince;
  }

  get errorSummary(): string | null {
    return this.summary;
  }

  artifact(name: string): ArtifactMeta | undefined {
    return this.artifactMap.get(name);
  }

  retryState(kind: RetryKind): RetryState {
    return { ...(this.retries.get(kind) ?? emptyRetryState()) };
  }

  appendTurn(action: Action, result: TurnResult): Turn {
    this.assertWritable();
    const turn: Turn = deepFreeze({
      index: this.turns.length + 1,
      target: this.target,
      action: structuredClone(action),
      result: structuredClone(result),
      timestamp: new Date(this.now()).toISOString(),
    });
    this.turns.push(turn);
    this.touch();
    return turn;
  }

  advanceTarget(next: string): void {
    this.assertWritable();
    this.target = next;
    this.targetSince = this.now();
    this.rejections = 0;
    this.completedTargets++;
    const submission = this.retries.get('submission');
    if (submission) this.retries.set('submission', { ...submission, windowStartedAt: null });
    this.touch();
  }

  recordArtifact(ref: ArtifactRef, sourceTool: ToolName, turnIndex: number): void {
    this.assertWritable();
    this.artifactMap.set(ref.name, {
      localPath: ref.localPath,
      sourceTool,
      turnIndex,
      bytes: ref.bytes,
      sha256: ref.sha256,
    });
    this.touch();
  }

  noteRejection(): number {
    this.assertWritable();
    this.rejections++;
    this.touch();
    return this.rejections;
  }

  updateRetryState(kind: RetryKind, patch: Partial<RetryState>): void {
    this.assertWritable();
    this.retries.set(kind, { ...this.retryState(kind), ...patch });
    this.touch();
  }

  resetRetryState(kind: RetryKind): void {
    this.assertWritable();
    this.retries.set(kind, emptyRetryState());
    this.touch();
  }

  finish(status: TerminalStatus, errorSummary: string | null = null): void {
    this.assertWritable();
    if (status === 'succeeded') this.completedTargets++;
    this.currentStatus = status;
    this.summary = errorSummary;
    this.ended = new Date(this.now()).toISOString();
    this.updated = this.ended;
  }

  snapshot(historyTurns: number, targetTimeLimitMs: number = Number.POSITIVE_INFINITY): SessionSnapshot {
    const elapsed = Math.max(0, this.now() - this.targetSince);
    return structuredClone({
      session_id: this.sessionId,
      email: this.identity.email,
      current_target: this.target,
      status: this.currentStatus,
      turn_count: this.turns.length,
      rejections_for_target: this.rejections,
      target_elapsed_ms: elapsed,
      target_deadline_passed: elapsed >= targetTimeLimitMs,
      recent_turns: this.turns.slice(-historyTurns),
      artifacts: [...this.artifactMap].map(([name, meta]) => ({ name, ...meta })),
    });
  }

  toRecord(): SessionRecord {
    const retryState: SessionRecord['retry_state'] = {};
    for (const [kind, state] of this.retries) retryState[kind] = state;
    return structuredClone({
      session_id: this.sessionId,
      email: this.identity.email,
      initial_target: this.initialTarget,
      current_target: this.target,
      status: this.currentStatus,
      turns: [...this.turns],
      artifacts: Object.fromEntries(this.artifactMap),
      retry_state: retryState,
      targets_completed: this.completedTargets,
      created_at: this.createdAt,
      updated_at: this.updated,
      ended_at: this.ended,
      error_summary: this.summary,
    });
  }

  private assertWritable(): void {
    if (isTerminal(this.currentStatus)) {
      throw new SessionClosedError(this.sessionId, this.currentStatus);
    }
  }

  private touch(): void {
    this.updated = new Date(this.now()).toISOString();
  }
}
