export type SessionStatus = 'running' | 'succeeded' | 'failed' | 'aborted';

export type TerminalStatus = Exclude<SessionStatus, 'running'>;

export function isTerminal(status: SessionStatus): status is TerminalStatus {
  return status !== 'running';
}

export interface Identity {
  email: string;
  secret: string;
}

export const TOOL_NAMES = ['render', 'download', 'execute', 'install'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(value);
}

export type ToolErrorKind = 'Timeout' | 'ExecutionError' | 'IOError' | 'InvalidArguments' | 'Unavailable';

export interface ArtifactRef {
  name: string;
  localPath: string;
  bytes: number;
  sha256: string;
}

export interface ArtifactMeta {
  localPath: string;
  sourceTool: ToolName;
  turnIndex: number;
  bytes: number;
  sha256: string;
}

export interface ToolResult {
  ok: boolean;
  payload: unknown;
  errorKind: ToolErrorKind | null;
  errorDetail: string | null;
  artifacts: ArtifactRef[];
  durationMs: number;
}

export type AnswerValue =
  | string
  | number
  | boolean
  | null
  | AnswerValue[]
  | { [key: string]: AnswerValue };

export type Action =
  | { type: 'invoke_tool'; tool: string; args: Record<string, unknown> }
  | { type: 'submit_answer'; answer: AnswerValue; submitUrl?: string }
  | { type: 'request_dependency'; packages: string[] }
  | { type: 'stop'; reason: string };

export type SubmissionOutcome =
  | { kind: 'Accepted'; nextTarget: string | null }
  | { kind: 'Rejected'; reason: string; nextTarget: string | null }
  | { kind: 'RateLimited'; retryAfterMs: number }
  | { kind: 'TransientError'; reason: string }
  | { kind: 'FatalError'; reason: string };

export interface SubmissionReport {
  outcome: SubmissionOutcome;
  attempts: number;
  delaysMs: number[];
}

export type TurnResult =
  | { kind: 'tool'; tool: ToolName | string; result: ToolResult }
  | { kind: 'submission'; report: SubmissionReport }
  | { kind: 'stop'; reason: string };

export interface Turn {
  readonly index: number;
  readonly target: string;
  readonly action: Action;
  readonly result: TurnResult;
  readonly timestamp: string;
}

export type RetryKind = 'submission';

export interface RetryState {
  consecutiveFailures: number;
  nextAttemptAt: number | null;
  lastDelayMs: number;
  /** When the first attempt against the current target was made. */
  windowStartedAt: number | null;
}

export interface SessionSnapshot {
  session_id: string;
  email: string;
  current_target: string;
  status: SessionStatus;
  turn_count: number;
  rejections_for_target: number;
  /** Time since the current target became current. */
  target_elapsed_ms: number;
  /** Set once `target_elapsed_ms` is past the per-target time limit; the planner should submit. */
  target_deadline_passed: boolean;
  recent_turns: Turn[];
  artifacts: Array<{ name: string } & ArtifactMeta>;
}

/** Persisted view of a session; carries no secret. */
export interface SessionRecord {
  session_id: string;
  email: string;
  initial_target: string;
  current_target: string;
  status: SessionStatus;
  turns: Turn[];
  artifacts: Record<string, ArtifactMeta>;
  retry_state: Partial<Record<RetryKind, RetryState>>;
  targets_completed: number;
  created_at: string;
  updated_at: string;
  ended_at: string | null;
  error_summary: string | null;
}

export interface SessionSummary {
  session_id: string;
  status: SessionStatus;
  email: string;
  current_target: string;
  turns: number;
  created_at: string;
  updated_at: string;
}
