import type { ToolErrorKind } from '../sessions/types.js';

export class RunnerError extends Error {
  readonly code: string;
  override readonly cause?: unknown;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = 'RunnerError';
    this.code = code;
    this.cause = cause;
  }
}

export class CapacityExceededError extends RunnerError {
  constructor(readonly limit: number) {
    super(`Session limit reached (${limit} running)`, 'CAPACITY_EXCEEDED');
    this.name = 'CapacityExceededError';
  }
}

export class PlannerError extends RunnerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PLANNER_ERROR', cause);
    this.name = 'PlannerError';
  }
}

export class SessionClosedError extends RunnerError {
  constructor(sessionId: string, status: string) {
    super(`Session ${sessionId} is ${status} and can no longer change`, 'SESSION_CLOSED');
    this.name = 'SessionClosedError';
  }
}

/**
 * Thrown by a tool to report a categorized failure. `payload` travels with the
 * failed ToolResult so the planner still sees partial output.
 */
export class ToolFailure extends RunnerError {
  constructor(
    readonly kind: ToolErrorKind,
    message: string,
    readonly payload: unknown = null,
  ) {
    super(message, `TOOL_${kind.toUpperCase()}`);
    this.name = 'ToolFailure';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
