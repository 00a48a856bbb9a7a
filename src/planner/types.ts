import type { Action, SessionSnapshot } from '../sessions/types.js';

/**
 * The external decision service. Implementations may be slow or fail; they
 * must throw PlannerError for anything that is not a well-formed Action and
 * must never touch session state.
 */
export interface PlannerAdapter {
  decide(snapshot: SessionSnapshot, signal: AbortSignal): Promise<Action>;
}
