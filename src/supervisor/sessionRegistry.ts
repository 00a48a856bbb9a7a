/**
 * Bounded registry of running sessions. Synchronous and in-memory: every
 * mutation happens within a single event-loop tick, so no further locking
 * is needed.
 */
export class SessionRegistry<T> {
  private readonly entries = new Map<string, T>();

  constructor(readonly maxConcurrent: number) {}

  acquire(sessionId: string, entry: T): boolean {
    if (this.entries.size >= this.maxConcurrent || this.entries.has(sessionId)) {
      return false;
    }
    this.entries.set(sessionId, entry);
    return true;
  }

  /** Frees the slot only when `entry` still owns it; repeated calls are no-ops. */
  release(sessionId: string, entry: T): boolean {
    if (this.entries.get(sessionId) !== entry) return false;
    this.entries.delete(sessionId);
    return true;
  }

  get(sessionId: string): T | undefined {
    return this.entries.get(sessionId);
  }

  get size(): number {
    return this.entries.size;
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  values(): T[] {
    return [...this.entries.values()];
  }
}
