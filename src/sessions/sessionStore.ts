import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { SessionRecord, SessionSummary } from './types.js';
import { errorCode } from '../utils/errors.js';

const SESSION_ID_PATTERN = /^[a-zA-Z0-9_-]{1,128}$/;
const RECORD_FILE = 'session.json';

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}

function validateSessionId(sessionId: string): void {
  if (!isValidSessionId(sessionId)) {
    throw new Error(`Invalid session ID: must match ${SESSION_ID_PATTERN.source}`);
  }
}

/**
 * Transcript persistence: one directory per session holding `session.json`
 * and a `files/` work directory for tool artifacts.
 */
export class FileSessionStore {
  private readonly locks = new Map<string, Promise<void>>();

  constructor(private readonly baseDir: string) {}

  private withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.locks.get(sessionId) ?? Promise.resolve();
    const next = prev.then(fn, fn);
    const cleanup = next.then(() => {}, () => {});
    this.locks.set(sessionId, cleanup);
    void cleanup.then(() => {
      if (this.locks.get(sessionId) === cleanup) {
        this.locks.delete(sessionId);
      }
    });
    return next;
  }

  workDir(sessionId: string): string {
    validateSessionId(sessionId);
    return path.join(this.baseDir, sessionId, 'files');
  }

  async create(record: SessionRecord): Promise<void> {
    const sessionId = record.session_id;
    validateSessionId(sessionId);
    return this.withLock(sessionId, async () => {
      const dir = path.join(this.baseDir, sessionId);

      try {
        await fs.access(path.join(dir, RECORD_FILE));
        throw new Error(`Session ${sessionId} already exists`);
      } catch (err: unknown) {
        if (errorCode(err) !== 'ENOENT') throw err;
      }

      await fs.mkdir(path.join(dir, 'files'), { recursive: true });
      await this.write(sessionId, record);
    });
  }

  async save(record: SessionRecord): Promise<void> {
    const sessionId = record.session_id;
    validateSessionId(sessionId);
    return this.withLock(sessionId, () => this.write(sessionId, record));
  }

  async getRecord(sessionId: string): Promise<SessionRecord | null> {
    if (!isValidSessionId(sessionId)) return null;
    const filePath = path.join(this.baseDir, sessionId, RECORD_FILE);
    try {
      const data = await fs.readFile(filePath, 'utf-8');
      return JSON.parse(data) as SessionRecord;
    } catch (err: unknown) {
      if (errorCode(err) === 'ENOENT') return null;
      throw err;
    }
  }

  async listSessions(): Promise<SessionSummary[]> {
    const summaries: SessionSummary[] = [];
    for (const entry of await this.sessionDirs()) {
      const record = await this.getRecord(entry);
      if (!record) continue;
      summaries.push({
        session_id: record.session_id,
        status: record.status,
        email: record.email,
        current_target: record.current_target,
        turns: record.turns.length,
        created_at: record.created_at,
        updated_at: record.updated_at,
      });
    }
    return summaries.sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  /** Sessions a previous process left running can never finish; mark them aborted. */
  async markAbortedOnStartup(): Promise<string[]> {
    const marked: string[] = [];
    for (const entry of await this.sessionDirs()) {
      const record = await this.getRecord(entry);
      if (!record || record.status !== 'running') continue;
      const now = new Date().toISOString();
      await this.save({
        ...record,
        status: 'aborted',
        ended_at: now,
        updated_at: now,
        error_summary: 'Server restarted while session was running',
      });
      marked.push(entry);
    }
    return marked;
  }

  private async sessionDirs(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.baseDir);
      return entries.filter(isValidSessionId);
    } catch (err: unknown) {
      if (errorCode(err) === 'ENOENT') return [];
      throw err;
    }
  }

  private async write(sessionId: string, record: SessionRecord): Promise<void> {
    const filePath = path.join(this.baseDir, sessionId, RECORD_FILE);
    const tmpPath = filePath + '.tmp';
    await fs.writeFile(tmpPath, JSON.stringify(record, null, 2));
    await fs.rename(tmpPath, filePath);
  }
}
