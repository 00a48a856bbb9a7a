import { spawn, ChildProcess } from 'node:child_process';

export interface SpawnOptions {
  timeoutMs: number;
  killGraceMs?: number;
  cwd?: string;
  signal?: AbortSignal;
  /** Bytes kept per stream; the rest is read and dropped. */
  maxBufferBytes?: number;
}

export interface SpawnResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  aborted: boolean;
  /** Set when either stream went past `maxBufferBytes`. */
  outputCapped: boolean;
  spawnError: string | null;
}

const DEFAULT_MAX_BUFFER_BYTES = 4 * 1024 * 1024;

class CappedBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  capped = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.capped = true;
      return;
    }
    const kept = chunk.byteLength > room ? chunk.subarray(0, room) : chunk;
    if (kept !== chunk) this.capped = true;
    this.chunks.push(kept);
    this.size += kept.byteLength;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

/**
 * Run a command in its own process group. Never rejects: timeouts,
 * cancellation and spawn failures are reported on the result.
 */
export function spawnWithTimeout(
  command: string,
  args: string[],
  options: SpawnOptions,
): Promise<SpawnResult> {
  return new Promise((resolve) => {
    const killGraceMs = options.killGraceMs ?? 5000;
    const maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
    const stdout = new CappedBuffer(maxBufferBytes);
    const stderr = new CappedBuffer(maxBufferBytes);
    let timedOut = false;
    let aborted = false;
    let settled = false;

    const child: ChildProcess = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    const timeoutHandle = setTimeout(() => {
      if (settled) return;
      timedOut = true;
      killProcessGroup(child, killGraceMs);
    }, options.timeoutMs);

    const onAbort = () => {
      if (settled) return;
      aborted = true;
      killProcessGroup(child, killGraceMs);
    };
    if (options.signal?.aborted) onAbort();
    else options.signal?.addEventListener('abort', onAbort, { once: true });

    const finish = (exitCode: number | null, spawnError: string | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutHandle);
      options.signal?.removeEventListener('abort', onAbort);
      resolve({
        stdout: stdout.text(),
        stderr: spawnError ?? stderr.text(),
        exitCode,
        timedOut,
        aborted,
        outputCapped: stdout.capped || stderr.capped,
        spawnError,
      });
    };

    child.on('close', (code) => finish(code, null));
    child.on('error', (err) => finish(null, err.message));
  });
}

function killProcessGroup(child: ChildProcess, graceMs: number): void {
  const pid = child.pid;
  if (!pid) return;

  // Process group first (POSIX), then the direct child
  try {
    process.kill(-pid, 'SIGTERM');
  } catch {
    try {
      child.kill('SIGTERM');
    } catch {
      return;
    }
  }

  const graceTimeout = setTimeout(() => {
    try {
      process.kill(-pid, 'SIGKILL');
    } catch {
      // group already gone; fall back to the child itself
      child.kill('SIGKILL');
    }
  }, graceMs);

  child.on('close', () => clearTimeout(graceTimeout));
}
