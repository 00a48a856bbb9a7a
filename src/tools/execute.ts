import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { buildArtifactIndex, changedArtifacts } from '../utils/artifacts.js';
import { spawnWithTimeout } from '../utils/exec.js';
import { ToolFailure } from '../utils/errors.js';
import { defineTool, truncate, type ToolHandler } from './types.js';

export interface ExecuteOptions {
  /** Interpreter invocation; the script path is appended. */
  command: string[];
  scriptName?: string;
  outputMaxChars: number;
  killGraceMs?: number;
}

export interface ExecutionPayload {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

const executeArgs = z.object({ code: z.string().min(1) });

/** Planner output often wraps code in Markdown fences. */
export function stripCodeFences(code: string): string {
  let body = code.trim();
  if (body.startsWith('```')) {
    const newline = body.indexOf('\n');
    body = newline === -1 ? '' : body.slice(newline + 1);
  }
  if (body.endsWith('```')) {
    body = body.slice(0, -3);
  }
  return body.trim();
}

export function createExecuteTool(options: ExecuteOptions): ToolHandler {
  const [program, ...programArgs] = options.command;
  const scriptName = options.scriptName ?? 'runner.py';

  return defineTool('execute', executeArgs, async ({ code }, ctx) => {
    if (!program) {
      throw new ToolFailure('Unavailable', 'No interpreter configured for execute');
    }
    await fs.mkdir(ctx.workDir, { recursive: true });
    await fs.writeFile(path.join(ctx.workDir, scriptName), stripCodeFences(code));

    const before = await buildArtifactIndex(ctx.workDir);
    const result = await spawnWithTimeout(program, [...programArgs, scriptName], {
      timeoutMs: ctx.timeoutMs,
      killGraceMs: options.killGraceMs,
      cwd: ctx.workDir,
      signal: ctx.signal,
      // UTF-8 needs at most four bytes per character
      maxBufferBytes: options.outputMaxChars * 4,
    });

    if (result.spawnError) {
      throw new ToolFailure('Unavailable', `Could not start ${program}: ${result.spawnError}`);
    }

    const payload: ExecutionPayload = {
      stdout: truncate(result.stdout, options.outputMaxChars),
      stderr: truncate(result.stderr, options.outputMaxChars),
      exitCode: result.exitCode,
    };

    if (result.timedOut || result.aborted) {
      throw new ToolFailure('Timeout', result.aborted ? 'Execution cancelled' : `Execution exceeded ${ctx.timeoutMs}ms`, payload);
    }
    if (result.exitCode !== 0) {
      const stderrTail = payload.stderr.trim().split('\n').slice(-5).join('\n');
      throw new ToolFailure('ExecutionError', `Exited with code ${result.exitCode}: ${stderrTail}`, payload);
    }

    const after = await buildArtifactIndex(ctx.workDir);
    return {
      payload,
      artifacts: changedArtifacts(before, after).filter(a => a.name !== scriptName),
    };
  });
}
