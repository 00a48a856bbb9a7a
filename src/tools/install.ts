import { z } from 'zod';
import { validateDependencyList } from '../security/policy.js';
import { spawnWithTimeout } from '../utils/exec.js';
import { ToolFailure } from '../utils/errors.js';
import { defineTool, type ToolHandler } from './types.js';

export interface InstallOptions {
  /** Installer invocation; one package name is appended per run. */
  command: string[];
  cwd?: string;
}

export interface PackageResult {
  name: string;
  ok: boolean;
  detail: string;
}

const installArgs = z.object({ packages: z.array(z.string()).min(1) });

export function createInstallTool(options: InstallOptions): ToolHandler {
  const [program, ...programArgs] = options.command;

  return defineTool('install', installArgs, async ({ packages }, ctx) => {
    if (!program) {
      throw new ToolFailure('Unavailable', 'No installer configured');
    }
    const validation = validateDependencyList(packages);
    if (!validation.valid || !validation.sanitized) {
      throw new ToolFailure('InvalidArguments', validation.errors.join('; '));
    }

    const results: PackageResult[] = [];
    for (const name of validation.sanitized) {
      const run = await spawnWithTimeout(program, [...programArgs, name], {
        timeoutMs: ctx.timeoutMs,
        cwd: options.cwd,
        signal: ctx.signal,
        maxBufferBytes: 64 * 1024,
      });
      if (run.spawnError) {
        throw new ToolFailure('Unavailable', `Could not start ${program}: ${run.spawnError}`, { results });
      }
      if (run.timedOut || run.aborted) {
        throw new ToolFailure('Timeout', `Installing ${name} did not finish`, { results });
      }
      const ok = run.exitCode === 0;
      results.push({
        name,
        ok,
        detail: ok ? 'installed' : (run.stderr.trim() || `exit code ${run.exitCode}`).slice(0, 300),
      });
    }

    if (results.every(r => !r.ok)) {
      throw new ToolFailure('ExecutionError', `No package could be installed: ${results.map(r => r.name).join(', ')}`, { results });
    }
    return { payload: { results } };
  });
}
