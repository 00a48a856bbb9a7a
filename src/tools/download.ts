import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { resolveInsideRoot } from '../security/pathGuard.js';
import { describeArtifact } from '../utils/artifacts.js';
import { isAbortError } from '../utils/abort.js';
import { ToolFailure, errorMessage } from '../utils/errors.js';
import { defineTool, type ToolHandler } from './types.js';

export interface DownloadOptions {
  denyGlobs: string[];
  fetchImpl?: typeof fetch;
}

const downloadArgs = z.object({
  url: z.string().url(),
  filename: z.string().min(1).optional(),
});

function defaultFileName(url: string): string {
  const base = path.posix.basename(new URL(url).pathname);
  if (!base || base === '/') return 'download.bin';
  try {
    return decodeURIComponent(base);
  } catch {
    throw new ToolFailure('InvalidArguments', `Malformed escape in URL file name: ${base}`);
  }
}

export function createDownloadTool(options: DownloadOptions): ToolHandler {
  const fetchImpl = options.fetchImpl ?? fetch;

  return defineTool('download', downloadArgs, async ({ url, filename }, ctx) => {
    const originalName = filename ?? defaultFileName(url);
    const guard = resolveInsideRoot(ctx.workDir, originalName, options.denyGlobs);
    if (!guard.allowed || !guard.resolved) {
      throw new ToolFailure('InvalidArguments', `Refusing to write ${JSON.stringify(originalName)}: ${guard.reason}`);
    }
    // Artifacts are indexed one level deep; nested names would never be seen
    if (path.basename(originalName) !== originalName || originalName.includes('\\')) {
      throw new ToolFailure('InvalidArguments', `Refusing to write ${JSON.stringify(originalName)}: must be a plain file name`);
    }
    const target = guard.resolved;

    let res: Response;
    try {
      res = await fetchImpl(url, { signal: ctx.signal, redirect: 'follow' });
    } catch (err: unknown) {
      if (isAbortError(err)) throw err;
      throw new ToolFailure('IOError', `GET ${url} failed: ${errorMessage(err)}`);
    }
    if (!res.ok) {
      throw new ToolFailure('IOError', `GET ${url} returned HTTP ${res.status}`);
    }

    const body = Buffer.from(await res.arrayBuffer());

    // Partial files only ever exist under the .part name
    const partial = `${target}.part`;
    try {
      await fs.mkdir(ctx.workDir, { recursive: true });
      await fs.writeFile(partial, body);
      await fs.rename(partial, target);
    } catch (err: unknown) {
      await fs.rm(partial, { force: true });
      throw new ToolFailure('IOError', `Could not save ${originalName}: ${errorMessage(err)}`);
    }

    const artifact = await describeArtifact(target);
    return {
      payload: { localPath: target, originalName, bytes: artifact.bytes },
      artifacts: [{ ...artifact, name: originalName }],
    };
  });
}
