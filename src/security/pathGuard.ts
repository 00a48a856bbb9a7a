import * as path from 'node:path';
import * as fs from 'node:fs';
import { minimatch } from 'minimatch';

export interface PathGuardResult {
  allowed: boolean;
  resolved?: string;
  reason?: string;
}

/**
 * Resolve through symlinks, walking up to the nearest existing ancestor when
 * the target does not exist yet (files a tool is about to write).
 */
function resolveWithAncestors(targetPath: string): string {
  const absPath = path.resolve(targetPath);
  const tail: string[] = [];
  let current = absPath;
  while (true) {
    try {
      return path.join(fs.realpathSync(current), ...tail);
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return absPath;
      tail.unshift(path.basename(current));
      current = parent;
    }
  }
}

function isUnderRoot(resolved: string, resolvedRoot: string): boolean {
  if (resolved === resolvedRoot) return true;
  const prefix = resolvedRoot.endsWith(path.sep) ? resolvedRoot : resolvedRoot + path.sep;
  return resolved.startsWith(prefix);
}

/**
 * Resolve `relativePath` against a session work directory and refuse anything
 * that escapes it or matches one of `denyGlobs` (matched relative to the root).
 */
export function resolveInsideRoot(
  root: string,
  relativePath: string,
  denyGlobs: string[],
): PathGuardResult {
  if (!relativePath || relativePath.includes('\0')) {
    return { allowed: false, reason: 'Invalid path: empty or contains null byte' };
  }
  if (path.isAbsolute(relativePath)) {
    return { allowed: false, reason: 'Absolute paths are not allowed' };
  }

  const resolvedRoot = resolveWithAncestors(root);
  const resolved = resolveWithAncestors(path.join(resolvedRoot, relativePath));

  if (resolved === resolvedRoot || !isUnderRoot(resolved, resolvedRoot)) {
    return { allowed: false, resolved, reason: 'Path escapes the session work directory' };
  }

  const relative = path.relative(resolvedRoot, resolved).split(path.sep).join('/');
  for (const glob of denyGlobs) {
    if (minimatch(relative, glob, { dot: true })) {
      return { allowed: false, resolved, reason: `Path matches deny glob: ${glob}` };
    }
  }

  return { allowed: true, resolved };
}
