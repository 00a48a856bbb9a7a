import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import type { ArtifactRef } from '../sessions/types.js';

export async function describeArtifact(filePath: string): Promise<ArtifactRef> {
  const content = await fs.readFile(filePath);
  return {
    name: path.basename(filePath),
    localPath: filePath,
    bytes: content.byteLength,
    sha256: crypto.createHash('sha256').update(content).digest('hex'),
  };
}

/**
 * Build an artifact index from the regular files directly inside `dir`.
 * Subdirectories and symlinks are skipped; a missing directory yields [].
 */
export async function buildArtifactIndex(dir: string): Promise<ArtifactRef[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }

  const artifacts: ArtifactRef[] = [];
  for (const entry of entries.sort()) {
    const fullPath = path.join(dir, entry);
    const lstat = await fs.lstat(fullPath);
    if (!lstat.isFile() || lstat.isSymbolicLink()) continue;
    artifacts.push(await describeArtifact(fullPath));
  }
  return artifacts;
}

/** Entries of `after` that are new or whose content differs from `before`. */
export function changedArtifacts(before: ArtifactRef[], after: ArtifactRef[]): ArtifactRef[] {
  const previous = new Map(before.map(a => [a.name, a.sha256]));
  return after.filter(a => previous.get(a.name) !== a.sha256);
}
