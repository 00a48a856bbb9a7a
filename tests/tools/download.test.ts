import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { createHash } from 'node:crypto';
import { createDownloadTool } from '../../src/tools/download.js';
import { fakeFetch } from '../helpers.js';

const CSV = 'a,b\n1,2\n';

describe('download tool', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'qcr-download-')));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  function ctx() {
    return { workDir, signal: new AbortController().signal, timeoutMs: 1000 };
  }

  it('saves the body under the URL file name and reports the artifact', async () => {
    const { fetchImpl } = fakeFetch(() => new Response(CSV, { status: 200 }));
    const tool = createDownloadTool({ denyGlobs: [], fetchImpl });

    const output = await tool.invoke({ url: 'https://quiz.example/files/data.csv' }, ctx());

    const target = path.join(workDir, 'data.csv');
    expect(output.payload).toEqual({ localPath: target, originalName: 'data.csv', bytes: 8 });
    expect(fs.readFileSync(target, 'utf-8')).toBe(CSV);
    expect(fs.existsSync(`${target}.part`)).toBe(false);
    expect(output.artifacts).toEqual([
      { name: 'data.csv', localPath: target, bytes: 8, sha256: createHash('sha256').update(CSV).digest('hex') },
    ]);
  });

  it('uses the requested file name', async () => {
    const { fetchImpl } = fakeFetch(() => new Response(CSV, { status: 200 }));
    const tool = createDownloadTool({ denyGlobs: [], fetchImpl });

    const output = await tool.invoke({ url: 'https://quiz.example/export?id=7', filename: 'export.csv' }, ctx());

    expect(output.payload).toMatchObject({ originalName: 'export.csv' });
    expect(fs.existsSync(path.join(workDir, 'export.csv'))).toBe(true);
  });

  it('refuses names that escape the work directory or match a deny glob', async () => {
    const { fetchImpl, calls } = fakeFetch(() => new Response(CSV, { status: 200 }));
    const tool = createDownloadTool({ denyGlobs: ['**/.env'], fetchImpl });

    await expect(tool.invoke({ url: 'https://quiz.example/x', filename: '../escape.txt' }, ctx())).rejects.toMatchObject({
      kind: 'InvalidArguments',
      message: 'Refusing to write "../escape.txt": Path escapes the session work directory',
    });
    await expect(tool.invoke({ url: 'https://quiz.example/x', filename: '.env' }, ctx())).rejects.toMatchObject({
      kind: 'InvalidArguments',
      message: 'Refusing to write ".env": Path matches deny glob: **/.env',
    });
    expect(calls).toHaveLength(0);
  });

  it('refuses file names that are not plain names', async () => {
    const { fetchImpl, calls } = fakeFetch(() => new Response(CSV, { status: 200 }));
    const tool = createDownloadTool({ denyGlobs: [], fetchImpl });

    await expect(tool.invoke({ url: 'https://quiz.example/x', filename: 'nested/dir/d.csv' }, ctx())).rejects.toMatchObject({
      kind: 'InvalidArguments',
      message: 'Refusing to write "nested/dir/d.csv": must be a plain file name',
    });
    await expect(tool.invoke({ url: 'https://quiz.example/files/sub%2Fd.csv' }, ctx())).rejects.toMatchObject({
      kind: 'InvalidArguments',
      message: 'Refusing to write "sub/d.csv": must be a plain file name',
    });
    expect(calls).toHaveLength(0);
    expect(fs.readdirSync(workDir)).toEqual([]);
  });

  it('refuses a URL whose file name has a malformed escape', async () => {
    const { fetchImpl, calls } = fakeFetch(() => new Response(CSV, { status: 200 }));
    const tool = createDownloadTool({ denyGlobs: [], fetchImpl });

    await expect(tool.invoke({ url: 'https://quiz.example/files/bad%E0%A4.csv' }, ctx())).rejects.toMatchObject({
      kind: 'InvalidArguments',
      message: 'Malformed escape in URL file name: bad%E0%A4.csv',
    });
    expect(calls).toHaveLength(0);
  });

  it('reports HTTP errors as IOError without writing anything', async () => {
    const { fetchImpl } = fakeFetch(() => new Response('', { status: 500 }));
    const tool = createDownloadTool({ denyGlobs: [], fetchImpl });

    await expect(tool.invoke({ url: 'https://quiz.example/files/data.csv' }, ctx())).rejects.toMatchObject({
      kind: 'IOError',
      message: 'GET https://quiz.example/files/data.csv returned HTTP 500',
    });
    expect(fs.readdirSync(workDir)).toEqual([]);
  });
});
