import { describe, it, expect } from 'vitest';
import { createRenderTool, extractPage } from '../../src/tools/render.js';
import { fakeFetch } from '../helpers.js';

const PAGE = 'https://quiz.example/task/1';
const HTML = '<html><body><h1>Quiz 1</h1>\n<p>  What is 2+2? </p><img src="/img/a.png"></body></html>';

function ctx() {
  return { workDir: '/tmp/qcr-render-unused', signal: new AbortController().signal, timeoutMs: 1000 };
}

describe('extractPage', () => {
  it('returns trimmed text lines and absolute image URLs', () => {
    const page = extractPage(HTML, PAGE, 10_000);
    expect(page.text).toBe('Quiz 1\nWhat is 2+2?');
    expect(page.images).toEqual(['https://quiz.example/img/a.png']);
    expect(page.html).toBe(HTML);
    expect(page.truncated).toBe(false);
  });

  it('truncates oversized documents', () => {
    const page = extractPage(HTML, PAGE, 10);
    expect(page.html).toBe('<html><bod... [TRUNCATED]');
    expect(page.text).toBe('Quiz 1\nWha... [TRUNCATED]');
    expect(page.truncated).toBe(true);
  });

  it('does not flag a page exactly at the limit', () => {
    const page = extractPage(HTML, PAGE, HTML.length);
    expect(page.html).toBe(HTML);
    expect(page.truncated).toBe(false);
  });
});

describe('render tool', () => {
  it('fetches and extracts the page', async () => {
    const { fetchImpl, calls } = fakeFetch(() => new Response(HTML, { status: 200, headers: { 'Content-Type': 'text/html' } }));
    const tool = createRenderTool({ maxChars: 10_000, fetchImpl });

    const output = await tool.invoke({ url: PAGE }, ctx());

    expect(calls[0]?.url).toBe(PAGE);
    expect(output.payload).toMatchObject({ url: PAGE, text: 'Quiz 1\nWhat is 2+2?' });
  });

  it('reports HTTP errors as IOError', async () => {
    const { fetchImpl } = fakeFetch(() => new Response('missing', { status: 404 }));
    const tool = createRenderTool({ maxChars: 10_000, fetchImpl });

    await expect(tool.invoke({ url: 'https://quiz.example/missing' }, ctx())).rejects.toMatchObject({
      kind: 'IOError',
      message: 'GET https://quiz.example/missing returned HTTP 404',
    });
  });

  it('reports network failures as IOError', async () => {
    const { fetchImpl } = fakeFetch(() => {
      throw new TypeError('fetch failed');
    });
    const tool = createRenderTool({ maxChars: 10_000, fetchImpl });

    await expect(tool.invoke({ url: PAGE }, ctx())).rejects.toMatchObject({
      kind: 'IOError',
      message: `GET ${PAGE} failed: fetch failed`,
    });
  });

  it('rejects a missing url', async () => {
    const tool = createRenderTool({ maxChars: 10_000 });
    await expect(tool.invoke({}, ctx())).rejects.toMatchObject({ kind: 'InvalidArguments' });
  });
});
