import { JSDOM } from 'jsdom';
import { z } from 'zod';
import { isAbortError } from '../utils/abort.js';
import { ToolFailure, errorMessage } from '../utils/errors.js';
import { defineTool, truncate, type ToolHandler } from './types.js';

export interface RenderOptions {
  maxChars: number;
  fetchImpl?: typeof fetch;
}

export interface RenderedPage {
  url: string;
  text: string;
  html: string;
  images: string[];
  truncated: boolean;
}

const renderArgs = z.object({ url: z.string().url() });

export function extractPage(html: string, pageUrl: string, maxChars: number): RenderedPage {
  const dom = new JSDOM(html, { url: pageUrl });
  try {
    const { document } = dom.window;
    const images: string[] = [];
    for (const img of document.querySelectorAll('img[src]')) {
      const src = img.getAttribute('src');
      if (!src) continue;
      try {
        images.push(new URL(src, pageUrl).href);
      } catch {
        // unresolvable src attributes are left out
      }
    }
    const text = (document.body?.textContent ?? '')
      .split('\n')
      .map(line => line.trim())
      .filter(Boolean)
      .join('\n');

    return {
      url: pageUrl,
      text: truncate(text, maxChars, '... [TRUNCATED]'),
      html: truncate(html, maxChars, '... [TRUNCATED]'),
      images,
      truncated: text.length > maxChars || html.length > maxChars,
    };
  } finally {
    dom.window.close();
  }
}

/**
 * Fetches the page and returns its document text, markup and image URLs.
 * Scripts are not executed; pages that build their content client-side
 * still come back with whatever markup the server sent.
 */
export function createRenderTool(options: RenderOptions): ToolHandler {
  const fetchImpl = options.fetchImpl ?? fetch;

  return defineTool('render', renderArgs, async ({ url }, ctx) => {
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
    const html = await res.text();
    return { payload: extractPage(html, res.url || url, options.maxChars) };
  });
}
