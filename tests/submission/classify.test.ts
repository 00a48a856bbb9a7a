import { describe, it, expect } from 'vitest';
import { classifySubmissionResponse, parseRetryAfter } from '../../src/submission/classify.js';

function json(status: number, body: unknown, retryAfter: string | null = null) {
  return classifySubmissionResponse({ status, retryAfter, body, isJson: true }, 0);
}

describe('classifySubmissionResponse', () => {
  it('accepts with the next target from the url field', () => {
    expect(json(200, { correct: true, url: 'https://quiz.example/task/2' })).toEqual({
      kind: 'Accepted',
      nextTarget: 'https://quiz.example/task/2',
    });
  });

  it('treats a missing or empty url as the end of the chain', () => {
    expect(json(200, { correct: true })).toEqual({ kind: 'Accepted', nextTarget: null });
    expect(json(200, { correct: true, url: '' })).toEqual({ kind: 'Accepted', nextTarget: null });
  });

  it('rejects when correct is false and keeps the offered next target', () => {
    expect(json(200, { correct: false, reason: 'Wrong sum', url: 'https://quiz.example/task/3' })).toEqual({
      kind: 'Rejected',
      reason: 'Wrong sum',
      nextTarget: 'https://quiz.example/task/3',
    });
    expect(json(200, { correct: false })).toEqual({
      kind: 'Rejected',
      reason: 'Answer marked incorrect',
      nextTarget: null,
    });
  });

  it('keeps correct: false even when other fields have unexpected types', () => {
    expect(json(200, { correct: false, reason: { detail: 'off by one' }, url: null })).toEqual({
      kind: 'Rejected',
      reason: 'Answer marked incorrect',
      nextTarget: null,
    });
    expect(json(200, { correct: false, retryAfter: 'soon', message: 'Too low' })).toEqual({
      kind: 'Rejected',
      reason: 'Too low',
      nextTarget: null,
    });
  });

  it('resolves a relative next url against the answering endpoint', () => {
    const outcome = classifySubmissionResponse(
      { status: 200, retryAfter: null, body: { correct: true, url: '/task/2' }, isJson: true },
      0,
      'https://quiz.example/submit',
    );
    expect(outcome).toEqual({ kind: 'Accepted', nextTarget: 'https://quiz.example/task/2' });
  });

  it('drops a next url that is not http(s)', () => {
    expect(json(200, { correct: true, url: '/task/2' })).toEqual({ kind: 'Accepted', nextTarget: null });
    expect(json(200, { correct: true, url: 'javascript:alert(1)' })).toEqual({ kind: 'Accepted', nextTarget: null });
  });

  it('reads retry-after from the header, then the body', () => {
    expect(json(429, {}, '5')).toEqual({ kind: 'RateLimited', retryAfterMs: 5000 });
    expect(json(429, { retryAfter: 2 })).toEqual({ kind: 'RateLimited', retryAfterMs: 2000 });
    expect(json(429, {})).toEqual({ kind: 'RateLimited', retryAfterMs: 0 });
  });

  it('maps server errors and request timeouts to transient errors', () => {
    expect(json(503, {})).toEqual({ kind: 'TransientError', reason: 'HTTP 503' });
    expect(json(408, {})).toEqual({ kind: 'TransientError', reason: 'HTTP 408' });
  });

  it('maps malformed answers to rejections and other client errors to fatal', () => {
    expect(json(400, { message: 'answer must be a number' })).toEqual({
      kind: 'Rejected',
      reason: 'answer must be a number',
      nextTarget: null,
    });
    expect(json(403, {})).toEqual({ kind: 'FatalError', reason: 'HTTP 403' });
    expect(json(404, { reason: 'No such task' })).toEqual({ kind: 'FatalError', reason: 'HTTP 404: No such task' });
  });

  it('treats a success status with a non-JSON body as transient', () => {
    expect(classifySubmissionResponse({ status: 200, retryAfter: null, body: '<html>', isJson: false }, 0)).toEqual({
      kind: 'TransientError',
      reason: 'HTTP 200 with a non-JSON body',
    });
  });
});

describe('parseRetryAfter', () => {
  it('parses an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:07 GMT', now)).toBe(7000);
  });

  it('returns null for absent or unparseable values', () => {
    expect(parseRetryAfter(null, 0)).toBeNull();
    expect(parseRetryAfter('soon', 0)).toBeNull();
  });
});
