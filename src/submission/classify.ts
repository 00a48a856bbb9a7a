import { z } from 'zod';
import type { SubmissionOutcome } from '../sessions/types.js';

export interface RawSubmissionResponse {
  status: number;
  retryAfter: string | null;
  /** Parsed JSON body, or the raw text when `isJson` is false. */
  body: unknown;
  isJson: boolean;
}

// Only the fields the quiz server is known to send; a mistyped field is
// dropped on its own so it can never hide `correct`
const responseBodySchema = z.object({
  correct: z.boolean().optional().catch(undefined),
  url: z.string().nullable().optional().catch(undefined),
  reason: z.string().nullable().optional().catch(undefined),
  message: z.string().nullable().optional().catch(undefined),
  retryAfter: z.number().nonnegative().optional().catch(undefined),
});

type ResponseBody = z.infer<typeof responseBodySchema>;

function readBody(body: unknown): ResponseBody {
  const parsed = responseBodySchema.safeParse(body);
  return parsed.success ? parsed.data : {};
}

/** `Retry-After` as delta-seconds or an HTTP date, in milliseconds. */
export function parseRetryAfter(header: string | null, now: number): number | null {
  if (!header) return null;
  const seconds = Number(header.trim());
  if (Number.isFinite(seconds)) return Math.max(0, Math.round(seconds * 1000));
  const date = Date.parse(header);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

function nonEmpty(value: string | null | undefined): string | null {
  return value && value.trim() ? value.trim() : null;
}

/** Absolute http(s) form of `url`, resolved against `base`; null otherwise. */
export function resolveNextTarget(url: string | null, base?: string): string | null {
  if (!url) return null;
  try {
    const parsed = new URL(url, base);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed.href : null;
  } catch {
    return null;
  }
}

/**
 * `baseUrl` is the endpoint that answered; a relative `url` in the body is
 * resolved against it.
 */
export function classifySubmissionResponse(
  res: RawSubmissionResponse,
  now: number = Date.now(),
  baseUrl?: string,
): SubmissionOutcome {
  const body = res.isJson ? readBody(res.body) : {};
  const reason = nonEmpty(body.reason) ?? nonEmpty(body.message);

  if (res.status === 429) {
    const fromHeader = parseRetryAfter(res.retryAfter, now);
    const fromBody = body.retryAfter !== undefined ? Math.round(body.retryAfter * 1000) : null;
    return { kind: 'RateLimited', retryAfterMs: fromHeader ?? fromBody ?? 0 };
  }
  if (res.status === 408 || res.status >= 500) {
    return { kind: 'TransientError', reason: `HTTP ${res.status}${reason ? `: ${reason}` : ''}` };
  }
  if (res.status === 400 || res.status === 422) {
    return { kind: 'Rejected', reason: reason ?? `HTTP ${res.status}`, nextTarget: null };
  }
  if (res.status >= 400) {
    return { kind: 'FatalError', reason: `HTTP ${res.status}${reason ? `: ${reason}` : ''}` };
  }
  if (!res.isJson) {
    return { kind: 'TransientError', reason: `HTTP ${res.status} with a non-JSON body` };
  }

  const nextTarget = resolveNextTarget(nonEmpty(body.url), baseUrl);
  if (body.correct === false) {
    return { kind: 'Rejected', reason: reason ?? 'Answer marked incorrect', nextTarget };
  }
  return { kind: 'Accepted', nextTarget };
}
