import { z } from 'zod';
import type { Action, AnswerValue } from '../sessions/types.js';
import { PlannerError } from '../utils/errors.js';

export const answerValueSchema: z.ZodType<AnswerValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(answerValueSchema),
    z.record(answerValueSchema),
  ]),
);

const invokeToolSchema = z.object({
  type: z.literal('invoke_tool'),
  tool: z.string().min(1),
  args: z.record(z.unknown()).default({}),
});

const submitAnswerSchema = z.object({
  type: z.literal('submit_answer'),
  answer: answerValueSchema,
  submitUrl: z.string().min(1).optional(),
});

const requestDependencySchema = z.object({
  type: z.literal('request_dependency'),
  packages: z.array(z.string()).min(1),
});

const stopSchema = z.object({
  type: z.literal('stop'),
  reason: z.string().default('Planner requested stop'),
});

export const actionSchema = z.discriminatedUnion('type', [
  invokeToolSchema,
  submitAnswerSchema,
  requestDependencySchema,
  stopSchema,
]);

const FENCED_JSON = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/u;

function decodeJsonText(text: string): unknown {
  const trimmed = text.trim();
  const fenced = trimmed.match(FENCED_JSON);
  try {
    return JSON.parse(fenced?.[1] ?? trimmed);
  } catch (err: unknown) {
    throw new PlannerError('Planner decision is not valid JSON', err);
  }
}

function unwrap(body: unknown): unknown {
  if (typeof body === 'string') return unwrap(decodeJsonText(body));
  if (typeof body === 'object' && body !== null && !Array.isArray(body) && 'action' in body) {
    const inner: unknown = body.action;
    return typeof inner === 'string' ? decodeJsonText(inner) : inner;
  }
  return body;
}

/**
 * Accepts `{action: {...}}`, a bare action, or either of those encoded as a
 * JSON string (optionally in a Markdown code fence).
 */
export function parseDecision(body: unknown): Action {
  const parsed = actionSchema.safeParse(unwrap(body));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new PlannerError(`Planner returned an invalid action: ${issues}`);
  }
  return parsed.data;
}
