import type { z } from 'zod';
import type { ArtifactRef, ToolName } from '../sessions/types.js';
import { ToolFailure } from '../utils/errors.js';

export interface ToolContext {
  /** Session work directory; tools write files only beneath it. */
  workDir: string;
  /** Fires on cancellation or when the gateway's time bound elapses. */
  signal: AbortSignal;
  timeoutMs: number;
}

export interface ToolOutput {
  payload: unknown;
  artifacts?: ArtifactRef[];
}

export interface ToolHandler {
  readonly name: ToolName;
  invoke(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolOutput>;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Bind an argument schema to a tool body; invalid arguments never reach `run`. */
export function defineTool<A>(
  name: ToolName,
  schema: z.ZodType<A, z.ZodTypeDef, unknown>,
  run: (args: A, ctx: ToolContext) => Promise<ToolOutput>,
): ToolHandler {
  return {
    name,
    async invoke(args, ctx) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        throw new ToolFailure('InvalidArguments', `${name}: ${describeIssues(parsed.error)}`);
      }
      return run(parsed.data, ctx);
    },
  };
}

export function truncate(text: string, maxChars: number, marker = '...truncated'): string {
  return text.length > maxChars ? text.slice(0, maxChars) + marker : text;
}
