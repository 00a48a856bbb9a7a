import { createHash } from 'node:crypto';
import type { SessionSnapshot } from '../sessions/types.js';

const BASE_TEMPLATE = `You are an autonomous agent solving a chain of web-hosted quiz tasks.

CURRENT TASK URL: {{target}}
SUBMITTING AS: {{email}}
TURNS SO FAR: {{turns}}
WRONG ANSWERS ON THIS TASK: {{rejections}}
TIME ON THIS TASK: {{elapsed}}s{{deadline}}
AVAILABLE ARTIFACTS: {{artifacts}}

Reply with exactly one JSON action:
- {"type":"invoke_tool","tool":"render","args":{"url":"..."}}
- {"type":"invoke_tool","tool":"download","args":{"url":"...","filename":"..."}}
- {"type":"invoke_tool","tool":"execute","args":{"code":"..."}}
- {"type":"request_dependency","packages":["..."]}
- {"type":"submit_answer","answer":...,"submitUrl":"..."}
- {"type":"stop","reason":"..."}

RULES:
- Render the task URL before answering it
- Once TIME ON THIS TASK is marked DEADLINE PASSED, submit your best answer right away, even a guess
- Never fabricate or shorten URLs; submit only to the endpoint the task names
- To submit a file's contents as base64, answer "artifact-base64:<artifact name>"
- Credentials are attached to submissions automatically; never include them yourself`;

export interface PromptResult {
  prompt: string;
  templateHash: string;
}

const TEMPLATE_HASH = `sha256:${createHash('sha256').update(BASE_TEMPLATE).digest('hex').slice(0, 16)}`;

/** Render the instructions sent to the planner alongside the raw snapshot. */
export function buildPlannerPrompt(snapshot: SessionSnapshot): PromptResult {
  const artifacts = snapshot.artifacts.length > 0
    ? snapshot.artifacts.map(a => a.name).join(', ')
    : '(none)';

  const values: Record<string, string> = {
    target: snapshot.current_target,
    email: snapshot.email,
    turns: String(snapshot.turn_count),
    rejections: String(snapshot.rejections_for_target),
    elapsed: String(Math.floor(snapshot.target_elapsed_ms / 1000)),
    deadline: snapshot.target_deadline_passed ? ' (DEADLINE PASSED)' : '',
    artifacts,
  };
  const prompt = BASE_TEMPLATE.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => values[key] ?? placeholder);

  return { prompt, templateHash: TEMPLATE_HASH };
}
