import { isToolName, type ToolErrorKind, type ToolName, type ToolResult } from '../sessions/types.js';
import { deadlineSignal, isAbortError, raceAbort } from '../utils/abort.js';
import { ToolFailure, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { ToolHandler } from './types.js';

/**
 * Uniform entry point over the session's tools. One attempt per call: the
 * gateway never retries, and every failure comes back as `ok: false` with a
 * categorized `errorKind` instead of a thrown error.
 */
export class ToolGateway {
  private readonly tools: ReadonlyMap<ToolName, ToolHandler>;
  private readonly lifetime = new AbortController();

  constructor(
    handlers: ToolHandler[],
    private readonly workDir: string,
    private readonly logger: Logger = silentLogger,
    private readonly now: () => number = Date.now,
  ) {
    this.tools = new Map(handlers.map(h => [h.name, h]));
  }

  async invoke(
    toolName: string,
    args: Record<string, unknown>,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<ToolResult> {
    const started = this.now();

    if (!isToolName(toolName)) {
      return this.failure(started, 'Unavailable', `Unknown tool: ${toolName}`);
    }
    const tool = this.tools.get(toolName);
    if (!tool) {
      return this.failure(started, 'Unavailable', `Tool ${toolName} is not available`);
    }
    if (this.lifetime.signal.aborted) {
      return this.failure(started, 'Unavailable', 'Tool gateway is closed');
    }

    const bound = deadlineSignal(
      timeoutMs,
      signal ? AbortSignal.any([signal, this.lifetime.signal]) : this.lifetime.signal,
    );
    this.logger.debug(`${toolName} started`);

    try {
      // raceAbort: a tool that ignores its signal is still abandoned at the bound
      const output = await raceAbort(
        tool.invoke(args, { workDir: this.workDir, signal: bound, timeoutMs }),
        bound,
      );
      const durationMs = this.now() - started;
      this.logger.debug(`${toolName} finished in ${durationMs}ms`);
      return {
        ok: true,
        payload: output.payload,
        errorKind: null,
        errorDetail: null,
        artifacts: output.artifacts ?? [],
        durationMs,
      };
    } catch (err: unknown) {
      if (err instanceof ToolFailure) {
        return this.failure(started, err.kind, err.message, err.payload);
      }
      if (bound.aborted || isAbortError(err)) {
        const detail = signal?.aborted || this.lifetime.signal.aborted
          ? `${toolName} cancelled`
          : `${toolName} timed out after ${timeoutMs}ms`;
        return this.failure(started, 'Timeout', detail);
      }
      return this.failure(started, 'ExecutionError', `${toolName} failed: ${errorMessage(err)}`);
    }
  }

  /** Abort anything still running on behalf of this session. */
  close(): void {
    this.lifetime.abort();
  }

  private failure(started: number, kind: ToolErrorKind, detail: string, payload: unknown = null): ToolResult {
    this.logger.warn(`tool failure (${kind}): ${detail}`);
    return {
      ok: false,
      payload,
      errorKind: kind,
      errorDetail: detail,
      artifacts: [],
      durationMs: this.now() - started,
    };
  }
}
