import type { Config } from '../config.js';
import { createDownloadTool } from './download.js';
import { createExecuteTool } from './execute.js';
import { createInstallTool } from './install.js';
import { createRenderTool } from './render.js';
import type { ToolHandler } from './types.js';

export { ToolGateway } from './gateway.js';
export type { ToolContext, ToolHandler, ToolOutput } from './types.js';

type ToolConfig = Pick<Config, 'renderMaxChars' | 'outputMaxChars' | 'denyGlobs' | 'executeCommand' | 'installCommand'>;

/** The fixed tool set every session gateway is built from. */
export function createToolHandlers(config: ToolConfig, fetchImpl?: typeof fetch): ToolHandler[] {
  return [
    createRenderTool({ maxChars: config.renderMaxChars, fetchImpl }),
    createDownloadTool({ denyGlobs: config.denyGlobs, fetchImpl }),
    createExecuteTool({ command: config.executeCommand, outputMaxChars: config.outputMaxChars }),
    createInstallTool({ command: config.installCommand }),
  ];
}
