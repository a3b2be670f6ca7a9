import type { ZodError } from 'zod';
import type { ToolCall } from '../core/messages';
import { errorMessage } from '../core/errors';
import { logger } from '../observability/logger';
import type { ToolRegistry } from './registry';

export type ToolOutcome = 'ok' | 'unknown_tool' | 'invalid_args' | 'failed';

export interface ToolExecution {
  outcome: ToolOutcome;
  // text fed back to the model, verbatim
  content: string;
}

export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export class ToolExecutor {
  constructor(private readonly registry: ToolRegistry) {}

  async execute(call: ToolCall): Promise<ToolExecution> {
    const def = this.registry.get(call.name);
    const args = JSON.stringify(call.args);
    if (!def) {
      logger.error('tool not found', { tool: call.name });
      return { outcome: 'unknown_tool', content: `Error: Tool '${call.name}' not found or not correctly defined.` };
    }

    const parsed = def.inputSchema.safeParse(call.args);
    if (!parsed.success) {
      const content = `Error: Validation failed for tool '${call.name}' with args ${args}: ${formatIssues(parsed.error)}. The arguments were invalid.`;
      logger.warn('tool args rejected', { tool: call.name, args: call.args });
      return { outcome: 'invalid_args', content };
    }

    try {
      const content = await def.execute(parsed.data);
      logger.info('tool executed', { tool: call.name, preview: content.slice(0, 100) });
      return { outcome: 'ok', content };
    } catch (err) {
      logger.error('tool execution failed', { tool: call.name, error: errorMessage(err) });
      return { outcome: 'failed', content: `Error: Tool '${call.name}' failed with args ${args}: ${errorMessage(err)}` };
    }
  }
}
