import type { ToolCallRequest, ToolCallResult, ToolSchema } from '../llm/types.js';
import type { Tool, ToolContext, ToolExecutor, ToolOutput } from './types.js';
import { toolToSchema } from './types.js';
import { LLMError, toErrorInfo } from '../llm/errors.js';
import * as log from '../utils/logger.js';

export class ToolRegistry implements ToolExecutor {
  private tools = new Map<string, Tool>();

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      log.warn(`Tool "${tool.name}" already registered, overwriting`);
    }
    this.tools.set(tool.name, tool);
    log.debug(`Registered tool: ${tool.name}`);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  list(): ToolSchema[] {
    return Array.from(this.tools.values()).map(toolToSchema);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  async execute(call: ToolCallRequest, ctx: ToolContext): Promise<ToolCallResult> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      return failure(call, `Unknown tool "${call.name}". Available tools: ${this.names().join(', ') || '(none)'}`);
    }

    log.debug(`Executing tool: ${call.name} (round ${ctx.round}, id=${call.id})`, call.arguments);

    try {
      const output = await tool.execute(call.arguments, ctx);
      return { callId: call.id, name: call.name, ok: true, content: serializeOutput(output) };
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.error(`Tool "${call.name}" failed: ${msg}`);
      if (err instanceof LLMError && err.kind === 'cancelled') {
        return { callId: call.id, name: call.name, ok: false, content: `Error: ${msg}`, error: toErrorInfo(err) };
      }
      return failure(call, msg);
    }
  }
}

export function serializeOutput(output: ToolOutput): string {
  return typeof output === 'string' ? output : JSON.stringify(output);
}

function failure(call: ToolCallRequest, message: string): ToolCallResult {
  const error = new LLMError({ kind: 'tool_execution', message, retryable: false });
  return { callId: call.id, name: call.name, ok: false, content: `Error: ${message}`, error: toErrorInfo(error) };
}
