import type { ToolCallRequest, ToolCallResult, ToolSchema } from '../llm/types.js';

export interface ToolContext {
  /** Aborted when the turn is cancelled or a sibling fails under fail-fast. */
  signal: AbortSignal;
  round: number;
}

/** Result payload of a tool; strings go back to the model verbatim, anything else as JSON. */
export type ToolOutput = string | number | boolean | null | Record<string, unknown> | unknown[];

export interface Tool {
  name: string;
  description: string;
  parameters: Record<string, unknown>; // JSON Schema
  execute(args: Readonly<Record<string, unknown>>, ctx: ToolContext): Promise<ToolOutput>;
}

/**
 * What the orchestrator needs from the host application's tools.
 * `execute` resolves with a result for every call, failed ones included.
 */
export interface ToolExecutor {
  list(): ToolSchema[];
  execute(call: ToolCallRequest, ctx: ToolContext): Promise<ToolCallResult>;
}

export function toolToSchema(tool: Tool): ToolSchema {
  return {
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters,
  };
}
