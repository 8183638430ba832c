import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { ReadableStream } from 'node:stream/web';
import { BaseAdapter } from './adapter.js';
import type { Capability, ChatRequest, DoneReason, Message, StreamEvent, ToolSchema } from './types.js';
import { abortReason } from './cancellation.js';
import { classifyError, errorFromStatus, LLMError, parseRetryAfter } from './errors.js';

export interface OllamaConfig {
  name?: string;
  apiBase?: string;
  capabilities?: Capability[];
  fetch?: typeof fetch;
}

const ToolCallSchema = z.object({
  id: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.record(z.unknown()),
  }),
});

const ChatFrameSchema = z.object({
  message: z.object({
    role: z.string(),
    content: z.string().default(''),
    thinking: z.string().optional(),
    tool_calls: z.array(ToolCallSchema).optional(),
  }).optional(),
  done: z.boolean(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

interface TranslationState {
  sawToolCalls: boolean;
  done: boolean;
}

const DEFAULT_CAPABILITIES: Capability[] = ['streaming', 'function_calls', 'reasoning'];

/**
 * Ollama `/api/chat`: newline-delimited JSON, one complete object per line.
 * Tool calls arrive whole (arguments already an object, ids often missing),
 * and the final line carries `done: true` with token counts.
 */
export class OllamaAdapter extends BaseAdapter<string, TranslationState> {
  private apiBase: string;
  private fetchImpl: typeof fetch;

  constructor(config: OllamaConfig = {}) {
    super(config.name ?? 'ollama', config.capabilities ?? DEFAULT_CAPABILITIES);
    this.apiBase = (config.apiBase ?? 'http://localhost:11434').replace(/\/+$/, '');
    this.fetchImpl = config.fetch ?? fetch;
  }

  protected createState(): TranslationState {
    return { sawToolCalls: false, done: false };
  }

  protected async open(request: ChatRequest, signal: AbortSignal): Promise<AsyncIterable<string>> {
    const cfg = request.config;
    const options: Record<string, number> = {};
    if (cfg.temperature !== undefined) options.temperature = cfg.temperature;
    if (cfg.topP !== undefined) options.top_p = cfg.topP;
    if (cfg.maxTokens !== undefined) options.num_predict = cfg.maxTokens;

    const body: Record<string, unknown> = {
      model: request.model,
      messages: toOllamaMessages(request.messages),
      stream: cfg.stream,
      options,
    };
    if (cfg.enableTools && request.tools && request.tools.length > 0) {
      body.tools = request.tools.map(toOllamaTool);
    }
    if (cfg.enableReasoning) body.think = true;

    const response = await this.fetchImpl(`${this.apiBase}/api/chat`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const text = await response.text().catch(() => response.statusText);
      throw errorFromStatus(this.name, response.status, text || response.statusText, {
        retryAfterMs: parseRetryAfter(response.headers),
      });
    }
    if (!response.body) {
      throw new LLMError({ kind: 'protocol', provider: this.name, message: `${this.name}: empty response body` });
    }
    return readLines(response.body);
  }

  protected translate(line: string, state: TranslationState): StreamEvent[] {
    const raw: unknown = JSON.parse(line);
    if (typeof raw === 'object' && raw !== null && 'error' in raw && typeof raw.error === 'string') {
      throw new Error(`provider reported: ${raw.error}`);
    }
    const frame = ChatFrameSchema.parse(raw);

    const events: StreamEvent[] = [];
    const message = frame.message;
    if (message?.thinking) events.push({ type: 'reasoning_delta', text: message.thinking });
    if (message?.content) events.push({ type: 'text_delta', text: message.content });
    for (const tc of message?.tool_calls ?? []) {
      state.sawToolCalls = true;
      events.push({
        type: 'tool_call_delta',
        callId: tc.id ?? `call_${randomUUID()}`,
        name: tc.function.name,
        argumentsDelta: JSON.stringify(tc.function.arguments),
      });
    }

    if (frame.done) {
      state.done = true;
      const promptTokens = frame.prompt_eval_count ?? 0;
      const completionTokens = frame.eval_count ?? 0;
      events.push({
        type: 'usage',
        usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      });
      events.push({ type: 'done', finishReason: finishReasonFor(frame.done_reason, state) });
    }
    return events;
  }

  protected finish(state: TranslationState): StreamEvent[] {
    if (state.done) return [];
    throw new Error('stream ended without a done frame');
  }

  protected classify(err: unknown, signal: AbortSignal): LLMError {
    if (signal.aborted) return abortReason(signal);
    return classifyError(this.name, err, signal);
  }
}

export function toOllamaTool(tool: ToolSchema): Record<string, unknown> {
  return {
    type: 'function',
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

export function toOllamaMessages(messages: readonly Message[]): Array<Record<string, unknown>> {
  return messages.map(msg => {
    if (msg.role === 'tool') {
      return { role: 'tool', content: msg.content, ...(msg.name ? { tool_name: msg.name } : {}) };
    }
    if (msg.role === 'assistant' && msg.toolCalls?.length) {
      return {
        role: 'assistant',
        content: msg.content,
        tool_calls: msg.toolCalls.map(tc => ({ function: { name: tc.name, arguments: tc.arguments } })),
      };
    }
    return { role: msg.role, content: msg.content };
  });
}

function finishReasonFor(doneReason: string | undefined, state: TranslationState): DoneReason {
  if (state.sawToolCalls) return 'tool_calls';
  if (doneReason === 'length') return 'length';
  return 'stop';
}

/** Split a byte stream into non-empty lines; a trailing line without newline is still delivered. */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }
      buffer += decoder.decode(value, { stream: true });
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).trim();
        buffer = buffer.slice(newline + 1);
        if (line) yield line;
        newline = buffer.indexOf('\n');
      }
    }
    buffer += decoder.decode();
    const rest = buffer.trim();
    if (rest) yield rest;
  } finally {
    // Consumer left early: drop the rest of the HTTP body.
    if (!finished) await reader.cancel().catch(() => undefined);
    reader.releaseLock();
  }
}
