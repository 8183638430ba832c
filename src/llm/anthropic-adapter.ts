import Anthropic from '@anthropic-ai/sdk';
import { BaseAdapter } from './adapter.js';
import type { Capability, ChatRequest, DoneReason, Message, StreamEvent, ToolSchema } from './types.js';
import { abortReason } from './cancellation.js';
import { classifyError, errorFromStatus, LLMError, parseRetryAfter } from './errors.js';

export interface AnthropicConfig {
  name?: string;
  apiKey: string;
  apiBase?: string;
  capabilities?: Capability[];
  fetch?: typeof fetch;
}

type Frame =
  | { kind: 'event'; event: Anthropic.RawMessageStreamEvent }
  | { kind: 'message'; message: Anthropic.Message };

interface TranslationState {
  /** content block index → tool_use id, for routing `input_json_delta` fragments. */
  toolBlocks: Map<number, string>;
  finishReason?: DoneReason;
  promptTokens: number;
  completionTokens: number;
  done: boolean;
}

const DEFAULT_CAPABILITIES: Capability[] = ['streaming', 'function_calls', 'reasoning'];
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_THINKING_BUDGET = 2048;

/**
 * Anthropic Messages API. Streaming frames are typed SSE events: tool calls open
 * with `content_block_start` (id + name) and continue as `input_json_delta`
 * fragments addressed by block index; extended thinking arrives as
 * `thinking_delta` plus a closing `signature_delta`.
 */
export class AnthropicAdapter extends BaseAdapter<Frame, TranslationState> {
  private client: Anthropic;

  constructor(config: AnthropicConfig) {
    super(config.name ?? 'anthropic', config.capabilities ?? DEFAULT_CAPABILITIES);
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.apiBase,
      maxRetries: 0,
      fetch: config.fetch,
    });
  }

  protected createState(): TranslationState {
    return { toolBlocks: new Map(), promptTokens: 0, completionTokens: 0, done: false };
  }

  protected async open(request: ChatRequest, signal: AbortSignal): Promise<AsyncIterable<Frame>> {
    const cfg = request.config;
    const model = request.model.replace(/^anthropic\//, '');
    const system = request.messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model,
      max_tokens: cfg.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: toAnthropicMessages(request.messages, cfg.enableReasoning),
    };
    if (system) params.system = system;
    if (cfg.topP !== undefined) params.top_p = cfg.topP;
    if (cfg.enableTools && request.tools && request.tools.length > 0) {
      params.tools = request.tools.map(toAnthropicTool);
    }

    if (cfg.enableReasoning) {
      const budget = cfg.reasoningBudgetTokens ?? DEFAULT_THINKING_BUDGET;
      params.thinking = { type: 'enabled', budget_tokens: budget };
      // max_tokens must exceed the thinking budget; temperature is fixed while thinking
      params.max_tokens = Math.max(params.max_tokens, budget + 1024);
    } else if (cfg.temperature !== undefined) {
      params.temperature = cfg.temperature;
    }

    if (!cfg.stream) {
      const message = await this.client.messages.create(params, { signal });
      return single({ kind: 'message', message });
    }

    const stream = await this.client.messages.create({ ...params, stream: true }, { signal });
    return mapFrames(stream);
  }

  protected translate(frame: Frame, state: TranslationState): StreamEvent[] {
    return frame.kind === 'event'
      ? translateEvent(frame.event, state)
      : translateMessage(frame.message, state);
  }

  protected finish(state: TranslationState): StreamEvent[] {
    if (state.done) return [];
    // The stream closed without message_stop: the answer may be cut short.
    throw new Error('stream ended before message_stop');
  }

  protected classify(err: unknown, signal: AbortSignal): LLMError {
    if (signal.aborted || err instanceof Anthropic.APIUserAbortError) {
      return abortReason(signal);
    }
    if (err instanceof Anthropic.APIConnectionTimeoutError) {
      return new LLMError({ kind: 'timeout', provider: this.name, message: `${this.name}: ${err.message}`, cause: err });
    }
    if (err instanceof Anthropic.APIConnectionError) {
      return new LLMError({ kind: 'network', provider: this.name, message: `${this.name}: ${err.message}`, cause: err });
    }
    if (err instanceof Anthropic.APIError && typeof err.status === 'number') {
      return errorFromStatus(this.name, err.status, err.message, {
        retryAfterMs: parseRetryAfter(err.headers),
        cause: err,
      });
    }
    return classifyError(this.name, err, signal);
  }
}

export function toAnthropicTool(tool: ToolSchema): Anthropic.Tool {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.parameters, type: 'object' },
  };
}

/**
 * System messages are hoisted by the caller. Consecutive tool results are merged
 * into one user turn, which is how the Messages API expects them after a
 * multi-call assistant turn.
 */
export function toAnthropicMessages(messages: readonly Message[], replayThinking: boolean): Anthropic.MessageParam[] {
  const out: Anthropic.MessageParam[] = [];

  for (const msg of messages) {
    if (msg.role === 'system') continue;

    if (msg.role === 'user') {
      out.push({ role: 'user', content: msg.content });
      continue;
    }

    if (msg.role === 'tool') {
      const block: Anthropic.ToolResultBlockParam = {
        type: 'tool_result',
        tool_use_id: msg.toolCallId,
        content: msg.content,
      };
      if (msg.isError) block.is_error = true;

      const last = out[out.length - 1];
      if (last && last.role === 'user' && Array.isArray(last.content) && last.content.every(b => b.type === 'tool_result')) {
        last.content.push(block);
      } else {
        out.push({ role: 'user', content: [block] });
      }
      continue;
    }

    const content: Anthropic.ContentBlockParam[] = [];
    if (replayThinking && msg.reasoning && msg.reasoningSignature) {
      content.push({ type: 'thinking', thinking: msg.reasoning, signature: msg.reasoningSignature });
    }
    if (msg.content) {
      content.push({ type: 'text', text: msg.content });
    }
    for (const tc of msg.toolCalls ?? []) {
      content.push({ type: 'tool_use', id: tc.id, name: tc.name, input: tc.arguments });
    }
    // The API rejects empty assistant turns.
    if (content.length > 0) out.push({ role: 'assistant', content });
  }

  return out;
}

function translateEvent(event: Anthropic.RawMessageStreamEvent, state: TranslationState): StreamEvent[] {
  switch (event.type) {
    case 'message_start':
      state.promptTokens = event.message.usage.input_tokens;
      return [];

    case 'content_block_start': {
      const block = event.content_block;
      if (block.type === 'tool_use') {
        state.toolBlocks.set(event.index, block.id);
        return [{ type: 'tool_call_delta', callId: block.id, name: block.name, argumentsDelta: '' }];
      }
      if (block.type === 'text' && block.text) {
        return [{ type: 'text_delta', text: block.text }];
      }
      if (block.type === 'thinking' && block.thinking) {
        return [{ type: 'reasoning_delta', text: block.thinking }];
      }
      return [];
    }

    case 'content_block_delta': {
      const delta = event.delta;
      switch (delta.type) {
        case 'text_delta':
          return [{ type: 'text_delta', text: delta.text }];
        case 'thinking_delta':
          return [{ type: 'reasoning_delta', text: delta.thinking }];
        case 'signature_delta':
          return [{ type: 'reasoning_delta', text: '', signature: delta.signature }];
        case 'input_json_delta': {
          const callId = state.toolBlocks.get(event.index);
          if (!callId) throw new Error(`input_json_delta for block ${event.index} which is not a tool_use block`);
          return [{ type: 'tool_call_delta', callId, argumentsDelta: delta.partial_json }];
        }
        default:
          return [];
      }
    }

    case 'message_delta':
      if (event.delta.stop_reason) state.finishReason = mapStopReason(event.delta.stop_reason);
      state.completionTokens = event.usage.output_tokens;
      return [];

    case 'message_stop':
      state.done = true;
      return [
        usageEvent(state.promptTokens, state.completionTokens),
        { type: 'done', finishReason: state.finishReason ?? 'stop' },
      ];

    default:
      return [];
  }
}

function translateMessage(message: Anthropic.Message, state: TranslationState): StreamEvent[] {
  const events: StreamEvent[] = [];
  for (const block of message.content) {
    if (block.type === 'thinking') {
      events.push({ type: 'reasoning_delta', text: block.thinking, signature: block.signature });
    } else if (block.type === 'text') {
      events.push({ type: 'text_delta', text: block.text });
    } else if (block.type === 'tool_use') {
      events.push({ type: 'tool_call_delta', callId: block.id, name: block.name, argumentsDelta: JSON.stringify(block.input) });
    }
  }
  state.done = true;
  events.push(usageEvent(message.usage.input_tokens, message.usage.output_tokens));
  events.push({ type: 'done', finishReason: message.stop_reason ? mapStopReason(message.stop_reason) : 'stop' });
  return events;
}

function usageEvent(promptTokens: number, completionTokens: number): StreamEvent {
  return {
    type: 'usage',
    usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
  };
}

function mapStopReason(reason: string): DoneReason {
  if (reason === 'tool_use') return 'tool_calls';
  if (reason === 'max_tokens') return 'length';
  return 'stop';
}

async function* mapFrames(stream: AsyncIterable<Anthropic.RawMessageStreamEvent>): AsyncGenerator<Frame> {
  for await (const event of stream) {
    yield { kind: 'event', event };
  }
}

async function* single<T>(value: T): AsyncGenerator<T> {
  yield value;
}
