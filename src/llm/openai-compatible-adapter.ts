import OpenAI from 'openai';
import { BaseAdapter } from './adapter.js';
import type { Capability, ChatRequest, DoneReason, Message, StreamEvent, ToolSchema } from './types.js';
import { abortReason } from './cancellation.js';
import { classifyError, errorFromStatus, LLMError, parseRetryAfter } from './errors.js';

export interface OpenAICompatibleConfig {
  name: string;
  apiKey: string;
  apiBase: string;
  capabilities?: Capability[];
  extraHeaders?: Record<string, string>;
  /** Extra body fields sent when reasoning is requested, e.g. `{ enable_thinking: true }` for Qwen. */
  reasoningParams?: Record<string, unknown>;
  /** Ask for a trailing usage chunk (`stream_options.include_usage`); some compatible servers reject it. */
  streamUsage?: boolean;
  fetch?: typeof fetch;
}

type Frame =
  | { kind: 'chunk'; chunk: OpenAI.ChatCompletionChunk }
  | { kind: 'completion'; completion: OpenAI.ChatCompletion };

interface TranslationState {
  /** choice.delta.tool_calls[].index → call id; only the first fragment of a call carries the id. */
  slots: Map<number, { callId: string; named: boolean }>;
  finishReason?: DoneReason;
  done: boolean;
}

const DEFAULT_CAPABILITIES: Capability[] = ['streaming', 'function_calls'];

/**
 * OpenAI Chat Completions wire protocol, shared by OpenAI, DeepSeek, Qwen
 * (DashScope compatible mode), Groq, OpenRouter and any other compatible API.
 *
 * Streaming frames are fielded deltas: tool calls arrive as `{ index, id?, function: { name?, arguments } }`
 * fragments whose argument strings must be concatenated; DeepSeek and Qwen add a
 * `reasoning_content` field for the thinking channel.
 */
export class OpenAICompatibleAdapter extends BaseAdapter<Frame, TranslationState> {
  private client: OpenAI;
  private reasoningParams?: Record<string, unknown>;
  private streamUsage: boolean;

  constructor(config: OpenAICompatibleConfig) {
    super(config.name, config.capabilities ?? DEFAULT_CAPABILITIES);
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiBase,
      defaultHeaders: config.extraHeaders,
      // Retries belong to the turn orchestrator, which knows whether output already reached the caller.
      maxRetries: 0,
      fetch: config.fetch,
    });
    this.reasoningParams = config.reasoningParams;
    this.streamUsage = config.streamUsage ?? true;
  }

  protected createState(): TranslationState {
    return { slots: new Map(), done: false };
  }

  protected async open(request: ChatRequest, signal: AbortSignal): Promise<AsyncIterable<Frame>> {
    const cfg = request.config;
    const base: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: toOpenAIMessages(request.messages),
    };
    if (cfg.temperature !== undefined) base.temperature = cfg.temperature;
    if (cfg.topP !== undefined) base.top_p = cfg.topP;
    if (cfg.maxTokens !== undefined) base.max_tokens = cfg.maxTokens;
    if (cfg.enableTools && request.tools && request.tools.length > 0) {
      base.tools = request.tools.map(toOpenAITool);
    }
    if (cfg.enableReasoning && this.reasoningParams) {
      Object.assign(base, this.reasoningParams);
    }

    if (!cfg.stream) {
      const completion = await this.client.chat.completions.create(base, { signal });
      return single({ kind: 'completion', completion });
    }

    const params: OpenAI.ChatCompletionCreateParamsStreaming = { ...base, stream: true };
    if (this.streamUsage) params.stream_options = { include_usage: true };
    const stream = await this.client.chat.completions.create(params, { signal });
    return mapFrames(stream);
  }

  protected translate(frame: Frame, state: TranslationState): StreamEvent[] {
    return frame.kind === 'chunk'
      ? translateChunk(frame.chunk, state)
      : translateCompletion(frame.completion, state);
  }

  protected finish(state: TranslationState): StreamEvent[] {
    if (state.done) return [];
    const finishReason = state.finishReason ?? (state.slots.size > 0 ? 'tool_calls' : 'stop');
    return [{ type: 'done', finishReason }];
  }

  protected classify(err: unknown, signal: AbortSignal): LLMError {
    if (signal.aborted || err instanceof OpenAI.APIUserAbortError) {
      return abortReason(signal);
    }
    if (err instanceof OpenAI.APIConnectionTimeoutError) {
      return new LLMError({ kind: 'timeout', provider: this.name, message: `${this.name}: ${err.message}`, cause: err });
    }
    if (err instanceof OpenAI.APIConnectionError) {
      return new LLMError({ kind: 'network', provider: this.name, message: `${this.name}: ${err.message}`, cause: err });
    }
    if (err instanceof OpenAI.APIError && typeof err.status === 'number') {
      return errorFromStatus(this.name, err.status, err.message, {
        retryAfterMs: parseRetryAfter(err.headers),
        cause: err,
      });
    }
    return classifyError(this.name, err, signal);
  }
}

export function toOpenAITool(tool: ToolSchema): OpenAI.ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

export function toOpenAIMessages(messages: readonly Message[]): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((msg): OpenAI.ChatCompletionMessageParam => {
    switch (msg.role) {
      case 'system':
        return { role: 'system', content: msg.content };
      case 'user':
        return { role: 'user', content: msg.content };
      case 'tool':
        return { role: 'tool', tool_call_id: msg.toolCallId, content: msg.content };
      case 'assistant': {
        if (!msg.toolCalls?.length) {
          return { role: 'assistant', content: msg.content };
        }
        return {
          role: 'assistant',
          content: msg.content || null,
          tool_calls: msg.toolCalls.map(tc => ({
            id: tc.id,
            type: 'function' as const,
            function: { name: tc.name, arguments: JSON.stringify(tc.arguments) },
          })),
        };
      }
    }
  });
}

function translateChunk(chunk: OpenAI.ChatCompletionChunk, state: TranslationState): StreamEvent[] {
  if (!Array.isArray(chunk.choices)) {
    throw new Error('chunk has no choices array');
  }

  const events: StreamEvent[] = [];
  const choice = chunk.choices[0];

  if (choice?.delta) {
    const delta = choice.delta;
    const reasoning = reasoningText(delta);
    if (reasoning) events.push({ type: 'reasoning_delta', text: reasoning });
    if (delta.content) events.push({ type: 'text_delta', text: delta.content });

    for (const tc of delta.tool_calls ?? []) {
      if (typeof tc.index !== 'number') throw new Error('tool call delta without index');
      let slot = state.slots.get(tc.index);
      if (!slot || (tc.id && tc.id !== slot.callId)) {
        slot = { callId: tc.id || `call_${chunk.id}_${tc.index}`, named: false };
        state.slots.set(tc.index, slot);
      }
      const name = !slot.named && tc.function?.name ? tc.function.name : undefined;
      if (name) slot.named = true;
      events.push({
        type: 'tool_call_delta',
        callId: slot.callId,
        ...(name ? { name } : {}),
        argumentsDelta: tc.function?.arguments ?? '',
      });
    }
  }

  if (choice?.finish_reason) {
    state.finishReason = mapFinishReason(choice.finish_reason);
  }

  if (chunk.usage) {
    events.push({
      type: 'usage',
      usage: {
        promptTokens: chunk.usage.prompt_tokens,
        completionTokens: chunk.usage.completion_tokens,
        totalTokens: chunk.usage.total_tokens,
      },
    });
  }

  return events;
}

function translateCompletion(completion: OpenAI.ChatCompletion, state: TranslationState): StreamEvent[] {
  const choice = completion.choices?.[0];
  if (!choice) throw new Error('completion has no choices');

  const events: StreamEvent[] = [];
  const reasoning = reasoningText(choice.message);
  if (reasoning) events.push({ type: 'reasoning_delta', text: reasoning });
  if (choice.message.content) events.push({ type: 'text_delta', text: choice.message.content });

  for (const tc of choice.message.tool_calls ?? []) {
    if (tc.type !== 'function') continue;
    state.slots.set(state.slots.size, { callId: tc.id, named: true });
    events.push({ type: 'tool_call_delta', callId: tc.id, name: tc.function.name, argumentsDelta: tc.function.arguments });
  }

  if (completion.usage) {
    events.push({
      type: 'usage',
      usage: {
        promptTokens: completion.usage.prompt_tokens,
        completionTokens: completion.usage.completion_tokens,
        totalTokens: completion.usage.total_tokens,
      },
    });
  }

  state.done = true;
  events.push({ type: 'done', finishReason: mapFinishReason(choice.finish_reason) });
  return events;
}

/** `reasoning_content` (DeepSeek, Qwen) or `reasoning` (OpenRouter); neither is in the OpenAI types. */
function reasoningText(delta: object): string | undefined {
  if ('reasoning_content' in delta && typeof delta.reasoning_content === 'string' && delta.reasoning_content) {
    return delta.reasoning_content;
  }
  if ('reasoning' in delta && typeof delta.reasoning === 'string' && delta.reasoning) {
    return delta.reasoning;
  }
  return undefined;
}

function mapFinishReason(reason: string | null): DoneReason {
  if (reason === 'tool_calls' || reason === 'function_call') return 'tool_calls';
  if (reason === 'length') return 'length';
  return 'stop';
}

async function* mapFrames(stream: AsyncIterable<OpenAI.ChatCompletionChunk>): AsyncGenerator<Frame> {
  for await (const chunk of stream) {
    yield { kind: 'chunk', chunk };
  }
}

async function* single<T>(value: T): AsyncGenerator<T> {
  yield value;
}
