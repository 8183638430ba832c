export type Role = 'system' | 'user' | 'assistant' | 'tool';

/** A tool call requested by the model. Immutable once emitted. */
export interface ToolCallRequest {
  readonly id: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

export type Message =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | {
    role: 'assistant';
    content: string;
    toolCalls?: ToolCallRequest[];
    reasoning?: string;
    /** Opaque provider token that must accompany replayed reasoning (Anthropic thinking blocks). */
    reasoningSignature?: string;
  }
  | { role: 'tool'; toolCallId: string; name?: string; content: string; isError?: boolean };

/** Provider-neutral tool definition; each adapter derives its own wire format from it. */
export interface ToolSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>; // JSON Schema
}

export type ToolFailurePolicy = 'best-effort' | 'fail-fast';
export type ToolConcurrency = 'sequential' | 'parallel';

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface TurnConfig {
  stream: boolean;
  enableTools: boolean;
  enableReasoning: boolean;
  maxRounds: number;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  reasoningBudgetTokens?: number;
  toolFailurePolicy: ToolFailurePolicy;
  toolConcurrency: ToolConcurrency;
  /** Hard deadline for one adapter invocation. */
  timeoutMs: number;
  /** How long a cancelled turn waits for in-flight tool executions to settle. */
  cancelGraceMs: number;
  retry: RetryPolicy;
}

export interface ChatRequest {
  readonly provider: string;
  readonly model: string;
  readonly messages: readonly Message[];
  readonly tools?: readonly ToolSchema[];
  readonly config: Readonly<TurnConfig>;
}

/** What callers hand to `LLMManager.run`; omitted config fields come from the loaded defaults. */
export interface ChatRequestInput {
  provider: string;
  model: string;
  messages: Message[];
  tools?: ToolSchema[];
  config?: Partial<TurnConfig>;
}

export type Capability = 'streaming' | 'function_calls' | 'reasoning';

export type ErrorKind =
  | 'network'
  | 'timeout'
  | 'rate_limit'
  | 'auth'
  | 'configuration'
  | 'protocol'
  | 'tool_execution'
  | 'cancelled';

export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  retryAfterMs?: number;
}

export type DoneReason = 'stop' | 'tool_calls' | 'length';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type StreamEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'reasoning_delta'; text: string; signature?: string }
  | { type: 'tool_call_delta'; callId: string; name?: string; argumentsDelta: string }
  | { type: 'tool_calls_ready'; calls: ToolCallRequest[] }
  | { type: 'usage'; usage: TokenUsage }
  | { type: 'done'; finishReason: DoneReason }
  | { type: 'error'; error: ErrorInfo };

export interface ToolCallResult {
  callId: string;
  name: string;
  ok: boolean;
  /** Text fed back to the model: serialized payload on success, the error description otherwise. */
  content: string;
  error?: ErrorInfo;
}

export interface ExecutedToolCall {
  round: number;
  request: ToolCallRequest;
  result: ToolCallResult;
}

export type TurnStatus = 'completed' | 'max-rounds-exceeded' | 'failed';
export type TurnFinishReason = 'normal' | 'max-rounds-exceeded' | 'error';

export interface TurnResult {
  status: TurnStatus;
  finishReason: TurnFinishReason;
  /** All assistant text streamed during the turn, in arrival order. */
  text: string;
  reasoning?: string;
  toolCalls: ExecutedToolCall[];
  /** Assistant and tool messages produced by the turn, ready for the conversation store. */
  messages: Message[];
  rounds: number;
  usage: TokenUsage;
  error?: ErrorInfo;
}

export type RoundEvent = StreamEvent & { round: number };

export type TurnEvent =
  | RoundEvent
  | { type: 'tool_result'; round: number; result: ToolCallResult }
  | { type: 'turn_end'; status: TurnStatus; result: TurnResult; error?: ErrorInfo };
