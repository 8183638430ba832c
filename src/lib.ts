export type * from './llm/types.js';
export {
  LLMError,
  ConversationBusyError,
  toErrorInfo,
  errorFromStatus,
  parseRetryAfter,
  classifyError,
} from './llm/errors.js';
export { createDeadline, abortReason, sleep, raceAbort } from './llm/cancellation.js';
export { retryWithBackoff, isRetryable } from './llm/retry.js';
export type { RetryOptions, RetryHooks } from './llm/retry.js';
export { BaseAdapter, requiredCapabilities } from './llm/adapter.js';
export type { ProviderAdapter } from './llm/adapter.js';
export { OpenAICompatibleAdapter } from './llm/openai-compatible-adapter.js';
export type { OpenAICompatibleConfig } from './llm/openai-compatible-adapter.js';
export { AnthropicAdapter } from './llm/anthropic-adapter.js';
export type { AnthropicConfig } from './llm/anthropic-adapter.js';
export { OllamaAdapter } from './llm/ollama-adapter.js';
export type { OllamaConfig } from './llm/ollama-adapter.js';
export { AdapterRegistry } from './llm/adapter-registry.js';
export type { AdapterEntry } from './llm/adapter-registry.js';
export { buildAdapterRegistry, createAdapter } from './llm/adapter-factory.js';
export { StreamAggregator } from './stream/stream-aggregator.js';
export type { RoundSnapshot } from './stream/stream-aggregator.js';
export { ToolRegistry } from './tools/tool-registry.js';
export type { Tool, ToolContext, ToolExecutor, ToolOutput } from './tools/types.js';
export { FunctionCallOrchestrator } from './turn/function-call-orchestrator.js';
export type { TurnState } from './turn/function-call-orchestrator.js';
export { LLMManager, mergeTurnConfig } from './turn/llm-manager.js';
export type { LLMManagerDeps, RunOptions } from './turn/llm-manager.js';
export { TurnHandle } from './turn/turn-handle.js';
export { runConversationTurn, InMemoryConversationStore } from './conversation/conversation-turn.js';
export type { ConversationStore, ConversationTurnInput, TurnEventSink } from './conversation/conversation-turn.js';
export { SseEventWriter, formatSseFrame } from './transport/sse.js';
export type { SseFrame } from './transport/sse.js';
export { loadConfig } from './config/config.js';
export { TurnkitConfigSchema } from './config/schema.js';
export type { TurnkitConfig, ProviderSpec } from './config/schema.js';
export { createLogger, setLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
