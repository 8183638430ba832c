import type { AdapterRegistry } from '../llm/adapter-registry.js';
import type { ChatRequest, ChatRequestInput, TurnConfig, TurnEvent } from '../llm/types.js';
import { classifyError, ConversationBusyError, LLMError, toErrorInfo } from '../llm/errors.js';
import type { ToolExecutor } from '../tools/types.js';
import { FunctionCallOrchestrator } from './function-call-orchestrator.js';
import { TurnHandle } from './turn-handle.js';
import * as log from '../utils/logger.js';

export interface LLMManagerDeps {
  registry: AdapterRegistry;
  defaults: TurnConfig;
  tools?: ToolExecutor;
  /** Jitter source for retry backoff. */
  random?: () => number;
}

export interface RunOptions {
  /** At most one turn runs per conversation id. */
  conversationId?: string;
  /** External cancellation, e.g. the HTTP request closing. */
  signal?: AbortSignal;
}

/**
 * Entry point for callers: fills request defaults, resolves the adapter and
 * starts a turn. Holds only the set of conversations with a turn in flight.
 */
export class LLMManager {
  private active = new Set<string>();

  constructor(private deps: LLMManagerDeps) {}

  /**
   * Start a turn. Throws ConversationBusyError synchronously when the
   * conversation already has one; every other failure arrives as `turn_end`.
   */
  run(input: ChatRequestInput, options: RunOptions = {}): TurnHandle {
    const { conversationId } = options;
    if (conversationId !== undefined && this.active.has(conversationId)) {
      throw new ConversationBusyError(conversationId);
    }

    const request = freezeRequest(input, mergeTurnConfig(this.deps.defaults, input.config));
    const controller = new AbortController();

    const external = options.signal;
    const onExternalAbort = () => controller.abort(classifyError(request.provider, external?.reason, external));
    if (external?.aborted) onExternalAbort();
    else external?.addEventListener('abort', onExternalAbort, { once: true });

    if (conversationId !== undefined) this.active.add(conversationId);
    log.debug(`Turn started: provider=${request.provider}, model=${request.model}${conversationId ? `, conversation=${conversationId}` : ''}`);

    return new TurnHandle(this.drive(request, controller.signal), controller, () => {
      external?.removeEventListener('abort', onExternalAbort);
      if (conversationId !== undefined) this.active.delete(conversationId);
    });
  }

  isBusy(conversationId: string): boolean {
    return this.active.has(conversationId);
  }

  private async *drive(request: ChatRequest, signal: AbortSignal): AsyncGenerator<TurnEvent, void, undefined> {
    let orchestrator: FunctionCallOrchestrator;
    try {
      validateConfig(request);
      const adapter = this.deps.registry.resolve(request.provider, request.model);
      orchestrator = new FunctionCallOrchestrator({ adapter, tools: this.deps.tools, random: this.deps.random });
    } catch (err) {
      const error = toErrorInfo(classifyError(request.provider, err));
      log.warn(`Turn rejected: ${error.message}`);
      yield {
        type: 'turn_end',
        status: 'failed',
        error,
        result: {
          status: 'failed',
          finishReason: 'error',
          text: '',
          toolCalls: [],
          messages: [],
          rounds: 0,
          usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
          error,
        },
      };
      return;
    }

    yield* orchestrator.run(request, signal);
  }
}

/** Request overrides win over defaults; `retry` is merged field by field. */
export function mergeTurnConfig(defaults: TurnConfig, overrides: Partial<TurnConfig> = {}): TurnConfig {
  return {
    stream: overrides.stream ?? defaults.stream,
    enableTools: overrides.enableTools ?? defaults.enableTools,
    enableReasoning: overrides.enableReasoning ?? defaults.enableReasoning,
    maxRounds: overrides.maxRounds ?? defaults.maxRounds,
    temperature: overrides.temperature ?? defaults.temperature,
    topP: overrides.topP ?? defaults.topP,
    maxTokens: overrides.maxTokens ?? defaults.maxTokens,
    reasoningBudgetTokens: overrides.reasoningBudgetTokens ?? defaults.reasoningBudgetTokens,
    toolFailurePolicy: overrides.toolFailurePolicy ?? defaults.toolFailurePolicy,
    toolConcurrency: overrides.toolConcurrency ?? defaults.toolConcurrency,
    timeoutMs: overrides.timeoutMs ?? defaults.timeoutMs,
    cancelGraceMs: overrides.cancelGraceMs ?? defaults.cancelGraceMs,
    retry: { ...defaults.retry, ...overrides.retry },
  };
}

function freezeRequest(input: ChatRequestInput, config: TurnConfig): ChatRequest {
  return Object.freeze({
    provider: input.provider,
    model: input.model,
    messages: Object.freeze([...input.messages]),
    ...(input.tools ? { tools: Object.freeze([...input.tools]) } : {}),
    config: Object.freeze(config),
  });
}

function validateConfig(request: ChatRequest): void {
  const { maxRounds, timeoutMs } = request.config;
  if (!Number.isInteger(maxRounds) || maxRounds < 1) {
    throw new LLMError({ kind: 'configuration', message: `maxRounds must be a positive integer, got ${maxRounds}` });
  }
  if (!(timeoutMs > 0)) {
    throw new LLMError({ kind: 'configuration', message: `timeoutMs must be positive, got ${timeoutMs}` });
  }
}
