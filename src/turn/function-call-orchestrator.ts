import type { ProviderAdapter } from '../llm/adapter.js';
import type {
  ChatRequest,
  ErrorInfo,
  ExecutedToolCall,
  Message,
  StreamEvent,
  TokenUsage,
  ToolCallRequest,
  ToolCallResult,
  TurnConfig,
  TurnEvent,
  TurnResult,
  TurnStatus,
} from '../llm/types.js';
import { abortReason, createDeadline, raceAbort, type Deadline } from '../llm/cancellation.js';
import { cancelledError, classifyError, errorMessage, LLMError, toErrorInfo } from '../llm/errors.js';
import { retryWithBackoff } from '../llm/retry.js';
import { StreamAggregator, type RoundSnapshot } from '../stream/stream-aggregator.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import type { ToolExecutor } from '../tools/types.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type TurnState =
  | 'idle'
  | 'dispatching'
  | 'streaming'
  | 'tools_pending'
  | 'executing_tools'
  | 'resubmitting'
  | 'completed'
  | 'failed'
  | 'max_rounds_exceeded';

export interface OrchestratorDeps {
  adapter: ProviderAdapter;
  tools?: ToolExecutor;
  /** Jitter source for retry backoff. */
  random?: () => number;
}

interface OpenedRound {
  aggregator: StreamAggregator;
  events: AsyncGenerator<StreamEvent, void, undefined>;
  first: IteratorResult<StreamEvent, void>;
  deadline: Deadline;
}

interface Progress {
  text: string;
  reasoning: string;
  toolCalls: ExecutedToolCall[];
  messages: Message[];
  rounds: number;
  usage: TokenUsage;
}

/**
 * Drives one turn: dispatch a round, stream it,
 * run the requested tools, feed their results back, repeat.
 *
 * Flow per round:
 * 1. Open the adapter stream and wait for its first event (retried with backoff
 *    while nothing of this invocation has been delivered)
 * 2. Forward events tagged with the round number
 * 3. No tool calls: turn completed
 * 4. Tool calls: append the assistant message, execute, append tool messages in
 *    request order, start the next round unless `maxRounds` is reached
 *
 * Adapter `error` events are not forwarded; the failure arrives on `turn_end`.
 * One instance runs one turn.
 */
export class FunctionCallOrchestrator {
  private state: TurnState = 'idle';
  /** Events of this turn already handed to the caller. */
  private delivered = 0;
  private tools: ToolExecutor;
  private log: Logger;

  constructor(private deps: OrchestratorDeps) {
    this.tools = deps.tools ?? new ToolRegistry();
    this.log = createLogger(`turn:${deps.adapter.name}`);
  }

  getState(): TurnState {
    return this.state;
  }

  async *run(request: ChatRequest, signal: AbortSignal): AsyncGenerator<TurnEvent, void, undefined> {
    const cfg = request.config;
    const history: Message[] = [...request.messages];
    const progress: Progress = {
      text: '',
      reasoning: '',
      toolCalls: [],
      messages: [],
      rounds: 0,
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    };

    for (let round = 1; ; round++) {
      progress.rounds = round;
      this.transition('dispatching', round);

      let opened: OpenedRound;
      try {
        opened = await this.dispatch({ ...request, messages: [...history] }, round, signal);
      } catch (err) {
        yield this.end(progress, 'failed', toErrorInfo(classifyError(this.deps.adapter.name, err, signal)));
        return;
      }

      this.transition('streaming', round);
      const { aggregator, events, deadline } = opened;
      let streamFailure: LLMError | undefined;
      try {
        let next = opened.first;
        while (!next.done && !signal.aborted) {
          const event = next.value;
          if (event.type !== 'error') {
            this.delivered++;
            yield { ...event, round };
          }
          next = await events.next();
        }
      } catch (err) {
        streamFailure = classifyError(this.deps.adapter.name, err, signal);
      } finally {
        deadline.dispose();
        await events.return();
      }

      const snap = aggregator.snapshot();
      progress.text += snap.text;
      progress.reasoning += snap.reasoning;
      if (snap.usage) addUsage(progress.usage, snap.usage);

      if (signal.aborted) {
        yield this.end(progress, 'failed', toErrorInfo(abortReason(signal)));
        return;
      }
      if (streamFailure) {
        yield this.end(progress, 'failed', toErrorInfo(streamFailure));
        return;
      }
      if (snap.error) {
        yield this.end(progress, 'failed', snap.error);
        return;
      }

      if (snap.toolCalls.length === 0) {
        progress.messages.push(assistantMessage(snap));
        yield this.end(progress, 'completed');
        return;
      }

      this.transition('tools_pending', round);
      const assistant = assistantMessage(snap);
      history.push(assistant);
      progress.messages.push(assistant);

      this.transition('executing_tools', round);
      const results = yield* this.executeTools(snap.toolCalls, round, cfg, signal);
      snap.toolCalls.forEach((call, i) => {
        const result = results[i];
        if (!result) return;
        progress.toolCalls.push({ round, request: call, result });
        const message = toolMessage(result);
        history.push(message);
        progress.messages.push(message);
      });

      if (signal.aborted) {
        yield this.end(progress, 'failed', toErrorInfo(abortReason(signal)));
        return;
      }

      if (cfg.toolFailurePolicy === 'fail-fast') {
        const failed = results.find(r => !r.ok && r.error?.kind === 'tool_execution') ?? results.find(r => !r.ok);
        if (failed) {
          yield this.end(progress, 'failed', {
            kind: 'tool_execution',
            message: `Tool "${failed.name}" failed: ${failed.content}`,
            retryable: false,
          });
          return;
        }
      }

      if (round >= cfg.maxRounds) {
        this.log.warn(`Max rounds (${cfg.maxRounds}) reached with tool results pending`);
        yield this.end(progress, 'max-rounds-exceeded');
        return;
      }

      this.transition('resubmitting', round);
    }
  }

  /**
   * Open the round's stream and pull its first event. A retryable error as the
   * first event means nothing reached the caller yet, so the whole invocation
   * is retried.
   */
  private async dispatch(request: ChatRequest, round: number, signal: AbortSignal): Promise<OpenedRound> {
    const { adapter } = this.deps;

    return retryWithBackoff(async (attempt) => {
      if (attempt > 0) this.log.info(`Round ${round}: attempt ${attempt + 1}`);

      const deadline = createDeadline(signal, request.config.timeoutMs);
      const aggregator = new StreamAggregator(adapter.name);
      const events = aggregator.consume(adapter.stream(request, deadline.signal));

      let first: IteratorResult<StreamEvent, void>;
      try {
        first = await events.next();
      } catch (err) {
        deadline.dispose();
        throw err;
      }

      if (!first.done && first.value.type === 'error' && first.value.error.retryable && !signal.aborted) {
        deadline.dispose();
        await events.return();
        throw LLMError.fromInfo(first.value.error, adapter.name);
      }
      return { aggregator, events, first, deadline };
    }, request.config.retry, { signal, random: this.deps.random });
  }

  /** Run the round's tool calls; results come back (and are announced) in request order. */
  private async *executeTools(
    calls: readonly ToolCallRequest[],
    round: number,
    cfg: Readonly<TurnConfig>,
    signal: AbortSignal,
  ): AsyncGenerator<TurnEvent, ToolCallResult[], undefined> {
    const failFast = cfg.toolFailurePolicy === 'fail-fast';

    if (cfg.toolConcurrency === 'sequential') {
      const results: ToolCallResult[] = [];
      let stoppedBy: ToolCallResult | undefined;
      for (const call of calls) {
        const result = stoppedBy
          ? resultFromError(call, cancelledError(`Not executed: tool "${stoppedBy.name}" failed`))
          : await this.invoke(call, round, signal, cfg.cancelGraceMs);
        results.push(result);
        this.delivered++;
        yield { type: 'tool_result', round, result };
        if (failFast && !result.ok && !stoppedBy) stoppedBy = result;
      }
      return results;
    }

    // Parallel: one child signal so fail-fast can stop the siblings.
    const siblings = new AbortController();
    const onAbort = () => siblings.abort(abortReason(signal));
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    try {
      const results = await Promise.all(calls.map(async (call) => {
        const result = await this.invoke(call, round, siblings.signal, cfg.cancelGraceMs);
        if (failFast && !result.ok && !siblings.signal.aborted) {
          siblings.abort(cancelledError(`Cancelled: tool "${call.name}" failed`));
        }
        return result;
      }));
      for (const result of results) {
        this.delivered++;
        yield { type: 'tool_result', round, result };
      }
      return results;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async invoke(call: ToolCallRequest, round: number, signal: AbortSignal, graceMs: number): Promise<ToolCallResult> {
    if (signal.aborted) return resultFromError(call, abortReason(signal));

    this.log.debug(`Round ${round}: executing ${call.name} (${call.id})`);
    try {
      const result = await raceAbort(this.tools.execute(call, { signal, round }), signal, graceMs);
      // The executor's own ids are not trusted; results are matched by position.
      return { ...result, callId: call.id, name: call.name };
    } catch (err) {
      const error = err instanceof LLMError
        ? err
        : new LLMError({ kind: 'tool_execution', message: errorMessage(err), retryable: false });
      if (error.kind !== 'cancelled') this.log.error(`Tool "${call.name}" failed: ${error.message}`);
      return resultFromError(call, error);
    }
  }

  private end(progress: Progress, status: TurnStatus, failure?: ErrorInfo): TurnEvent {
    const round = progress.rounds;
    // Resubmitting a turn whose output already reached the caller would repeat it.
    const error = failure && failure.retryable && this.delivered > 0 ? { ...failure, retryable: false } : failure;
    if (status === 'completed') this.transition('completed', round);
    else if (status === 'failed') this.transition('failed', round);
    else this.transition('max_rounds_exceeded', round);

    if (error) this.log.debug(`Turn failed (${error.kind}): ${error.message}`);

    const result: TurnResult = {
      status,
      finishReason: status === 'completed' ? 'normal' : status === 'failed' ? 'error' : 'max-rounds-exceeded',
      text: progress.text,
      ...(progress.reasoning ? { reasoning: progress.reasoning } : {}),
      toolCalls: [...progress.toolCalls],
      messages: [...progress.messages],
      rounds: progress.rounds,
      usage: { ...progress.usage },
      ...(error ? { error } : {}),
    };
    return { type: 'turn_end', status, result, ...(error ? { error } : {}) };
  }

  private transition(next: TurnState, round: number): void {
    this.log.debug(`Round ${round}: ${this.state} -> ${next}`);
    this.state = next;
  }
}

function assistantMessage(snap: RoundSnapshot): Message {
  return {
    role: 'assistant',
    content: snap.text,
    ...(snap.toolCalls.length > 0 ? { toolCalls: [...snap.toolCalls] } : {}),
    ...(snap.reasoning ? { reasoning: snap.reasoning } : {}),
    ...(snap.reasoningSignature ? { reasoningSignature: snap.reasoningSignature } : {}),
  };
}

function toolMessage(result: ToolCallResult): Message {
  return {
    role: 'tool',
    toolCallId: result.callId,
    name: result.name,
    content: result.content,
    ...(result.ok ? {} : { isError: true }),
  };
}

function resultFromError(call: ToolCallRequest, error: LLMError): ToolCallResult {
  return { callId: call.id, name: call.name, ok: false, content: `Error: ${error.message}`, error: toErrorInfo(error) };
}

function addUsage(total: TokenUsage, round: TokenUsage): void {
  total.promptTokens += round.promptTokens;
  total.completionTokens += round.completionTokens;
  total.totalTokens += round.totalTokens;
}
