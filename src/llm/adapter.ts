import type { Capability, ChatRequest, StreamEvent } from './types.js';
import { LLMError, protocolError, toErrorInfo, unsupportedCapability } from './errors.js';
import { abortReason } from './cancellation.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * One provider protocol behind the canonical contract.
 *
 * `stream` yields StreamEvents in arrival order and always ends with exactly
 * one terminal event (`done` or `error`). It never throws for provider
 * failures; those arrive as `error` events.
 */
export interface ProviderAdapter {
  readonly name: string;
  readonly capabilities: ReadonlySet<Capability>;
  stream(request: ChatRequest, signal: AbortSignal): AsyncGenerator<StreamEvent, void, undefined>;
}

/** Capabilities a request needs from an adapter. */
export function requiredCapabilities(request: ChatRequest): Capability[] {
  const needed: Capability[] = [];
  if (request.config.stream) needed.push('streaming');
  if (request.config.enableTools && (request.tools?.length ?? 0) > 0) needed.push('function_calls');
  if (request.config.enableReasoning) needed.push('reasoning');
  return needed;
}

/**
 * Shared invocation skeleton. Variants supply the wire call (`open`), the
 * per-frame translation (`translate`) and SDK-specific error mapping.
 *
 * `State` is per-invocation scratch space for translations that need memory
 * across frames (e.g. OpenAI's index → call id mapping).
 */
export abstract class BaseAdapter<Frame, State> implements ProviderAdapter {
  readonly name: string;
  readonly capabilities: ReadonlySet<Capability>;
  protected readonly log: Logger;

  protected constructor(name: string, capabilities: Iterable<Capability>) {
    this.name = name;
    this.capabilities = new Set(capabilities);
    this.log = createLogger(`adapter:${name}`);
  }

  protected abstract open(request: ChatRequest, signal: AbortSignal): Promise<AsyncIterable<Frame>>;

  protected abstract createState(request: ChatRequest): State;

  /** Translate one raw frame. Throw (any error) when the frame is malformed. */
  protected abstract translate(frame: Frame, state: State): StreamEvent[];

  /** Events owed after the last frame (e.g. `done` when the provider has no explicit end marker). */
  protected abstract finish(state: State): StreamEvent[];

  /** Map an SDK/transport failure into the taxonomy. */
  protected abstract classify(err: unknown, signal: AbortSignal): LLMError;

  async *stream(request: ChatRequest, signal: AbortSignal): AsyncGenerator<StreamEvent, void, undefined> {
    for (const capability of requiredCapabilities(request)) {
      if (!this.capabilities.has(capability)) {
        yield { type: 'error', error: toErrorInfo(unsupportedCapability(this.name, capability)) };
        return;
      }
    }

    if (signal.aborted) {
      yield { type: 'error', error: toErrorInfo(abortReason(signal)) };
      return;
    }

    this.log.debug(
      `model=${request.model}, messages=${request.messages.length}, tools=${request.tools?.length ?? 0}, stream=${request.config.stream}`,
    );

    const state = this.createState(request);
    let frames: AsyncIterable<Frame>;
    try {
      frames = await this.open(request, signal);
    } catch (err) {
      yield { type: 'error', error: toErrorInfo(this.classify(err, signal)) };
      return;
    }

    const iterator = frames[Symbol.asyncIterator]();
    try {
      for (;;) {
        let next: IteratorResult<Frame>;
        try {
          next = await iterator.next();
        } catch (err) {
          yield { type: 'error', error: toErrorInfo(this.classify(err, signal)) };
          return;
        }
        if (next.done) break;

        const frame = next.value;
        const events = this.safely(() => this.translate(frame, state), 'Malformed frame');
        for (const event of events) {
          yield event;
          if (event.type === 'done' || event.type === 'error') return;
        }
      }

      for (const event of this.safely(() => this.finish(state), 'Incomplete stream')) {
        yield event;
        if (event.type === 'done' || event.type === 'error') return;
      }
    } finally {
      // Stops the underlying HTTP body when the consumer leaves early.
      try {
        await iterator.return?.();
      } catch (err) {
        this.log.debug(`Closing frame stream failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  /** Run a translation step; a throw becomes a single protocol error event. */
  private safely(step: () => StreamEvent[], label: string): StreamEvent[] {
    try {
      return step();
    } catch (err) {
      const cause = err instanceof Error ? err.message : String(err);
      this.log.warn(`${label} from ${this.name}: ${cause}`);
      return [{ type: 'error', error: toErrorInfo(protocolError(this.name, `${label} from ${this.name}: ${cause}`, err)) }];
    }
  }
}
