import type {
  DoneReason,
  ErrorInfo,
  StreamEvent,
  TokenUsage,
  ToolCallRequest,
} from '../llm/types.js';
import { protocolError, toErrorInfo } from '../llm/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('aggregator');

/** What one adapter invocation produced, frozen once the invocation ends. */
export interface RoundSnapshot {
  readonly text: string;
  readonly reasoning: string;
  readonly reasoningSignature?: string;
  readonly toolCalls: readonly ToolCallRequest[];
  readonly finishReason?: DoneReason;
  readonly usage?: TokenUsage;
  readonly error?: ErrorInfo;
  /** Events forwarded to the consumer so far. */
  readonly delivered: number;
  readonly terminated: boolean;
}

interface CallBuffer {
  id: string;
  name?: string;
  fragments: string[];
}

type Finalized =
  | { ok: true; call: ToolCallRequest }
  | { ok: false; id: string; reason: string };

/**
 * Folds one invocation's StreamEvents into a round result.
 *
 * Events pass through in arrival order. Tool-call fragments are buffered per
 * call id (first-seen order) and only become ToolCallRequests at the end of
 * the invocation, announced by a single `tool_calls_ready` right before `done`.
 * Nothing is forwarded after a terminal event.
 */
export class StreamAggregator {
  private text = '';
  private reasoning = '';
  private signature?: string;
  private usage?: TokenUsage;
  private finishReason?: DoneReason;
  private error?: ErrorInfo;
  private calls: ToolCallRequest[] = [];
  private buffers = new Map<string, CallBuffer>();
  private delivered = 0;
  private terminated = false;

  constructor(private readonly provider: string) {}

  async *consume(events: AsyncIterable<StreamEvent>): AsyncGenerator<StreamEvent, void, undefined> {
    for await (const event of events) {
      for (const out of this.accept(event)) {
        this.delivered++;
        yield out;
      }
      if (this.terminated) {
        // Leaving the loop closes the adapter stream; whatever it had left is dropped.
        break;
      }
    }

    if (!this.terminated) {
      const err = protocolError(this.provider, `${this.provider}: stream ended without done or error`);
      this.delivered++;
      yield this.fail(toErrorInfo(err));
    }
  }

  snapshot(): RoundSnapshot {
    return Object.freeze({
      text: this.text,
      reasoning: this.reasoning,
      ...(this.signature !== undefined ? { reasoningSignature: this.signature } : {}),
      toolCalls: Object.freeze([...this.calls]),
      ...(this.finishReason !== undefined ? { finishReason: this.finishReason } : {}),
      ...(this.usage !== undefined ? { usage: this.usage } : {}),
      ...(this.error !== undefined ? { error: this.error } : {}),
      delivered: this.delivered,
      terminated: this.terminated,
    });
  }

  /** Fold one event; returns the events to forward. */
  private accept(event: StreamEvent): StreamEvent[] {
    switch (event.type) {
      case 'text_delta':
        this.text += event.text;
        return [event];

      case 'reasoning_delta':
        this.reasoning += event.text;
        if (event.signature !== undefined) this.signature = event.signature;
        return [event];

      case 'tool_call_delta':
        this.addFragment(event.callId, event.name, event.argumentsDelta);
        return [event];

      case 'tool_calls_ready':
        // Adapters that assemble calls themselves hand them over whole.
        for (const call of event.calls) {
          if (!this.buffers.has(call.id)) {
            this.buffers.set(call.id, { id: call.id, name: call.name, fragments: [JSON.stringify(call.arguments)] });
          }
        }
        return [];

      case 'usage':
        this.usage = event.usage;
        return [event];

      case 'done':
        return this.complete(event.finishReason);

      case 'error':
        this.buffers.clear();
        return [this.fail(event.error)];
    }
  }

  private addFragment(callId: string, name: string | undefined, fragment: string): void {
    let buffer = this.buffers.get(callId);
    if (buffer && name !== undefined && buffer.name !== undefined) {
      log.warn(`Duplicate tool call id "${callId}" from ${this.provider}: discarding "${buffer.name}" in favour of "${name}"`);
      // Re-insert so the later call takes the first-seen position of its own first fragment.
      this.buffers.delete(callId);
      buffer = undefined;
    }
    if (!buffer) {
      buffer = { id: callId, fragments: [] };
      this.buffers.set(callId, buffer);
    }
    if (name !== undefined && buffer.name === undefined) buffer.name = name;
    buffer.fragments.push(fragment);
  }

  private complete(reported: DoneReason): StreamEvent[] {
    const finalized = [...this.buffers.values()].map(finalize);
    this.buffers.clear();

    const incomplete = finalized.filter((f): f is Extract<Finalized, { ok: false }> => !f.ok);
    if (incomplete.length > 0) {
      const detail = incomplete.map(f => `${f.id} (${f.reason})`).join(', ');
      if (reported !== 'stop') {
        const err = protocolError(this.provider, `${this.provider}: incomplete tool call(s): ${detail}`);
        return [this.fail(toErrorInfo(err))];
      }
      log.warn(`Discarding incomplete tool call(s) from ${this.provider}: ${detail}`);
    }

    for (const f of finalized) {
      if (f.ok) this.calls.push(f.call);
    }

    this.terminated = true;
    if (this.calls.length === 0) {
      this.finishReason = reported;
      return [{ type: 'done', finishReason: reported }];
    }
    this.finishReason = 'tool_calls';
    return [
      { type: 'tool_calls_ready', calls: [...this.calls] },
      { type: 'done', finishReason: 'tool_calls' },
    ];
  }

  private fail(error: ErrorInfo): StreamEvent {
    this.terminated = true;
    this.error = error;
    return { type: 'error', error };
  }
}

function finalize(buffer: CallBuffer): Finalized {
  if (!buffer.name) return { ok: false, id: buffer.id, reason: 'missing name' };

  const raw = buffer.fragments.join('').trim();
  if (raw === '') {
    return { ok: true, call: Object.freeze({ id: buffer.id, name: buffer.name, arguments: Object.freeze({}) }) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { ok: false, id: buffer.id, reason: `arguments are not valid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  if (!isPlainObject(parsed)) {
    return { ok: false, id: buffer.id, reason: 'arguments are not a JSON object' };
  }
  return { ok: true, call: Object.freeze({ id: buffer.id, name: buffer.name, arguments: Object.freeze(parsed) }) };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
