import type { TurnEvent, TurnResult } from '../llm/types.js';
import { cancelledError, LLMError } from '../llm/errors.js';

/**
 * Caller-side view of one running turn.
 *
 * Single consumer: iterate it for events, or call `result()` to drain it.
 * Leaving the iteration before `turn_end` cancels the turn; the remaining
 * events are drained silently so `result()` still resolves.
 */
export class TurnHandle implements AsyncIterable<TurnEvent> {
  private started = false;
  private released = false;
  private final?: TurnResult;
  private settled: Promise<void>;
  private markSettled: () => void;

  constructor(
    private source: AsyncGenerator<TurnEvent, void, undefined>,
    private controller: AbortController,
    private onRelease: () => void,
  ) {
    let markSettled: () => void = () => undefined;
    this.settled = new Promise<void>(resolve => {
      markSettled = resolve;
    });
    this.markSettled = markSettled;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get done(): boolean {
    return this.final !== undefined;
  }

  cancel(reason?: string): void {
    if (this.final || this.controller.signal.aborted) return;
    this.controller.abort(cancelledError(reason));
    // Nobody is pulling yet, so nothing would ever reach the release in the iterator.
    if (!this.started) this.release();
  }

  async result(): Promise<TurnResult> {
    if (!this.started) {
      const iterator = this[Symbol.asyncIterator]();
      while (!(await iterator.next()).done) {
        // drain
      }
    }
    await this.settled;
    if (!this.final) {
      throw new LLMError({ kind: 'protocol', message: 'Turn ended without a turn_end event', retryable: false });
    }
    return this.final;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<TurnEvent, void, undefined> {
    if (this.started) throw new Error('TurnHandle supports a single consumer');
    this.started = true;

    try {
      for (;;) {
        const next = await this.source.next();
        if (next.done) return;
        if (next.value.type === 'turn_end') this.settle(next.value.result);
        yield next.value;
        if (this.final) return;
      }
    } finally {
      if (!this.final) {
        this.controller.abort(cancelledError('Turn consumer stopped listening'));
        await this.drain();
      }
      this.release();
      this.markSettled();
    }
  }

  private async drain(): Promise<void> {
    for (;;) {
      const next = await this.source.next();
      if (next.done) return;
      if (next.value.type === 'turn_end') {
        this.settle(next.value.result);
        return;
      }
    }
  }

  private settle(result: TurnResult): void {
    this.final = result;
    // Free the conversation before the caller sees turn_end, so it can start the next turn right away.
    this.release();
  }

  private release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease();
  }
}
