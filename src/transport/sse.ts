import type { TurnEvent } from '../llm/types.js';

export interface SseFrame {
  type: string;
  conversation_id: string;
  round?: number;
  content?: unknown;
}

/** Wire names clients listen for; events without an entry keep their own type. */
const FRAME_TYPES: Partial<Record<TurnEvent['type'], string>> = {
  text_delta: 'content',
  reasoning_delta: 'reasoning_content',
  tool_calls_ready: 'function_call_detected',
  tool_result: 'function_result',
};

export function formatSseFrame(frame: SseFrame): string {
  return `data: ${JSON.stringify(frame)}\n\n`;
}

/**
 * Encodes TurnEvents as `data: {...}\n\n` server-sent-event frames.
 *
 * A run of reasoning deltas is bracketed by `reasoning_start` and
 * `reasoning_complete` frames so clients can fold the thinking section as
 * soon as answer text begins. One writer per turn.
 */
export class SseEventWriter {
  private reasoningOpen = false;

  constructor(private conversationId: string) {}

  encode(event: TurnEvent): string[] {
    const frames: SseFrame[] = [];
    const round = event.type === 'turn_end' ? undefined : event.round;

    if (event.type === 'reasoning_delta') {
      if (!this.reasoningOpen) {
        this.reasoningOpen = true;
        frames.push(this.frame('reasoning_start', round));
      }
    } else if (this.reasoningOpen) {
      this.reasoningOpen = false;
      frames.push(this.frame('reasoning_complete', round));
    }

    frames.push(this.frame(FRAME_TYPES[event.type] ?? event.type, round, contentOf(event)));
    return frames.map(formatSseFrame);
  }

  private frame(type: string, round?: number, content?: unknown): SseFrame {
    return {
      type,
      conversation_id: this.conversationId,
      ...(round !== undefined ? { round } : {}),
      ...(content !== undefined ? { content } : {}),
    };
  }
}

function contentOf(event: TurnEvent): unknown {
  switch (event.type) {
    case 'text_delta':
    case 'reasoning_delta':
      return event.text;
    case 'tool_call_delta':
      return {
        call_id: event.callId,
        ...(event.name !== undefined ? { name: event.name } : {}),
        arguments_delta: event.argumentsDelta,
      };
    case 'tool_calls_ready':
      return event.calls.map(call => ({ id: call.id, name: call.name, arguments: call.arguments }));
    case 'usage':
      return {
        prompt_tokens: event.usage.promptTokens,
        completion_tokens: event.usage.completionTokens,
        total_tokens: event.usage.totalTokens,
      };
    case 'done':
      return { finish_reason: event.finishReason };
    case 'error':
      return event.error;
    case 'tool_result':
      return {
        call_id: event.result.callId,
        name: event.result.name,
        ok: event.result.ok,
        content: event.result.content,
      };
    case 'turn_end':
      return {
        status: event.status,
        finish_reason: event.result.finishReason,
        rounds: event.result.rounds,
        ...(event.error ? { error: event.error } : {}),
      };
  }
}
