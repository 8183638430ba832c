import { describe, it, expect } from 'vitest';
import { ReadableStream } from 'node:stream/web';
import { OllamaAdapter, readLines, toOllamaMessages } from '../../src/llm/ollama-adapter.js';
import type { ChatRequest, StreamEvent, TurnConfig } from '../../src/llm/types.js';
import { createTestTurnConfig, fakeFetch, jsonResponse, ndjson } from '../helpers/test-fixtures.js';

function makeRequest(config: Partial<TurnConfig> = {}): ChatRequest {
  return {
    provider: 'ollama',
    model: 'llama-test',
    messages: [{ role: 'user', content: 'hi' }],
    config: createTestTurnConfig(config),
  };
}

async function drain(adapter: OllamaAdapter, request: ChatRequest): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of adapter.stream(request, new AbortController().signal)) events.push(event);
  return events;
}

function frame(message: Record<string, unknown>, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { model: 'llama-test', created_at: '2025-01-01T00:00:00Z', message: { role: 'assistant', content: '', ...message }, done: false, ...extra };
}

describe('OllamaAdapter', () => {
  it('should translate NDJSON frames into stream events', async () => {
    const { fetch, requests } = fakeFetch([() => ndjson([
      frame({ thinking: 'hmm' }),
      frame({ content: 'Hi' }),
      frame({ tool_calls: [{ function: { name: 'now', arguments: { tz: 'UTC' } } }] }),
      frame({}, { done: true, done_reason: 'stop', prompt_eval_count: 8, eval_count: 4 }),
    ])]);
    const adapter = new OllamaAdapter({ apiBase: 'http://ollama.test/', fetch });

    const events = await drain(adapter, makeRequest({ enableReasoning: true, temperature: 0.2 }));

    expect(events).toHaveLength(5);
    expect(events[0]).toEqual({ type: 'reasoning_delta', text: 'hmm' });
    expect(events[1]).toEqual({ type: 'text_delta', text: 'Hi' });
    expect(events[2]).toMatchObject({ type: 'tool_call_delta', name: 'now', argumentsDelta: '{"tz":"UTC"}' });
    expect(events[2]?.type === 'tool_call_delta' && events[2].callId.startsWith('call_')).toBe(true);
    expect(events[3]).toEqual({ type: 'usage', usage: { promptTokens: 8, completionTokens: 4, totalTokens: 12 } });
    expect(events[4]).toEqual({ type: 'done', finishReason: 'tool_calls' });

    expect(requests[0]?.url).toBe('http://ollama.test/api/chat');
    expect(requests[0]?.body).toEqual({
      model: 'llama-test',
      messages: [{ role: 'user', content: 'hi' }],
      stream: true,
      options: { temperature: 0.2 },
      think: true,
    });
  });

  it('should report length when the model ran out of tokens', async () => {
    const { fetch } = fakeFetch([() => ndjson([
      frame({ content: 'Long' }),
      frame({}, { done: true, done_reason: 'length' }),
    ])]);
    const events = await drain(new OllamaAdapter({ fetch }), makeRequest());
    expect(events[events.length - 1]).toEqual({ type: 'done', finishReason: 'length' });
  });

  it('should turn an error line into a protocol error', async () => {
    const { fetch } = fakeFetch([() => ndjson([{ error: 'model runner crashed' }])]);
    const events = await drain(new OllamaAdapter({ fetch }), makeRequest());

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'error', error: { kind: 'protocol' } });
    expect(events[0]?.type === 'error' && events[0].error.message.includes('model runner crashed')).toBe(true);
  });

  it('should treat a body without a done frame as incomplete', async () => {
    const { fetch } = fakeFetch([() => ndjson([frame({ content: 'cut' })])]);
    const events = await drain(new OllamaAdapter({ fetch }), makeRequest());

    expect(events[0]).toEqual({ type: 'text_delta', text: 'cut' });
    expect(events[1]).toMatchObject({ type: 'error', error: { kind: 'protocol' } });
  });

  it('should map HTTP failures through the status taxonomy', async () => {
    const { fetch } = fakeFetch([
      () => jsonResponse(404, { error: 'model "nope" not found' }),
      () => jsonResponse(429, { error: 'busy' }, { 'retry-after': '2' }),
    ]);
    const adapter = new OllamaAdapter({ fetch });

    const notFound = await drain(adapter, makeRequest());
    const busy = await drain(adapter, makeRequest());

    expect(notFound[0]).toMatchObject({ type: 'error', error: { kind: 'configuration', retryable: false } });
    expect(busy[0]).toMatchObject({ type: 'error', error: { kind: 'rate_limit', retryable: true, retryAfterMs: 2000 } });
  });

  it('should classify a refused connection as network', async () => {
    const refused: typeof fetch = async () => {
      throw new TypeError('fetch failed', { cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }) });
    };
    const events = await drain(new OllamaAdapter({ fetch: refused }), makeRequest());
    expect(events).toEqual([
      { type: 'error', error: { kind: 'network', message: 'ollama: fetch failed', retryable: true } },
    ]);
  });
});

describe('readLines', () => {
  it('should split lines across chunk boundaries and keep a trailing line', async () => {
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('{"a":'));
        controller.enqueue(encoder.encode('1}\n\n{"b":2}\n{"c"'));
        controller.enqueue(encoder.encode(':3}'));
        controller.close();
      },
    });

    const lines: string[] = [];
    for await (const line of readLines(body)) lines.push(line);
    expect(lines).toEqual(['{"a":1}', '{"b":2}', '{"c":3}']);
  });
});

describe('toOllamaMessages', () => {
  it('should send tool names and object arguments', () => {
    expect(toOllamaMessages([
      { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'now', arguments: { tz: 'UTC' } }] },
      { role: 'tool', toolCallId: 'c1', name: 'now', content: '12:00' },
    ])).toEqual([
      { role: 'assistant', content: '', tool_calls: [{ function: { name: 'now', arguments: { tz: 'UTC' } } }] },
      { role: 'tool', content: '12:00', tool_name: 'now' },
    ]);
  });
});
