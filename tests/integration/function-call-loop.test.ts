import { describe, it, expect, beforeEach } from 'vitest';
import { AdapterRegistry } from '../../src/llm/adapter-registry.js';
import { sleep } from '../../src/llm/cancellation.js';
import { ConversationBusyError } from '../../src/llm/errors.js';
import type { ChatRequestInput, TurnConfig, TurnEvent } from '../../src/llm/types.js';
import { ToolRegistry } from '../../src/tools/tool-registry.js';
import { LLMManager } from '../../src/turn/llm-manager.js';
import { ScriptedAdapter, textRound, toolRound, type ScriptStep } from '../helpers/scripted-adapter.js';
import { collect, createTestTurnConfig } from '../helpers/test-fixtures.js';

function types(events: TurnEvent[]): string[] {
  return events.map(e => e.type);
}

describe('function-call loop', () => {
  let tools: ToolRegistry;
  let finished: string[];

  beforeEach(() => {
    finished = [];
    tools = new ToolRegistry();
    tools.register({
      name: 'add',
      description: 'Add two numbers',
      parameters: { type: 'object', properties: { a: { type: 'number' }, b: { type: 'number' } } },
      async execute(args) {
        return Number(args.a) + Number(args.b);
      },
    });
    tools.register({
      name: 'echo',
      description: 'Echo text',
      parameters: { type: 'object', properties: { text: { type: 'string' } } },
      async execute(args) {
        return String(args.text);
      },
    });
    tools.register({
      name: 'boom',
      description: 'Always fails',
      parameters: { type: 'object' },
      async execute() {
        throw new Error('kaput');
      },
    });
    tools.register({
      name: 'slow',
      description: 'Finishes after 30ms',
      parameters: { type: 'object' },
      async execute(_args, ctx) {
        await sleep(30, ctx.signal);
        finished.push('slow');
        return 'slow';
      },
    });
    tools.register({
      name: 'fast',
      description: 'Finishes immediately',
      parameters: { type: 'object' },
      async execute() {
        finished.push('fast');
        return 'fast';
      },
    });
  });

  function setup(scripts: ScriptStep[][], defaults: Partial<TurnConfig> = {}) {
    const adapter = new ScriptedAdapter(scripts);
    const registry = new AdapterRegistry([{ id: 'scripted', adapter, models: [] }]);
    const manager = new LLMManager({ registry, defaults: createTestTurnConfig(defaults), tools, random: () => 0 });
    return { adapter, manager };
  }

  function request(content = 'Hi', config?: Partial<TurnConfig>): ChatRequestInput {
    return {
      provider: 'scripted',
      model: 'test-model',
      messages: [{ role: 'user', content }],
      tools: tools.list(),
      ...(config ? { config } : {}),
    };
  }

  it('should complete in one round when no tools are requested', async () => {
    const { adapter, manager } = setup([textRound('Hello')]);
    const handle = manager.run(request());

    const events = await collect(handle);
    const result = await handle.result();

    expect(types(events)).toEqual(['text_delta', 'usage', 'done', 'turn_end']);
    expect(events[0]).toEqual({ type: 'text_delta', text: 'Hello', round: 1 });
    expect(result.status).toBe('completed');
    expect(result.finishReason).toBe('normal');
    expect(result.text).toBe('Hello');
    expect(result.rounds).toBe(1);
    expect(result.messages).toEqual([{ role: 'assistant', content: 'Hello' }]);
    expect(adapter.calls).toHaveLength(1);
  });

  it('should execute tools and resubmit their results in request order', async () => {
    const { adapter, manager } = setup([
      toolRound([
        { id: 'c1', name: 'add', args: { a: 1, b: 2 } },
        { id: 'c2', name: 'echo', args: { text: 'hi' } },
      ]),
      textRound('3 and hi'),
    ]);
    const input = request('Use both');
    const handle = manager.run(input);

    const events = await collect(handle);
    const result = await handle.result();

    expect(types(events)).toEqual([
      'tool_call_delta', 'tool_call_delta', 'tool_calls_ready', 'done', 'tool_result', 'tool_result',
      'text_delta', 'usage', 'done',
      'turn_end',
    ]);
    expect(events[2]).toEqual({
      type: 'tool_calls_ready',
      round: 1,
      calls: [
        { id: 'c1', name: 'add', arguments: { a: 1, b: 2 } },
        { id: 'c2', name: 'echo', arguments: { text: 'hi' } },
      ],
    });
    expect(events[6]).toEqual({ type: 'text_delta', text: '3 and hi', round: 2 });

    expect(result.status).toBe('completed');
    expect(result.rounds).toBe(2);
    expect(result.toolCalls.map(c => [c.round, c.request.id, c.result.content])).toEqual([
      [1, 'c1', '3'],
      [1, 'c2', 'hi'],
    ]);
    expect(result.messages).toEqual([
      {
        role: 'assistant',
        content: '',
        toolCalls: [
          { id: 'c1', name: 'add', arguments: { a: 1, b: 2 } },
          { id: 'c2', name: 'echo', arguments: { text: 'hi' } },
        ],
      },
      { role: 'tool', toolCallId: 'c1', name: 'add', content: '3' },
      { role: 'tool', toolCallId: 'c2', name: 'echo', content: 'hi' },
      { role: 'assistant', content: '3 and hi' },
    ]);

    const resubmitted = adapter.calls[1]?.messages ?? [];
    expect(resubmitted.map(m => m.role)).toEqual(['user', 'assistant', 'tool', 'tool']);
    expect(input.messages).toHaveLength(1);
  });

  it('should stop after maxRounds with the last round\'s tools executed', async () => {
    const round = toolRound([{ id: 'c1', name: 'echo', args: { text: 'again' } }]);
    const { adapter, manager } = setup([round, round, round, round], { maxRounds: 3 });
    const handle = manager.run(request());

    const events = await collect(handle);
    const result = await handle.result();

    expect(adapter.calls).toHaveLength(3);
    expect(result.status).toBe('max-rounds-exceeded');
    expect(result.finishReason).toBe('max-rounds-exceeded');
    expect(result.rounds).toBe(3);
    expect(result.toolCalls.map(c => c.round)).toEqual([1, 2, 3]);
    expect(events.at(-1)).toMatchObject({ type: 'turn_end', status: 'max-rounds-exceeded' });
    expect(events.filter(e => e.type === 'turn_end')).toHaveLength(1);
  });

  it('should sum usage across rounds', async () => {
    const { manager } = setup([
      [
        { type: 'tool_call_delta', callId: 'c1', name: 'add', argumentsDelta: '{"a":2,"b":2}' },
        { type: 'usage', usage: { promptTokens: 10, completionTokens: 2, totalTokens: 12 } },
        { type: 'done', finishReason: 'tool_calls' },
      ],
      textRound('4'),
    ]);

    const result = await manager.run(request()).result();

    expect(result.usage).toEqual({ promptTokens: 20, completionTokens: 7, totalTokens: 27 });
  });

  describe('cancellation', () => {
    it('should end with cancelled and emit nothing after turn_end when cancelled mid-stream', async () => {
      const { manager } = setup([[{ type: 'text_delta', text: 'partial' }, { type: 'hang' }]]);
      const handle = manager.run(request());

      const events: TurnEvent[] = [];
      for await (const event of handle) {
        events.push(event);
        if (event.type === 'text_delta') handle.cancel('stop');
      }
      const result = await handle.result();

      expect(types(events)).toEqual(['text_delta', 'turn_end']);
      expect(result.status).toBe('failed');
      expect(result.error).toEqual({ kind: 'cancelled', message: 'stop', retryable: false });
      expect(result.text).toBe('partial');
      expect(result.messages).toEqual([]);
    });

    it('should end with cancelled when cancelled before the first event', async () => {
      const { manager } = setup([[{ type: 'hang' }]]);
      const handle = manager.run(request());

      const pending = collect(handle);
      await sleep(20);
      handle.cancel('stop');
      const events = await pending;

      expect(types(events)).toEqual(['turn_end']);
      expect(events[0]).toMatchObject({ status: 'failed', error: { kind: 'cancelled', message: 'stop' } });
    });

    it('should not call the adapter when cancelled before iteration starts', async () => {
      const { adapter, manager } = setup([textRound('never')]);
      const handle = manager.run(request(), { conversationId: 'conv-1' });

      handle.cancel();
      expect(manager.isBusy('conv-1')).toBe(false);

      const result = await handle.result();
      expect(result.error).toEqual({ kind: 'cancelled', message: 'Turn cancelled', retryable: false });
      expect(adapter.calls).toHaveLength(0);
    });

    it('should cancel the turn when the consumer stops iterating', async () => {
      const { manager } = setup([[{ type: 'text_delta', text: 'a' }, { type: 'hang' }]]);
      const handle = manager.run(request(), { conversationId: 'conv-2' });

      for await (const event of handle) {
        expect(event.type).toBe('text_delta');
        break;
      }
      const result = await handle.result();

      expect(result.status).toBe('failed');
      expect(result.error).toMatchObject({ kind: 'cancelled', message: 'Turn consumer stopped listening' });
      expect(manager.isBusy('conv-2')).toBe(false);
    });

    it('should follow an external abort signal', async () => {
      const { manager } = setup([[{ type: 'hang' }]]);
      const external = new AbortController();
      const handle = manager.run(request(), { signal: external.signal });

      const pending = handle.result();
      await sleep(20);
      external.abort();
      const result = await pending;

      expect(result.status).toBe('failed');
      expect(result.error?.kind).toBe('cancelled');
    });

    it('should allow a single consumer only', async () => {
      const { manager } = setup([textRound('once')]);
      const handle = manager.run(request());

      await collect(handle);
      await expect(collect(handle)).rejects.toThrow('TurnHandle supports a single consumer');
    });
  });

  describe('conversation exclusivity', () => {
    it('should reject a second turn on a busy conversation without disturbing the first', async () => {
      const { manager } = setup([
        [{ type: 'pause', ms: 10 }, ...textRound('first')],
        textRound('second'),
      ]);
      const first = manager.run(request(), { conversationId: 'conv' });

      expect(() => manager.run(request(), { conversationId: 'conv' })).toThrow(ConversationBusyError);
      expect(manager.isBusy('conv')).toBe(true);

      const result = await first.result();
      expect(result.status).toBe('completed');
      expect(result.text).toBe('first');
      expect(manager.isBusy('conv')).toBe(false);

      const next = await manager.run(request(), { conversationId: 'conv' }).result();
      expect(next.text).toBe('second');
    });

    it('should let different conversations run at once', () => {
      const { manager } = setup([textRound('a'), textRound('b')]);
      manager.run(request(), { conversationId: 'one' });
      expect(() => manager.run(request(), { conversationId: 'two' })).not.toThrow();
    });
  });

  describe('failures', () => {
    it('should report an unknown provider as a configuration failure', async () => {
      const { adapter, manager } = setup([]);
      const result = await manager.run({ ...request(), provider: 'nope' }).result();

      expect(result.status).toBe('failed');
      expect(result.rounds).toBe(0);
      expect(result.error).toEqual({
        kind: 'configuration',
        message: 'Unknown provider "nope". Registered: scripted',
        retryable: false,
      });
      expect(adapter.calls).toHaveLength(0);
    });

    it('should reject a non-positive maxRounds', async () => {
      const { manager } = setup([]);
      const result = await manager.run(request('Hi', { maxRounds: 0 })).result();

      expect(result.error).toEqual({
        kind: 'configuration',
        message: 'maxRounds must be a positive integer, got 0',
        retryable: false,
      });
    });

    it('should retry a retryable error that arrives before any event', async () => {
      const { adapter, manager } = setup([
        [{ type: 'error', error: { kind: 'network', message: 'reset', retryable: true } }],
        textRound('ok'),
      ]);
      const handle = manager.run(request());

      const events = await collect(handle);
      const result = await handle.result();

      expect(adapter.calls).toHaveLength(2);
      expect(types(events)).toEqual(['text_delta', 'usage', 'done', 'turn_end']);
      expect(result.status).toBe('completed');
    });

    it('should give up after the configured retries', async () => {
      const failing: ScriptStep[] = [{ type: 'error', error: { kind: 'rate_limit', message: 'slow down', retryable: true } }];
      const { adapter, manager } = setup([failing, failing, failing, textRound('too late')]);

      const result = await manager.run(request()).result();

      expect(adapter.calls).toHaveLength(3);
      expect(result.error).toEqual({ kind: 'rate_limit', message: 'slow down', retryable: true });
    });

    it('should not retry an auth error', async () => {
      const { adapter, manager } = setup([
        [{ type: 'error', error: { kind: 'auth', message: 'bad key', retryable: false } }],
        textRound('unused'),
      ]);
      const handle = manager.run(request());

      const events = await collect(handle);

      expect(adapter.calls).toHaveLength(1);
      expect(types(events)).toEqual(['turn_end']);
      expect(events[0]).toMatchObject({ status: 'failed', error: { kind: 'auth', message: 'bad key' } });
    });

    it('should time out a provider call that never answers', async () => {
      const { manager } = setup([[{ type: 'hang' }]], { timeoutMs: 30, retry: { maxRetries: 0, baseDelayMs: 1, maxDelayMs: 5 } });

      const result = await manager.run(request()).result();

      expect(result.error).toEqual({ kind: 'timeout', message: 'Provider call exceeded 30ms', retryable: true });
    });
  });

  describe('failures after output', () => {
    it('should not retry a network error that arrives after text was streamed', async () => {
      const { adapter, manager } = setup([
        [
          { type: 'text_delta', text: 'part' },
          { type: 'error', error: { kind: 'network', message: 'reset', retryable: true } },
        ],
        textRound('unused'),
      ]);
      const handle = manager.run(request());

      const events = await collect(handle);
      const result = await handle.result();

      expect(adapter.calls).toHaveLength(1);
      expect(types(events)).toEqual(['text_delta', 'turn_end']);
      expect(result.status).toBe('failed');
      expect(result.text).toBe('part');
      expect(result.error).toEqual({ kind: 'network', message: 'reset', retryable: false });
    });

    it('should end a turn that times out mid-stream without a retry', async () => {
      const { adapter, manager } = setup([
        [{ type: 'text_delta', text: 'part' }, { type: 'hang' }],
        textRound('unused'),
      ], { timeoutMs: 40 });

      const result = await manager.run(request()).result();

      expect(adapter.calls).toHaveLength(1);
      expect(result.text).toBe('part');
      expect(result.error).toEqual({ kind: 'timeout', message: 'Provider call exceeded 40ms', retryable: false });
    });

    it('should not mark a later round\'s failure retryable once tool results went out', async () => {
      const failing: ScriptStep[] = [{ type: 'error', error: { kind: 'rate_limit', message: 'slow down', retryable: true } }];
      const { adapter, manager } = setup(
        [toolRound([{ id: 'c1', name: 'echo', args: { text: 'x' } }]), failing],
        { retry: { maxRetries: 0, baseDelayMs: 1, maxDelayMs: 5 } },
      );

      const result = await manager.run(request()).result();

      expect(adapter.calls).toHaveLength(2);
      expect(result.rounds).toBe(2);
      expect(result.error).toEqual({ kind: 'rate_limit', message: 'slow down', retryable: false });
    });
  });

  describe('tool failures', () => {
    const failingRound = toolRound([
      { id: 'c1', name: 'boom' },
      { id: 'c2', name: 'add', args: { a: 1, b: 2 } },
    ]);

    it('should feed failures back to the model under best-effort', async () => {
      const { adapter, manager } = setup([failingRound, textRound('recovered')]);

      const result = await manager.run(request()).result();

      expect(result.status).toBe('completed');
      expect(adapter.calls).toHaveLength(2);
      expect(result.messages.slice(1, 3)).toEqual([
        { role: 'tool', toolCallId: 'c1', name: 'boom', content: 'Error: kaput', isError: true },
        { role: 'tool', toolCallId: 'c2', name: 'add', content: '3' },
      ]);
    });

    it('should stop at the first failure under fail-fast (sequential)', async () => {
      const { adapter, manager } = setup([failingRound, textRound('unused')], { toolFailurePolicy: 'fail-fast' });
      const handle = manager.run(request());

      const events = await collect(handle);
      const result = await handle.result();

      expect(adapter.calls).toHaveLength(1);
      expect(result.status).toBe('failed');
      expect(result.error).toEqual({ kind: 'tool_execution', message: 'Tool "boom" failed: Error: kaput', retryable: false });
      expect(result.toolCalls.map(c => c.result.content)).toEqual([
        'Error: kaput',
        'Error: Not executed: tool "boom" failed',
      ]);
      expect(events.filter(e => e.type === 'tool_result')).toHaveLength(2);
    });

    it('should run tools in parallel and still report them in request order', async () => {
      const { manager } = setup(
        [toolRound([{ id: 'c1', name: 'slow' }, { id: 'c2', name: 'fast' }]), textRound('both')],
        { toolConcurrency: 'parallel' },
      );
      const handle = manager.run(request());

      const events = await collect(handle);

      expect(finished).toEqual(['fast', 'slow']);
      const callIds = events.flatMap(e => e.type === 'tool_result' ? [e.result.callId] : []);
      expect(callIds).toEqual(['c1', 'c2']);
      expect((await handle.result()).status).toBe('completed');
    });

    it('should cancel running siblings under parallel fail-fast', async () => {
      const { manager } = setup(
        [toolRound([{ id: 'c1', name: 'slow' }, { id: 'c2', name: 'boom' }])],
        { toolConcurrency: 'parallel', toolFailurePolicy: 'fail-fast' },
      );

      const result = await manager.run(request()).result();

      expect(finished).toEqual([]);
      expect(result.error).toEqual({ kind: 'tool_execution', message: 'Tool "boom" failed: Error: kaput', retryable: false });
      expect(result.toolCalls.map(c => [c.request.id, c.result.error?.kind])).toEqual([
        ['c1', 'cancelled'],
        ['c2', 'tool_execution'],
      ]);
    });
  });
});

describe('capability check', () => {
  it('should fail before opening the provider stream when tools are unsupported', async () => {
    const adapter = new ScriptedAdapter([textRound('unused')], { name: 'plain', capabilities: ['streaming'] });
    const manager = new LLMManager({
      registry: new AdapterRegistry([{ id: 'plain', adapter, models: [] }]),
      defaults: createTestTurnConfig(),
    });

    const result = await manager.run({
      provider: 'plain',
      model: 'test-model',
      messages: [{ role: 'user', content: 'Hi' }],
      tools: [{ name: 'echo', description: 'Echo text', parameters: { type: 'object' } }],
    }).result();

    expect(adapter.calls).toHaveLength(0);
    expect(result.error).toEqual({
      kind: 'configuration',
      message: 'Provider "plain" does not support function_calls',
      retryable: false,
    });
  });
});
