#!/usr/bin/env node
/**
 * turnkit CLI: one chat turn against any configured provider, streamed to the terminal.
 */

import { readFileSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './config/config.js';
import { buildAdapterRegistry } from './llm/adapter-factory.js';
import type { Message, TurnEvent } from './llm/types.js';
import { LLMManager } from './turn/llm-manager.js';
import { ToolRegistry } from './tools/tool-registry.js';
import * as log from './utils/logger.js';

interface ChatOptions {
  provider?: string;
  model?: string;
  system?: string;
  reasoning?: boolean;
  stream: boolean;
  maxRounds?: number;
  debug?: boolean;
}

const program = new Command();

program
  .name('turnkit')
  .description('Normalized streaming chat and tool-call turns across LLM providers')
  .version(readVersion());

program
  .command('chat <message>')
  .description('Run one turn and stream the answer to stdout')
  .option('-p, --provider <id>', 'Provider id (defaults to the first configured provider)')
  .option('-m, --model <name>', 'Model name (defaults to the provider\'s first listed model)')
  .option('-s, --system <prompt>', 'System prompt')
  .option('--reasoning', 'Request the reasoning channel')
  .option('--no-stream', 'Use the non-streaming provider API')
  .option('--max-rounds <n>', 'Maximum tool-call rounds', parsePositiveInt)
  .option('-d, --debug', 'Enable debug logging')
  .action(async (message: string, opts: ChatOptions) => {
    const config = await loadConfig();
    log.setLogLevel(opts.debug ? 'debug' : config.logLevel);

    const registry = buildAdapterRegistry(config);
    const providerId = opts.provider ?? registry.ids()[0];
    if (!providerId) {
      throw new Error('No providers configured. Set an API key (e.g. OPENAI_API_KEY) or add providers to turnkit.json');
    }
    const model = opts.model ?? registry.get(providerId)?.models[0];
    if (!model) {
      throw new Error(`No model given for provider "${providerId}". Pass --model`);
    }

    const manager = new LLMManager({ registry, defaults: config.defaults, tools: new ToolRegistry() });
    const messages: Message[] = [];
    if (opts.system) messages.push({ role: 'system', content: opts.system });
    messages.push({ role: 'user', content: message });

    const handle = manager.run({
      provider: providerId,
      model,
      messages,
      config: {
        stream: opts.stream,
        ...(opts.reasoning ? { enableReasoning: true } : {}),
        ...(opts.maxRounds !== undefined ? { maxRounds: opts.maxRounds } : {}),
      },
    });

    process.once('SIGINT', () => handle.cancel('Interrupted'));

    for await (const event of handle) {
      render(event);
    }
  });

program
  .command('providers')
  .description('List configured providers')
  .action(async () => {
    const config = await loadConfig();
    log.setLogLevel(config.logLevel);
    const registry = buildAdapterRegistry(config);

    if (registry.ids().length === 0) {
      console.log('No providers configured.');
      return;
    }
    for (const entry of registry.list()) {
      const capabilities = [...entry.adapter.capabilities].join(', ');
      const models = entry.models.length > 0 ? entry.models.join(', ') : chalk.dim('any');
      console.log(`${chalk.bold(entry.id)}  [${capabilities}]  models: ${models}`);
    }
  });

function render(event: TurnEvent): void {
  switch (event.type) {
    case 'text_delta':
      process.stdout.write(event.text);
      break;
    case 'reasoning_delta':
      process.stderr.write(chalk.dim(event.text));
      break;
    case 'tool_result':
      process.stderr.write(chalk.cyan(`\n[${event.result.name}] ${event.result.ok ? 'ok' : 'failed'}\n`));
      break;
    case 'turn_end':
      process.stdout.write('\n');
      if (event.status === 'max-rounds-exceeded') {
        console.error(chalk.yellow(`Stopped after ${event.result.rounds} rounds (max rounds reached)`));
      } else if (event.error) {
        console.error(chalk.red(`Turn failed (${event.error.kind}): ${event.error.message}`));
        process.exitCode = 1;
      }
      break;
    default:
      break;
  }
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

// Source runs from src/, the build from dist/src/.
function readVersion(): string {
  for (const candidate of ['../package.json', '../../package.json']) {
    const url = new URL(candidate, import.meta.url);
    let raw: string;
    try {
      raw = readFileSync(url, 'utf-8');
    } catch {
      continue;
    }
    const pkg: unknown = JSON.parse(raw);
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

program.parseAsync().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
