import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { TurnkitConfigSchema, type ProviderType, type TurnkitConfig } from './schema.js';

export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

/** Env var → provider preset that it configures. */
const API_KEY_VARS: Array<[string, ProviderType]> = [
  ['OPENAI_API_KEY', 'openai'],
  ['DEEPSEEK_API_KEY', 'deepseek'],
  ['DASHSCOPE_API_KEY', 'qwen'],
  ['QIANFAN_API_KEY', 'wenxin'],
  ['GROQ_API_KEY', 'groq'],
  ['OPENROUTER_API_KEY', 'openrouter'],
  ['ARK_API_KEY', 'volcengine'],
  ['ANTHROPIC_API_KEY', 'anthropic'],
];

/**
 * Load config with priority: overrides > env vars > workspace json > user json > defaults
 */
export async function loadConfig(
  overrides?: Record<string, unknown>,
  opts: LoadConfigOptions = {},
): Promise<TurnkitConfig> {
  const cwd = opts.cwd ?? process.cwd();
  const home = opts.home ?? homedir();
  const env = opts.env ?? process.env;

  const userConfig = await loadJSON(resolve(home, '.turnkit', 'config.json'));
  const workspaceConfig = await loadJSON(resolve(cwd, 'turnkit.json'));

  const merged = deepMerge(userConfig, workspaceConfig, overrides ?? {});
  merged.providers = mergeProviders(merged.providers, envProviders(env));
  if (env.TURNKIT_LOG_LEVEL) merged.logLevel = env.TURNKIT_LOG_LEVEL;

  return TurnkitConfigSchema.parse(merged);
}

function envProviders(env: NodeJS.ProcessEnv): Array<Record<string, unknown>> {
  const result: Array<Record<string, unknown>> = [];
  for (const [name, id] of API_KEY_VARS) {
    const apiKey = env[name];
    if (apiKey) result.push({ id, apiKey });
  }
  if (env.OLLAMA_HOST) {
    result.push({ id: 'ollama', apiBase: env.OLLAMA_HOST });
  }
  return result;
}

/**
 * File-declared providers win; env only fills an empty key/base on a provider
 * with the same id, or adds a preset provider the files do not mention.
 */
function mergeProviders(fromFiles: unknown, fromEnv: Array<Record<string, unknown>>): unknown[] {
  const providers: unknown[] = Array.isArray(fromFiles) ? [...fromFiles] : [];

  for (const envSpec of fromEnv) {
    const idx = providers.findIndex(p => isRecord(p) && p.id === envSpec.id);
    const existing = idx === -1 ? undefined : providers[idx];
    if (!isRecord(existing)) {
      providers.push(envSpec);
      continue;
    }
    const filled: Record<string, unknown> = { ...existing };
    for (const [key, value] of Object.entries(envSpec)) {
      if (filled[key] === undefined || filled[key] === '') filled[key] = value;
    }
    providers[idx] = filled;
  }

  return providers;
}

async function loadJSON(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return {};
  }
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const current = result[key];
      if (isRecord(value) && isRecord(current)) {
        result[key] = deepMerge(current, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}
