import type { ProviderSpec, ProviderType, TurnkitConfig } from '../config/schema.js';
import { PROVIDER_TYPES } from '../config/schema.js';
import type { ProviderAdapter } from './adapter.js';
import { AdapterRegistry, type AdapterEntry } from './adapter-registry.js';
import { AnthropicAdapter } from './anthropic-adapter.js';
import { LLMError } from './errors.js';
import { OllamaAdapter } from './ollama-adapter.js';
import { OpenAICompatibleAdapter } from './openai-compatible-adapter.js';
import type { Capability } from './types.js';

interface OpenAIPreset {
  apiBase: string;
  capabilities?: Capability[];
  extraHeaders?: Record<string, string>;
  reasoningParams?: Record<string, unknown>;
}

const OPENAI_PRESETS: Partial<Record<ProviderType, OpenAIPreset>> = {
  openai: {
    apiBase: 'https://api.openai.com/v1',
  },
  // deepseek-reasoner streams `reasoning_content` without any request flag
  deepseek: {
    apiBase: 'https://api.deepseek.com/v1',
    capabilities: ['streaming', 'function_calls', 'reasoning'],
  },
  qwen: {
    apiBase: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
    capabilities: ['streaming', 'function_calls', 'reasoning'],
    reasoningParams: { enable_thinking: true },
  },
  wenxin: {
    apiBase: 'https://qianfan.baidubce.com/v2',
  },
  groq: {
    apiBase: 'https://api.groq.com/openai/v1',
  },
  // Volcengine Ark; doubao thinking models stream `reasoning_content`
  volcengine: {
    apiBase: 'https://ark.cn-beijing.volces.com/api/v3',
    capabilities: ['streaming', 'function_calls', 'reasoning'],
  },
  openrouter: {
    apiBase: 'https://openrouter.ai/api/v1',
    extraHeaders: { 'X-Title': 'turnkit' },
  },
};

export interface AdapterFactoryOptions {
  /** Transport override handed to every adapter (tests use an in-process fake). */
  fetch?: typeof fetch;
}

/**
 * Create the adapter for one provider spec.
 * The spec's `type` picks the wire protocol; without it the id must name a preset.
 */
export function createAdapter(spec: ProviderSpec, opts: AdapterFactoryOptions = {}): ProviderAdapter {
  const type = spec.type ?? presetFor(spec.id);

  if (type === 'anthropic') {
    return new AnthropicAdapter({
      name: spec.id,
      apiKey: spec.apiKey,
      apiBase: spec.apiBase,
      capabilities: spec.capabilities,
      fetch: opts.fetch,
    });
  }

  if (type === 'ollama') {
    return new OllamaAdapter({
      name: spec.id,
      apiBase: spec.apiBase,
      capabilities: spec.capabilities,
      fetch: opts.fetch,
    });
  }

  const preset = OPENAI_PRESETS[type];
  const apiBase = spec.apiBase ?? preset?.apiBase;
  if (!apiBase) {
    throw new LLMError({
      kind: 'configuration',
      provider: spec.id,
      message: `Provider "${spec.id}" of type "${type}" needs an apiBase`,
    });
  }

  return new OpenAICompatibleAdapter({
    name: spec.id,
    apiKey: spec.apiKey,
    apiBase,
    capabilities: spec.capabilities ?? preset?.capabilities,
    extraHeaders: { ...preset?.extraHeaders, ...spec.extraHeaders },
    reasoningParams: spec.reasoningParams ?? preset?.reasoningParams,
    streamUsage: spec.streamUsage,
    fetch: opts.fetch,
  });
}

/** Build the process-wide registry from the loaded config. */
export function buildAdapterRegistry(config: TurnkitConfig, opts: AdapterFactoryOptions = {}): AdapterRegistry {
  const entries: AdapterEntry[] = config.providers.map(spec => ({
    id: spec.id,
    adapter: createAdapter(spec, opts),
    models: spec.models,
  }));
  return new AdapterRegistry(entries);
}

function presetFor(id: string): ProviderType {
  const match = PROVIDER_TYPES.find(t => t === id);
  if (!match) {
    throw new LLMError({
      kind: 'configuration',
      provider: id,
      message: `Unknown provider "${id}". Set "type" to one of: ${PROVIDER_TYPES.join(', ')}`,
    });
  }
  return match;
}
