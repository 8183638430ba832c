import { z } from 'zod';

export const PROVIDER_TYPES = [
  'openai',
  'deepseek',
  'qwen',
  'wenxin',
  'groq',
  'openrouter',
  'volcengine',
  'openai-compatible',
  'anthropic',
  'ollama',
] as const;

export type ProviderType = typeof PROVIDER_TYPES[number];

const CapabilitySchema = z.enum(['streaming', 'function_calls', 'reasoning']);

const ProviderSpecSchema = z.object({
  /** Identifier callers put in `ChatRequest.provider`. */
  id: z.string().min(1),
  /** Wire protocol / preset; defaults to `id` when that names a known preset. */
  type: z.enum(PROVIDER_TYPES).optional(),
  apiKey: z.string().default(''),
  apiBase: z.string().optional(),
  models: z.array(z.string()).default([]),
  capabilities: z.array(CapabilitySchema).optional(),
  extraHeaders: z.record(z.string()).optional(),
  reasoningParams: z.record(z.unknown()).optional(),
  streamUsage: z.boolean().optional(),
});

export type ProviderSpec = z.infer<typeof ProviderSpecSchema>;

const RetrySchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  baseDelayMs: z.number().min(0).default(1000),
  maxDelayMs: z.number().min(0).default(30_000),
});

const TurnDefaultsSchema = z.object({
  stream: z.boolean().default(true),
  enableTools: z.boolean().default(true),
  enableReasoning: z.boolean().default(false),
  maxRounds: z.number().int().min(1).default(5),
  temperature: z.number().optional(),
  topP: z.number().optional(),
  maxTokens: z.number().int().positive().optional(),
  reasoningBudgetTokens: z.number().int().positive().optional(),
  toolFailurePolicy: z.enum(['best-effort', 'fail-fast']).default('best-effort'),
  toolConcurrency: z.enum(['sequential', 'parallel']).default('sequential'),
  timeoutMs: z.number().int().positive().default(120_000),
  cancelGraceMs: z.number().int().min(0).default(2_000),
  retry: RetrySchema.optional().transform(v => RetrySchema.parse(v ?? {})),
});

export type TurnDefaults = z.infer<typeof TurnDefaultsSchema>;

export const TurnkitConfigSchema = z.object({
  providers: z.array(ProviderSpecSchema).default([]),
  defaults: TurnDefaultsSchema.optional().transform(v => TurnDefaultsSchema.parse(v ?? {})),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type TurnkitConfig = z.infer<typeof TurnkitConfigSchema>;
