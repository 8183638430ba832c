import type { ErrorInfo, ErrorKind } from './types.js';

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set(['network', 'timeout', 'rate_limit']);

export class LLMError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly provider?: string;
  readonly status?: number;

  constructor(params: {
    kind: ErrorKind;
    message: string;
    retryable?: boolean;
    retryAfterMs?: number;
    provider?: string;
    status?: number;
    cause?: unknown;
  }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = 'LLMError';
    this.kind = params.kind;
    this.retryable = params.retryable ?? RETRYABLE_KINDS.has(params.kind);
    if (params.retryAfterMs !== undefined) this.retryAfterMs = params.retryAfterMs;
    if (params.provider !== undefined) this.provider = params.provider;
    if (params.status !== undefined) this.status = params.status;
  }

  toInfo(): ErrorInfo {
    return toErrorInfo(this);
  }

  static fromInfo(info: ErrorInfo, provider?: string): LLMError {
    return new LLMError({ ...info, provider });
  }
}

export class ConversationBusyError extends Error {
  readonly conversationId: string;

  constructor(conversationId: string) {
    super(`Conversation "${conversationId}" already has a turn in progress`);
    this.name = 'ConversationBusyError';
    this.conversationId = conversationId;
  }
}

export function toErrorInfo(err: LLMError): ErrorInfo {
  const info: ErrorInfo = { kind: err.kind, message: err.message, retryable: err.retryable };
  if (err.retryAfterMs !== undefined) info.retryAfterMs = err.retryAfterMs;
  return info;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function unsupportedCapability(provider: string, capability: string): LLMError {
  return new LLMError({
    kind: 'configuration',
    provider,
    message: `Provider "${provider}" does not support ${capability}`,
  });
}

export function unknownProvider(provider: string, known: string[]): LLMError {
  return new LLMError({
    kind: 'configuration',
    provider,
    message: `Unknown provider "${provider}". Registered: ${known.join(', ') || '(none)'}`,
  });
}

export function unknownModel(provider: string, model: string): LLMError {
  return new LLMError({
    kind: 'configuration',
    provider,
    message: `Model "${model}" is not configured for provider "${provider}"`,
  });
}

export function protocolError(provider: string, message: string, cause?: unknown): LLMError {
  return new LLMError({ kind: 'protocol', provider, message, cause });
}

export function cancelledError(reason?: string): LLMError {
  return new LLMError({ kind: 'cancelled', message: reason ?? 'Turn cancelled', retryable: false });
}

export function timeoutError(timeoutMs: number): LLMError {
  return new LLMError({ kind: 'timeout', message: `Provider call exceeded ${timeoutMs}ms` });
}

/**
 * Map an HTTP status from a provider into the taxonomy.
 * 408 and 5xx are transient; 429 is a rate limit; 401/403 are credentials;
 * everything else in 4xx means the request itself is wrong for this provider.
 */
export function errorFromStatus(
  provider: string,
  status: number,
  message: string,
  opts: { retryAfterMs?: number; cause?: unknown } = {},
): LLMError {
  const base = { provider, status, message: `${provider} ${status}: ${message}`, cause: opts.cause };
  if (status === 429) {
    return new LLMError({ ...base, kind: 'rate_limit', retryAfterMs: opts.retryAfterMs });
  }
  if (status === 401 || status === 403) {
    return new LLMError({ ...base, kind: 'auth' });
  }
  if (status === 408 || status >= 500) {
    return new LLMError({ ...base, kind: 'network' });
  }
  return new LLMError({ ...base, kind: 'configuration' });
}

/** Read `retry-after-ms` / `retry-after` (seconds or HTTP date) from a Headers object or a plain record. */
export function parseRetryAfter(headers: unknown, now: number = Date.now()): number | undefined {
  const ms = readHeader(headers, 'retry-after-ms');
  if (ms !== undefined) {
    const value = Number(ms);
    if (Number.isFinite(value) && value >= 0) return value;
  }

  const raw = readHeader(headers, 'retry-after');
  if (raw === undefined) return undefined;

  const seconds = Number(raw);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;

  const date = Date.parse(raw);
  if (!Number.isNaN(date)) return Math.max(0, date - now);
  return undefined;
}

function readHeader(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  if (typeof headers === 'object' && headers !== null) {
    for (const [key, value] of Object.entries(headers)) {
      if (key.toLowerCase() === name && typeof value === 'string') return value;
    }
  }
  return undefined;
}

/**
 * Classify errors that carry no SDK type information (fetch failures, Node socket errors).
 * Adapters check their SDK's own error classes first and fall back to this.
 */
export function classifyError(provider: string, err: unknown, signal?: AbortSignal): LLMError {
  if (err instanceof LLMError) return err;

  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    return reason instanceof LLMError ? reason : cancelledError(errorMessage(reason));
  }

  if (err instanceof SyntaxError) {
    return protocolError(provider, `Malformed response from ${provider}: ${err.message}`, err);
  }

  const msg = errorMessage(err);
  const code = errorCode(err);
  if (code && NETWORK_CODES.has(code)) {
    return new LLMError({ kind: 'network', provider, message: `${provider}: ${msg}`, cause: err });
  }
  if (/fetch failed|socket hang up|network/i.test(msg)) {
    return new LLMError({ kind: 'network', provider, message: `${provider}: ${msg}`, cause: err });
  }

  return new LLMError({ kind: 'protocol', provider, message: `${provider}: ${msg}`, cause: err, retryable: false });
}

const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('cause' in err) return errorCode(err.cause);
  return undefined;
}
