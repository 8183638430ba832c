import type { ChatRequestInput, Message, ToolSchema, TurnConfig, TurnEvent, TurnResult } from '../llm/types.js';
import type { LLMManager } from '../turn/llm-manager.js';
import * as log from '../utils/logger.js';

/** Persistence boundary owned by the host application. */
export interface ConversationStore {
  getHistory(conversationId: string): Promise<Message[]>;
  append(conversationId: string, messages: Message[]): Promise<void>;
}

export interface ConversationTurnInput {
  conversationId: string;
  provider: string;
  model: string;
  content: string;
  /** Prepended for this turn only; never persisted. */
  systemPrompt?: string;
  tools?: ToolSchema[];
  config?: Partial<TurnConfig>;
  signal?: AbortSignal;
}

export type TurnEventSink = (event: TurnEvent) => void | Promise<void>;

export interface ConversationTurnDeps {
  manager: LLMManager;
  store: ConversationStore;
}

/**
 * Run one user message against a stored conversation.
 * The user message and everything the turn produced are appended once the
 * turn has ended, whatever its status, including when the sink throws.
 */
export async function runConversationTurn(
  deps: ConversationTurnDeps,
  input: ConversationTurnInput,
  sink?: TurnEventSink,
): Promise<TurnResult> {
  const history = await deps.store.getHistory(input.conversationId);
  const userMessage: Message = { role: 'user', content: input.content };

  const messages: Message[] = [
    ...(input.systemPrompt ? [{ role: 'system' as const, content: input.systemPrompt }] : []),
    ...history,
    userMessage,
  ];

  const request: ChatRequestInput = {
    provider: input.provider,
    model: input.model,
    messages,
    ...(input.tools ? { tools: input.tools } : {}),
    ...(input.config ? { config: input.config } : {}),
  };

  const handle = deps.manager.run(request, { conversationId: input.conversationId, signal: input.signal });

  try {
    for await (const event of handle) {
      if (sink) await sink(event);
    }
  } finally {
    // A throwing sink leaves the loop, which cancels the turn; what it produced is stored all the same.
    const result = await handle.result();
    await deps.store.append(input.conversationId, [userMessage, ...result.messages]);
    log.debug(`Conversation ${input.conversationId}: stored ${result.messages.length + 1} message(s), status=${result.status}`);
  }

  return handle.result();
}

/** Map-backed store for tests and the CLI. */
export class InMemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, Message[]>();

  async getHistory(conversationId: string): Promise<Message[]> {
    return [...(this.conversations.get(conversationId) ?? [])];
  }

  async append(conversationId: string, messages: Message[]): Promise<void> {
    const existing = this.conversations.get(conversationId) ?? [];
    this.conversations.set(conversationId, [...existing, ...messages]);
  }
}
