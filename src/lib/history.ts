import type { RecordStore } from '../db/store';
import type { ChatMessage } from '../db/schemas/chat';

export const DEFAULT_HISTORY_LIMIT = 50;
export const MAX_HISTORY_LIMIT = 200;

export type ChatRole = 'user' | 'assistant';

export function recordChatTurn(
  store: RecordStore,
  userId: number,
  role: ChatRole,
  content: string,
): Promise<ChatMessage> {
  return store.appendChatMessage(userId, role, content);
}

/**
 * Oldest messages first. `limit` is clamped to 1..200; once a user has more
 * than `limit` messages the newest ones are not returned.
 */
export function fetchChatHistory(
  store: RecordStore,
  userId: number,
  limit = DEFAULT_HISTORY_LIMIT,
): Promise<ChatMessage[]> {
  const requested = Number.isFinite(limit) ? limit : DEFAULT_HISTORY_LIMIT;
  const safeLimit = Math.min(
    Math.max(Math.trunc(requested), 1),
    MAX_HISTORY_LIMIT,
  );
  return store.listChatHistory(userId, safeLimit);
}
