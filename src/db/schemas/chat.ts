import { z } from 'zod';
import { isoTimestamp, serialId, type TableDefinition } from './table';

export type ChatMessage = {
  id: number;
  userId: number;
  role: string; // 'user' or 'assistant'
  content: string;
  createdAt: Date;
};

// Chat history table: every message of every user, ids shared table-wide
export const chatMessageTable: TableDefinition<ChatMessage> = {
  fileName: 'chat_history.csv',
  columns: ['id', 'user_id', 'role', 'content', 'created_at'],
  row: z
    .object({
      id: serialId,
      user_id: serialId,
      role: z.string(),
      content: z.string(),
      created_at: isoTimestamp,
    })
    .transform((row) => ({
      id: row.id,
      userId: row.user_id,
      role: row.role,
      content: row.content,
      createdAt: row.created_at,
    })),
  toRow: (message) => [
    String(message.id),
    String(message.userId),
    message.role,
    message.content,
    message.createdAt.toISOString(),
  ],
};
