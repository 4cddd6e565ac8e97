import { z } from 'zod';
import { isoTimestamp, serialId, type TableDefinition } from './table';

export type User = {
  id: number;
  username: string;
  passwordHash: string;
  createdAt: Date;
};

export type Identity = Omit<User, 'passwordHash'>;

export const userTable: TableDefinition<User> = {
  fileName: 'users.csv',
  columns: ['id', 'username', 'password_hash', 'created_at'],
  row: z
    .object({
      id: serialId,
      username: z.string().min(1),
      password_hash: z.string(),
      created_at: isoTimestamp,
    })
    .transform((row) => ({
      id: row.id,
      username: row.username,
      passwordHash: row.password_hash,
      createdAt: row.created_at,
    })),
  toRow: (user) => [
    String(user.id),
    user.username,
    user.passwordHash,
    user.createdAt.toISOString(),
  ],
};

export function toIdentity(user: User): Identity {
  return {
    id: user.id,
    username: user.username,
    createdAt: user.createdAt,
  };
}
