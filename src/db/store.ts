import { appendFile, mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { IntegrityError, StorageUnavailableError } from '../lib/errors';
import { userTable, type User } from './schemas/auth';
import { chatMessageTable, type ChatMessage } from './schemas/chat';
import type { TableDefinition } from './schemas/table';

const csvRecordsSchema = z.array(z.array(z.string()));

function isErrnoException(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function nextId(records: { id: number }[]): number {
  return records.reduce((max, record) => Math.max(max, record.id), 0) + 1;
}

/**
 * Flat-file store for the user and chat history tables.
 *
 * Every public operation runs under one exclusive lock owned by the
 * instance, so all reads and read-then-append sequences are totally
 * ordered. Construct one per data directory and share it.
 */
export class RecordStore {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    readonly dataDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async initialize(): Promise<void> {
    await this.withLock(async () => {
      try {
        await mkdir(this.dataDir, { recursive: true });
      } catch (err) {
        throw new StorageUnavailableError(
          `Failed to create data directory ${this.dataDir}`,
          { cause: err },
        );
      }
      await this.ensureTable(userTable);
      await this.ensureTable(chatMessageTable);
    });
  }

  findUserByUsername(username: string): Promise<User | undefined> {
    return this.withLock(async () => {
      const users = await this.readTable(userTable);
      return users.find((user) => user.username === username);
    });
  }

  /**
   * Appends a user without checking that the username is free; callers
   * that need uniqueness use `createUserIfAbsent`.
   */
  createUser(username: string, passwordHash: string): Promise<User> {
    return this.withLock(async () => {
      const users = await this.readTable(userTable);
      return this.insertUser(users, username, passwordHash);
    });
  }

  /**
   * Existence check and append under a single lock acquisition. Resolves
   * to `undefined` when the username is already taken.
   */
  createUserIfAbsent(
    username: string,
    passwordHash: string,
  ): Promise<User | undefined> {
    return this.withLock(async () => {
      const users = await this.readTable(userTable);
      if (users.some((user) => user.username === username)) {
        return undefined;
      }
      return this.insertUser(users, username, passwordHash);
    });
  }

  listUsers(): Promise<User[]> {
    return this.withLock(() => this.readTable(userTable));
  }

  appendChatMessage(
    userId: number,
    role: string,
    content: string,
  ): Promise<ChatMessage> {
    return this.withLock(async () => {
      const messages = await this.readTable(chatMessageTable);
      const message: ChatMessage = {
        id: nextId(messages),
        userId,
        role,
        content,
        createdAt: this.now(),
      };
      await this.appendRow(chatMessageTable, message);
      return message;
    });
  }

  listChatMessages(): Promise<ChatMessage[]> {
    return this.withLock(() => this.readTable(chatMessageTable));
  }

  /**
   * Messages of one user, oldest first, cut to the first `limit` entries.
   */
  listChatHistory(userId: number, limit: number): Promise<ChatMessage[]> {
    return this.withLock(async () => {
      const messages = await this.readTable(chatMessageTable);
      return messages
        .filter((message) => message.userId === userId)
        .sort(
          (a, b) =>
            a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id,
        )
        .slice(0, limit);
    });
  }

  private withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The next task waits for this one to settle either way; a failure
    // still reaches the caller through `run`.
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async insertUser(
    users: User[],
    username: string,
    passwordHash: string,
  ): Promise<User> {
    const user: User = {
      id: nextId(users),
      username,
      passwordHash,
      createdAt: this.now(),
    };
    await this.appendRow(userTable, user);
    return user;
  }

  private pathOf<T>(table: TableDefinition<T>): string {
    return path.join(this.dataDir, table.fileName);
  }

  // Creates the table with its header, and writes the header into an
  // existing zero-byte file.
  private async ensureTable<T>(table: TableDefinition<T>): Promise<void> {
    const file = this.pathOf(table);
    const header = stringify([table.columns]);
    try {
      await writeFile(file, header, { flag: 'wx' });
      return;
    } catch (err) {
      if (!isErrnoException(err, 'EEXIST')) {
        throw new StorageUnavailableError(
          `Failed to create ${table.fileName}`,
          { cause: err },
        );
      }
    }

    try {
      const { size } = await stat(file);
      if (size === 0) {
        await writeFile(file, header);
      }
    } catch (err) {
      throw new StorageUnavailableError(`Failed to create ${table.fileName}`, {
        cause: err,
      });
    }
  }

  private async readTable<T>(table: TableDefinition<T>): Promise<T[]> {
    let content: string;
    try {
      content = await readFile(this.pathOf(table), 'utf-8');
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) {
        return [];
      }
      throw new StorageUnavailableError(`Failed to read ${table.fileName}`, {
        cause: err,
      });
    }

    let parsed: unknown;
    try {
      parsed = parse(content, {
        bom: true,
        record_delimiter: ['\r\n', '\n'],
        skip_empty_lines: true,
      });
    } catch (err) {
      throw new IntegrityError(`${table.fileName} is not valid CSV`, {
        cause: err,
      });
    }

    const [header, ...rows] = csvRecordsSchema.parse(parsed);
    if (!header) {
      return [];
    }
    if (header.join(',') !== table.columns.join(',')) {
      throw new IntegrityError(
        `${table.fileName} has unexpected columns: ${header.join(',')}`,
      );
    }

    return rows.map((cells, index) => {
      const raw = Object.fromEntries(
        table.columns.map((column, i) => [column, cells[i]]),
      );
      const result = table.row.safeParse(raw);
      if (!result.success) {
        const issue = result.error.issues[0];
        throw new IntegrityError(
          `${table.fileName} row ${index + 1} is malformed: ${issue?.path.join('.')} ${issue?.message}`,
        );
      }
      return result.data;
    });
  }

  private async appendRow<T>(
    table: TableDefinition<T>,
    record: T,
  ): Promise<void> {
    await this.ensureTable(table);
    try {
      await appendFile(this.pathOf(table), stringify([table.toRow(record)]));
    } catch (err) {
      throw new StorageUnavailableError(
        `Failed to append to ${table.fileName}`,
        { cause: err },
      );
    }
  }
}
