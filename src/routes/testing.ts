import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import { createApp, type App } from '../app';
import { loadConfig } from '../config';
import { RecordStore } from '../db/store';
import { AuthService } from '../lib/auth';
import type { AnswerGenerator } from '../lib/llm';
import { TokenService } from '../lib/token';
import type { Transcriber } from '../lib/transcription';

// Route-test fixture: a real store in a fresh temp directory and fake
// provider services.
export async function createTestApp(env: Record<string, string> = {}) {
  const dataDir = await mkdtemp(path.join(tmpdir(), 'routes-'));
  const config = loadConfig({
    NODE_ENV: 'test',
    DATA_DIR: dataDir,
    JWT_SECRET_KEY: 'test-secret',
    LLM_API_KEY: 'test-key',
    PASSWORD_HASH_ROUNDS: '1000',
    ...env,
  });

  const store = new RecordStore(config.dataDir);
  await store.initialize();
  const tokens = new TokenService(config.jwt);
  const auth = new AuthService(store, tokens, config.passwordHashRounds);
  const llm = {
    generateShortAnswer: vi.fn<AnswerGenerator['generateShortAnswer']>(),
  };
  const transcriber = { transcribe: vi.fn<Transcriber['transcribe']>() };

  const app = createApp({ config, store, auth, llm, transcriber });

  return {
    app,
    store,
    tokens,
    llm,
    transcriber,
    cleanup: () => rm(dataDir, { recursive: true, force: true }),
  };
}

export function jsonRequest(
  method: string,
  payload: unknown,
  headers: Record<string, string> = {},
): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(payload),
  };
}

/** Signs up and logs in, returning the Authorization header to send. */
export async function loginAs(
  app: App,
  username = 'alice',
  password = 'secret1',
): Promise<Record<string, string>> {
  await app.request('/auth/signup', jsonRequest('POST', { username, password }));
  const res = await app.request(
    '/auth/login',
    jsonRequest('POST', { username, password }),
  );
  const body = await res.json();
  return { Authorization: `Bearer ${body.data.accessToken}` };
}
