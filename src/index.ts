import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { isProviderKeyConfigured, loadConfig } from './config';
import { RecordStore } from './db/store';
import { AuthService } from './lib/auth';
import { LlmService } from './lib/llm';
import { TokenService } from './lib/token';
import { TranscriptionService } from './lib/transcription';

const config = loadConfig(process.env);

if (!isProviderKeyConfigured(config.provider.apiKey)) {
  console.warn(
    'LLM_API_KEY is not configured. Requests using LLM/transcription will fail until it is set.',
  );
}

const store = new RecordStore(config.dataDir);
await store.initialize();

const app = createApp({
  config,
  store,
  auth: new AuthService(
    store,
    new TokenService(config.jwt),
    config.passwordHashRounds,
  ),
  llm: new LlmService(config.provider),
  transcriber: new TranscriptionService(config.provider),
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`${config.appName} listening on http://localhost:${info.port}`);
});
