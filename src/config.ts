import { z } from 'zod';
import { DEFAULT_HASH_ROUNDS } from './lib/password';

const DEFAULT_SYSTEM_PROMPT =
  'You are a professional technical consultant in a live client meeting. ' +
  'Provide short, confident, business-ready answers. ' +
  'No long explanations. ' +
  'No filler words. ' +
  'Keep answers under 4 sentences.';

const csvList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean),
  );

const envSchema = z.object({
  NODE_ENV: z.string().default('production'),
  PORT: z.number({ coerce: true }).int().positive().default(8000),
  APP_NAME: z.string().default('Voice Answer Backend'),
  DATA_DIR: z.string().min(1).default('./data'),

  JWT_SECRET_KEY: z.string().min(1),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  JWT_EXPIRE_MINUTES: z.number({ coerce: true }).positive().default(60),
  PASSWORD_HASH_ROUNDS: z
    .number({ coerce: true })
    .int()
    .positive()
    .default(DEFAULT_HASH_ROUNDS),

  LLM_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  LLM_API_KEY: z.string().default(''),
  LLM_MODEL: z.string().default('llama-3.1-8b-instant'),
  WHISPER_MODEL: z.string().default('whisper-large-v3-turbo'),
  LLM_TIMEOUT_SECONDS: z.number({ coerce: true }).positive().default(8),
  LLM_SYSTEM_PROMPT: z.string().default(DEFAULT_SYSTEM_PROMPT),

  CORS_ALLOW_ORIGINS: csvList.default('*'),
  CORS_ALLOW_METHODS: csvList.default('GET,POST,OPTIONS'),
  CORS_ALLOW_HEADERS: csvList.default('*'),
  MAX_AUDIO_SIZE_MB: z.number({ coerce: true }).positive().default(15),
});

export type Env = z.infer<typeof envSchema>;

export type ProviderConfig = {
  baseUrl: string;
  apiKey: string;
  llmModel: string;
  whisperModel: string;
  timeoutMs: number;
  systemPrompt: string;
};

export type Config = {
  production: boolean;
  port: number;
  appName: string;
  dataDir: string;
  jwt: {
    secret: string;
    algorithm: Env['JWT_ALGORITHM'];
    expireMinutes: number;
  };
  passwordHashRounds: number;
  provider: ProviderConfig;
  cors: {
    origins: string[];
    methods: string[];
    headers: string[];
  };
  maxAudioBytes: number;
};

const PLACEHOLDER_KEYS = new Set(['replace_with_real_key', 'your_groq_api_key_here']);

/**
 * Trims the key and drops one pair of surrounding quotes, which `.env`
 * files often leave in place.
 */
export function normalizeApiKey(raw: string): string {
  let key = raw.trim();
  if (
    key.length >= 2 &&
    key[0] === key[key.length - 1] &&
    (key[0] === '"' || key[0] === "'")
  ) {
    key = key.slice(1, -1).trim();
  }
  return key;
}

export function isProviderKeyConfigured(key: string): boolean {
  const normalized = normalizeApiKey(key);
  return normalized !== '' && !PLACEHOLDER_KEYS.has(normalized.toLowerCase());
}

export function loadConfig(
  processEnv: Record<string, string | undefined>,
): Config {
  const env = envSchema.parse(processEnv);
  return {
    production: env.NODE_ENV === 'production',
    port: env.PORT,
    appName: env.APP_NAME,
    dataDir: env.DATA_DIR,
    jwt: {
      secret: env.JWT_SECRET_KEY,
      algorithm: env.JWT_ALGORITHM,
      expireMinutes: env.JWT_EXPIRE_MINUTES,
    },
    passwordHashRounds: env.PASSWORD_HASH_ROUNDS,
    provider: {
      baseUrl: env.LLM_BASE_URL.replace(/\/+$/, ''),
      apiKey: normalizeApiKey(env.LLM_API_KEY),
      llmModel: env.LLM_MODEL,
      whisperModel: env.WHISPER_MODEL,
      timeoutMs: env.LLM_TIMEOUT_SECONDS * 1000,
      systemPrompt: env.LLM_SYSTEM_PROMPT,
    },
    cors: {
      origins: env.CORS_ALLOW_ORIGINS,
      methods: env.CORS_ALLOW_METHODS,
      headers: env.CORS_ALLOW_HEADERS,
    },
    maxAudioBytes: env.MAX_AUDIO_SIZE_MB * 1024 * 1024,
  };
}
