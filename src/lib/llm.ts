import { z } from 'zod';
import type { ProviderConfig } from '../config';
import { UpstreamEmptyResultError, ValidationError } from './errors';
import { requestProviderApi } from './provider';

const MAX_ANSWER_SENTENCES = 4;

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      }),
    )
    .default([]),
});

export type ChatCompletionMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string;
};

/**
 * Collapses whitespace and keeps at most `maxSentences` sentences, splitting
 * after `.`, `!` or `?`.
 */
export function limitSentences(
  text: string,
  maxSentences = MAX_ANSWER_SENTENCES,
): string {
  const cleaned = text.split(/\s+/).filter(Boolean).join(' ');
  const parts = cleaned
    .split(/(?<=[.!?])\s+/)
    .map((part) => part.trim())
    .filter(Boolean);
  if (parts.length <= maxSentences) {
    return cleaned;
  }
  return parts.slice(0, maxSentences).join(' ').trim();
}

export function buildUserPrompt(transcript: string): string {
  return (
    'Client question/transcript:\n' +
    `${transcript}\n\n` +
    'Return only the final meeting-ready answer.'
  );
}

export async function requestOpenAiChatCompletionsApi(
  config: ProviderConfig,
  messages: ChatCompletionMessage[],
): Promise<string> {
  const result = await requestProviderApi(
    config,
    '/chat/completions',
    JSON.stringify({
      model: config.llmModel,
      temperature: 0.2,
      max_tokens: 180,
      messages,
    }),
    'LLM',
  );

  const parsed = chatCompletionSchema.safeParse(result);
  const content = parsed.success
    ? (parsed.data.choices[0]?.message.content ?? '')
    : '';
  return content.trim();
}

export interface AnswerGenerator {
  generateShortAnswer(transcript: string): Promise<string>;
}

export class LlmService implements AnswerGenerator {
  constructor(private readonly config: ProviderConfig) {}

  async generateShortAnswer(transcript: string): Promise<string> {
    if (!transcript.trim()) {
      throw new ValidationError('Transcription is empty.');
    }

    const content = await requestOpenAiChatCompletionsApi(this.config, [
      { role: 'system', content: this.config.systemPrompt },
      { role: 'user', content: buildUserPrompt(transcript) },
    ]);
    if (!content) {
      throw new UpstreamEmptyResultError('LLM returned empty answer.');
    }
    return limitSentences(content);
  }
}
