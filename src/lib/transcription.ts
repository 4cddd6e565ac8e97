import { z } from 'zod';
import type { ProviderConfig } from '../config';
import { UpstreamEmptyResultError, ValidationError } from './errors';
import { requestProviderApi } from './provider';

const transcriptionSchema = z.object({
  text: z.string().nullish(),
});

export interface Transcriber {
  transcribe(
    filename: string,
    audio: ArrayBuffer,
    contentType?: string,
  ): Promise<string>;
}

export class TranscriptionService implements Transcriber {
  constructor(private readonly config: ProviderConfig) {}

  async transcribe(
    filename: string,
    audio: ArrayBuffer,
    contentType?: string,
  ): Promise<string> {
    if (audio.byteLength === 0) {
      throw new ValidationError('Empty audio payload.');
    }

    const form = new FormData();
    form.append(
      'file',
      new Blob([audio], contentType ? { type: contentType } : {}),
      filename || 'audio.wav',
    );
    form.append('model', this.config.whisperModel);
    form.append('response_format', 'verbose_json');
    form.append('language', 'en');
    form.append('temperature', '0');

    const result = await requestProviderApi(
      this.config,
      '/audio/transcriptions',
      form,
      'Transcription',
    );

    const parsed = transcriptionSchema.safeParse(result);
    const text = parsed.success ? (parsed.data.text ?? '').trim() : '';
    if (!text) {
      throw new UpstreamEmptyResultError('Could not transcribe audio.');
    }
    return text;
  }
}
