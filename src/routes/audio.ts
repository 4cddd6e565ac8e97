import { Hono } from 'hono';
import type { AppDeps, Context } from '../context';
import { ValidationError } from '../lib/errors';
import { recordChatTurn } from '../lib/history';
import { assertProviderConfigured } from '../lib/provider';
import { loggedIn } from '../middleware/loggedIn';
import type { SuccessResponse } from '../types';

type ProcessAudioResponse = {
  transcription: string;
  answer: string;
};

export const audioRouter = ({
  config,
  store,
  auth,
  llm,
  transcriber,
}: AppDeps) =>
  new Hono<Context>().post('/', loggedIn(auth), async (c) => {
    assertProviderConfigured(config.provider);
    const user = c.get('user');

    const body = await c.req.parseBody();
    const audio = body['audio'];
    if (audio === undefined || typeof audio === 'string') {
      throw new ValidationError('Invalid request payload.', 422);
    }
    if (!audio.name) {
      throw new ValidationError('Audio filename is missing.');
    }
    if (audio.type && !audio.type.startsWith('audio/')) {
      throw new ValidationError(
        'Invalid file type. Please upload an audio file.',
      );
    }
    if (audio.size > config.maxAudioBytes) {
      const maxMb = config.maxAudioBytes / (1024 * 1024);
      throw new ValidationError(
        `Audio file is too large. Max allowed: ${maxMb}MB.`,
        413,
      );
    }
    if (audio.size === 0) {
      throw new ValidationError('Uploaded audio file is empty.');
    }

    const transcription = await transcriber.transcribe(
      audio.name,
      await audio.arrayBuffer(),
      audio.type || undefined,
    );
    const answer = await llm.generateShortAnswer(transcription);

    await recordChatTurn(store, user.id, 'user', transcription);
    await recordChatTurn(store, user.id, 'assistant', answer);

    return c.json<SuccessResponse<ProcessAudioResponse>>({
      success: true,
      message: 'Successfully processed audio',
      data: { transcription, answer },
    });
  });
