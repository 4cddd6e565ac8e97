import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppDeps, Context } from '../context';
import { fetchChatHistory, recordChatTurn } from '../lib/history';
import { assertProviderConfigured } from '../lib/provider';
import { loggedIn } from '../middleware/loggedIn';
import {
  chatRequestSchema,
  historyQuerySchema,
  rejectInvalidPayload,
  type ChatItem,
  type SuccessResponse,
} from '../types';

export const chatRouter = ({ config, store, auth, llm }: AppDeps) =>
  new Hono<Context>()
    .post(
      '/respond',
      loggedIn(auth),
      zValidator('json', chatRequestSchema, rejectInvalidPayload),
      async (c) => {
        assertProviderConfigured(config.provider);
        const user = c.get('user');
        const { message } = c.req.valid('json');

        const answer = await llm.generateShortAnswer(message);

        await recordChatTurn(store, user.id, 'user', message);
        await recordChatTurn(store, user.id, 'assistant', answer);

        return c.json<SuccessResponse<{ answer: string }>>({
          success: true,
          message: 'Successfully generated an answer',
          data: { answer },
        });
      },
    )
    .get(
      '/history',
      loggedIn(auth),
      zValidator('query', historyQuerySchema, rejectInvalidPayload),
      async (c) => {
        const user = c.get('user');
        const { limit } = c.req.valid('query');
        const messages = await fetchChatHistory(store, user.id, limit);

        return c.json<SuccessResponse<{ items: ChatItem[] }>>({
          success: true,
          message: 'Successfully fetched chat history',
          data: {
            items: messages.map((item) => ({
              id: item.id,
              role: item.role,
              content: item.content,
              createdAt: item.createdAt,
            })),
          },
        });
      },
    );
