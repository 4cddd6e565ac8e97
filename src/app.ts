import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { prettyJSON } from 'hono/pretty-json';
import { HTTPException } from 'hono/http-exception';
import type { AppDeps, Context } from './context';
import {
  AppError,
  IntegrityError,
  StorageUnavailableError,
} from './lib/errors';
import { audioRouter } from './routes/audio';
import { authRouter } from './routes/auth';
import { chatRouter } from './routes/chat';
import type { ErrorResponse } from './types';

function clientMessage(err: AppError): string {
  if (err instanceof IntegrityError) {
    return 'Unexpected server error.';
  }
  if (err instanceof StorageUnavailableError) {
    return 'Storage is unavailable.';
  }
  return err.message;
}

export function createApp(deps: AppDeps) {
  const { config } = deps;
  const app = new Hono<Context>();

  app.use(
    '*',
    cors({
      origin: config.cors.origins.includes('*') ? '*' : config.cors.origins,
      allowMethods: config.cors.methods,
      allowHeaders: config.cors.headers,
    }),
  );
  app.use(logger());
  app.use(prettyJSON());

  app.get('/health', (c) => c.json({ status: 'ok', service: config.appName }));

  app
    .route('/auth', authRouter(deps.auth))
    .route('/chat', chatRouter(deps))
    .route('/process-audio', audioRouter(deps));

  app.onError((err, c) => {
    if (err instanceof AppError) {
      if (err.status >= 500) {
        console.error(`${c.req.method} ${c.req.path} failed:`, err);
      }
      return c.json<ErrorResponse>(
        { success: false, error: clientMessage(err), code: err.kind },
        err.status,
      );
    }

    if (err instanceof HTTPException) {
      const errResponse =
        err.res ??
        c.json<ErrorResponse>(
          { success: false, error: err.message, code: `HTTP_${err.status}` },
          err.status,
        );
      return errResponse;
    }

    console.error(`${c.req.method} ${c.req.path} failed:`, err);
    return c.json<ErrorResponse>(
      {
        success: false,
        error: config.production
          ? 'Internal Server Error'
          : (err.stack ?? err.message),
      },
      500,
    );
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
