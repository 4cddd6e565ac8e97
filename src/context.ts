import type { Config } from './config';
import type { Identity } from './db/schemas/auth';
import type { RecordStore } from './db/store';
import type { AuthService } from './lib/auth';
import type { AnswerGenerator } from './lib/llm';
import type { Transcriber } from './lib/transcription';

export type Context = {
  Variables: {
    user?: Identity;
  };
};

// Handlers behind the `loggedIn` middleware see a resolved user.
export type LoggedInContext = {
  Variables: {
    user: Identity;
  };
};

export type AppDeps = {
  config: Config;
  store: RecordStore;
  auth: AuthService;
  llm: AnswerGenerator;
  transcriber: Transcriber;
};
