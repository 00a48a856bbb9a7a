import { redact } from '../security/redaction.js';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
  debug(message: string): void;
  child(scope: string, knownSecrets?: readonly string[]): Logger;
}

function debugEnabled(): boolean {
  const raw = (process.env.QCR_DEBUG ?? '').trim().toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes';
}

export function createLogger(scope: string, knownSecrets: readonly string[] = []): Logger {
  const line = (message: string) => `[${scope}] ${redact(message, knownSecrets)}`;

  return {
    info: (message) => console.log(line(message)),
    warn: (message) => console.warn(line(message)),
    error: (message, err) => {
      console.error(line(message));
      if (err instanceof Error && err.stack && debugEnabled()) {
        console.error(redact(err.stack, knownSecrets));
      }
    },
    debug: (message) => {
      if (debugEnabled()) console.log(line(message));
    },
    child: (childScope, extraSecrets = []) =>
      createLogger(`${scope}:${childScope}`, [...knownSecrets, ...extraSecrets]),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
  child: () => silentLogger,
};
