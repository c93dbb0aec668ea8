// engine/logger.ts — Leveled console logger shared by the engine and CLI

type LogArgs = readonly unknown[];

export interface Logger {
  debug(...args: LogArgs): void;
  info(...args: LogArgs): void;
  warn(...args: LogArgs): void;
  error(...args: LogArgs): void;
}

// Everything goes to stderr so JSON written to stdout by the CLI stays parseable.
export const logger: Logger = {
  debug: (...args) => {
    if (process.env.DEBUG) console.error('[debug]', ...args);
  },
  info: (...args) => console.error('[info]', ...args),
  warn: (...args) => console.error('[warn]', ...args),
  error: (...args) => console.error('[error]', ...args),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
