export type Logger = {
  debug: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
};

export type ConsoleLoggerOptions = {
  debug?: boolean;
};

export function createConsoleLogger(scope: string, { debug = false }: ConsoleLoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (!debug) return;
      // eslint-disable-next-line no-console
      console.log(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      // eslint-disable-next-line no-console
      console.warn(prefix, message, ...details);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
