export type Logger = {
  debug?: (message: string) => void;
  info?: (message: string) => void;
  warn: (message: string) => void;
  error?: (message: string) => void;
};

export const silentLogger: Logger = {
  warn: () => {},
};

export function createConsoleLogger(options: { debug?: boolean; info?: boolean } = {}): Logger {
  return {
    debug: options.debug ? (message) => console.debug(message) : undefined,
    info: options.info === false ? undefined : (message) => console.info(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  };
}
