export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
