import debug from 'debug';

export type WarnLogger = (message: string) => void;

let logger: WarnLogger | undefined;
const debugLogger = debug('retryhttp');

/** Route library warnings to an application logger as well as debug output. */
export function setLogger(fn: WarnLogger | undefined): void {
  logger = fn;
}

export function logWarn(message: string, ...args: unknown[]): void {
  const warnMessage = `WARN: ${message}`;

  if (logger) {
    logger(warnMessage);
  }

  debugLogger(warnMessage, ...args);
}
