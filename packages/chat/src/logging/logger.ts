import { pino, type Logger } from 'pino';

export type LoggerOptions = {
  readonly enableLogging: boolean;
  readonly logFile?: string;
  readonly logger?: Logger;
};

export const LOGGER_NAME = 'tipchat';

/**
 * Returns the logger a client writes to, or undefined when logging is off.
 * A caller-supplied logger is used as is.
 */
export function createLogger(options: LoggerOptions): Logger | undefined {
  if (options.logger) {
    return options.logger;
  }
  if (!options.enableLogging) {
    return undefined;
  }
  if (options.logFile) {
    return pino({ name: LOGGER_NAME }, pino.destination({ dest: options.logFile, mkdir: true, sync: true }));
  }
  return pino({ name: LOGGER_NAME });
}
