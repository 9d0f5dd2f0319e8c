import { LogLayer, ConsoleTransport, LogLevel } from 'loglayer';

import { loadEnvironmentConfig } from './config.ts';

export const log = new LogLayer({
  transport: new ConsoleTransport({
    logger: console,
  }),
});

log.setLevel(loadEnvironmentConfig().logLevel);

export function isValidLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}
