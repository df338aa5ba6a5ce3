import { LogLevel } from '@nestjs/common';
import { registerAs } from '@nestjs/config';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

export interface AppConfig {
  port: number;
  logLevels: LogLevel[];
}

/** Enabled levels up to and including the configured one, e.g. "warn" -> [error, warn]. */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === (level ?? 'log').trim().toLowerCase());
  return LOG_LEVELS.slice(0, index === -1 ? LOG_LEVELS.indexOf('log') + 1 : index + 1);
}

export const appConfig = registerAs(
  'app',
  (): AppConfig => ({
    port: parseInt(process.env.PORT ?? '3000', 10),
    logLevels: resolveLogLevels(process.env.LOG_LEVEL),
  }),
);
