/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

function parseLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isDev = env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test';

  return {
    level: parseLevel(env.LOG_LEVEL),
    pretty: env.LOG_PRETTY === 'true' || (isDev && env.LOG_PRETTY !== 'false'),
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number(env.LOG_ROTATE_DAYS || 14),
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,headers.Authorization,apiKey,api_key,token,secret,credential')
      .split(',').map(f => f.trim()).filter(f => f.length > 0),
  };
}
