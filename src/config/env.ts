import type {LevelWithSilent} from 'pino';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  databaseUrl?: string;
  databaseName?: string;
  turnstileSecret?: string;
  // undefined means "reflect any origin"
  corsOrigins?: string[];
  trustProxy: number;
  sentryDsn?: string;
  logLevel: LevelWithSilent;
}

const LOG_LEVELS: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function read_int(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number {
  const value = read(env, key);

  if (typeof value === 'undefined' || isNaN(+value) || +value < 0) {
    return fallback;
  }

  return Math.floor(+value);
}

function read_log_level(env: NodeJS.ProcessEnv, nodeEnv: string) {
  const value = read(env, 'LOG_LEVEL');
  const level = LOG_LEVELS.find(l => l === value);

  if (level) return level;

  return nodeEnv === 'test' ? 'silent' : 'info';
}

export function load_config(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = read(env, 'NODE_ENV') ?? 'development';
  const corsOrigins = read(env, 'CORS_ORIGINS')
    ?.split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

  return {
    port: read_int(env, 'PORT', 8000),
    nodeEnv,
    databaseUrl: read(env, 'DATABASE_URL'),
    databaseName: read(env, 'DATABASE_NAME'),
    turnstileSecret: read(env, 'TURNSTILE_SECRET_KEY'),
    corsOrigins: corsOrigins?.length ? corsOrigins : undefined,
    trustProxy: read_int(env, 'TRUST_PROXY', 0),
    sentryDsn: read(env, 'SENTRY_DSN'),
    logLevel: read_log_level(env, nodeEnv),
  };
}
