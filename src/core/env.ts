/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type NodeEnv = 'development' | 'production' | 'test';

export interface EnvConfig {
  polygonApiKey: string | null;
  polygonApiEndpoint: string;
  databasePath: string | null;
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  return process.env[name] || undefined;
}

function pick<T extends string>(allowed: readonly T[], raw: string | undefined, fallback: T): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  const endpoint = getEnvVar('POLYGON_API_ENDPOINT') ?? 'https://api.polygon.io';

  return {
    polygonApiKey: getEnvVar('POLYGON_API_KEY') ?? null,
    polygonApiEndpoint: endpoint.replace(/\/+$/, ''),
    databasePath: getEnvVar('DATABASE_PATH') ?? null,
    logLevel: pick(LOG_LEVELS, getEnvVar('LOG_LEVEL'), 'info'),
    nodeEnv: pick(NODE_ENVS, process.env.NODE_ENV, 'development'),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

/** Throws when the upstream key is not configured. */
export function requirePolygonApiKey(): string {
  const key = getEnvConfig().polygonApiKey;
  if (!key) {
    throw new Error('Missing required environment variable: POLYGON_API_KEY');
  }
  return key;
}
