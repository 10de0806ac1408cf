/**
 * Server configuration read from environment variables (after dotenv has
 * loaded `.env`). Invalid numeric values fail startup instead of silently
 * falling back.
 */

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  prettyLogs: boolean;        // pino-pretty transport, development only
  maxRangeLimit: number;      // Upper bound for `limit` on range queries
  seedDemoIndex: boolean;     // Create a small example index at startup
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readBool(env: Env, name: string): boolean {
  const raw = env[name];
  return raw === 'true' || raw === '1';
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const production = env['NODE_ENV'] === 'production';
  const hideLogs = Boolean(env['HIDE_LOGS']);

  return {
    port: readInt(env, 'PORT', 3001, 0),
    host: env['HOST'] || '0.0.0.0',
    logLevel: env['LOG_LEVEL'] || (production || hideLogs ? 'warn' : 'info'),
    prettyLogs: env['NODE_ENV'] === 'development' && !hideLogs,
    maxRangeLimit: readInt(env, 'MAX_RANGE_LIMIT', 1000, 1),
    seedDemoIndex: readBool(env, 'SEED_DEMO_INDEX')
  };
}
