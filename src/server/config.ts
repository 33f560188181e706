/**
 * Server configuration, read once from environment variables at startup.
 *
 * Variables:
 * - PORT / HOST: listen address
 * - LOG_LEVEL: pino level
 * - STORAGE_TYPE: 'memory' | 'redis'
 * - REDIS_URL: Redis connection URL
 * - STORAGE_TTL: seconds a stored game lives after its last write
 * - IDEMPOTENCY_TTL: seconds a committed action result can be replayed
 * - TURN_GUARD_TTL_MS: lifetime of a Redis turn guard left by an abandoned request
 * - CITY_REGEN_NORMAL / CITY_REGEN_UNDER_SIEGE: city hp regained at end of turn
 * - RESOURCE_STORAGE_CAP: most of one resource a city can hold
 * - CLIENT_ORIGIN: allowed CORS origin (reflects the request origin when unset)
 */

import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  PORT: positiveInt(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  STORAGE_TYPE: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  STORAGE_TTL: positiveInt(86400),
  IDEMPOTENCY_TTL: positiveInt(3600),
  TURN_GUARD_TTL_MS: positiveInt(30000),
  CITY_REGEN_NORMAL: nonNegativeInt(4),
  CITY_REGEN_UNDER_SIEGE: nonNegativeInt(2),
  RESOURCE_STORAGE_CAP: positiveInt(100),
  CLIENT_ORIGIN: z.string().min(1).optional(),
});

export interface AppConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  storage: {
    type: 'memory' | 'redis';
    url: string;
    ttl: number;
  };
  idempotencyTtl: number;
  turnGuardTtlMs: number;
  cityRegenNormal: number;
  cityRegenUnderSiege: number;
  resourceStorageCap: number;
  /** `true` reflects the request origin */
  clientOrigin: string | true;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and check the environment. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    storage: { type: e.STORAGE_TYPE, url: e.REDIS_URL, ttl: e.STORAGE_TTL },
    idempotencyTtl: e.IDEMPOTENCY_TTL,
    turnGuardTtlMs: e.TURN_GUARD_TTL_MS,
    cityRegenNormal: e.CITY_REGEN_NORMAL,
    cityRegenUnderSiege: e.CITY_REGEN_UNDER_SIEGE,
    resourceStorageCap: e.RESOURCE_STORAGE_CAP,
    clientOrigin: e.CLIENT_ORIGIN ?? true,
  };
}
