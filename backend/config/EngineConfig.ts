import { invalidInput } from '../reliability/DomainError';

export type EngineConfig = {
  cacheTtlSeconds: number;
  cacheMaxEntries: number;
  /** null: seed derived from the clock when the engine is created. */
  traceSeed: number | null;
  environment: string;
  telemetryEnabled: boolean;
  telemetryStructuredLogs: boolean;
  telemetryMaxEvents: number;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  cacheTtlSeconds: 60,
  cacheMaxEntries: 10_000,
  traceSeed: null,
  environment: 'prod',
  telemetryEnabled: true,
  telemetryStructuredLogs: true,
  telemetryMaxEvents: 2000,
};

type Env = Record<string, string | undefined>;

const read = (env: Env, name: string): string => String(env[name] ?? '').trim();

const readNumber = (
  env: Env,
  name: string,
  fallback: number,
  opts: { min: number; integer?: boolean },
): number => {
  const raw = read(env, name);
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < opts.min)
    throw invalidInput(`${name} must be a number >= ${opts.min}.`, { value: raw });
  if (opts.integer && !Number.isInteger(value))
    throw invalidInput(`${name} must be an integer.`, { value: raw });
  return value;
};

const readFlag = (env: Env, name: string, fallback: boolean): boolean => {
  const raw = read(env, name).toLowerCase();
  if (!raw) return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes';
};

/**
 * Reads engine settings from environment variables.
 *
 * | Variable                        | Default |
 * | ------------------------------- | ------- |
 * | `ARCHMAP_CACHE_TTL_SECONDS`     | 60      |
 * | `ARCHMAP_CACHE_MAX_ENTRIES`     | 10000   |
 * | `ARCHMAP_TRACE_SEED`            | unset   |
 * | `ARCHMAP_ENVIRONMENT`           | prod    |
 * | `ARCHMAP_TELEMETRY`             | on      |
 * | `ARCHMAP_TELEMETRY_LOGS`        | on      |
 * | `ARCHMAP_TELEMETRY_MAX_EVENTS`  | 2000    |
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const seedRaw = read(env, 'ARCHMAP_TRACE_SEED');

  return {
    cacheTtlSeconds: readNumber(
      env,
      'ARCHMAP_CACHE_TTL_SECONDS',
      DEFAULT_ENGINE_CONFIG.cacheTtlSeconds,
      { min: 1 },
    ),
    cacheMaxEntries: readNumber(
      env,
      'ARCHMAP_CACHE_MAX_ENTRIES',
      DEFAULT_ENGINE_CONFIG.cacheMaxEntries,
      { min: 1, integer: true },
    ),
    traceSeed: seedRaw
      ? readNumber(env, 'ARCHMAP_TRACE_SEED', 0, { min: 0, integer: true })
      : null,
    environment:
      read(env, 'ARCHMAP_ENVIRONMENT') || DEFAULT_ENGINE_CONFIG.environment,
    telemetryEnabled: readFlag(
      env,
      'ARCHMAP_TELEMETRY',
      DEFAULT_ENGINE_CONFIG.telemetryEnabled,
    ),
    telemetryStructuredLogs: readFlag(
      env,
      'ARCHMAP_TELEMETRY_LOGS',
      DEFAULT_ENGINE_CONFIG.telemetryStructuredLogs,
    ),
    telemetryMaxEvents: readNumber(
      env,
      'ARCHMAP_TELEMETRY_MAX_EVENTS',
      DEFAULT_ENGINE_CONFIG.telemetryMaxEvents,
      { min: 100, integer: true },
    ),
  };
}
