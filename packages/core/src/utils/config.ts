import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
dotenv.config();

/** Longest render period, in seconds. Twice this still fits a Node timer delay. */
export const MAX_UPDATE_PERIOD = 3600;

const ConfigSchema = z.object({
  aggregator: z.object({
    host: z.string().min(1).default('127.0.0.1'),
    updatePeriod: z.number().positive().max(MAX_UPDATE_PERIOD).default(1.0),
    updatePolicy: z.enum(['max', 'overwrite']).default('max'),
  }),
  reporter: z.object({
    flushOnClose: z.boolean().default(true),
  }),
  debug: z.object({
    verbose: z.boolean().default(false),
  }),
});
type Config = z.infer<typeof ConfigSchema>;

const ENV_MAP: Record<string, string> = {
  PARLOOP_HOST: 'aggregator.host',
  PARLOOP_UPDATE_PERIOD: 'aggregator.updatePeriod',
  PARLOOP_UPDATE_POLICY: 'aggregator.updatePolicy',
  PARLOOP_FLUSH_ON_CLOSE: 'reporter.flushOnClose',
  VERBOSE: 'debug.verbose',
};

type Coercer = (raw: string) => unknown;

const toNumber: Coercer = (raw) => {
  const n = parseFloat(raw);
  return isNaN(n) ? raw : n;
};
const toBoolean: Coercer = (raw) => raw.toLowerCase() === 'true';
const identity: Coercer = (raw) => raw;

const COERCE_MAP: Record<string, Coercer> = {
  'aggregator.updatePeriod': toNumber,
  'reporter.flushOnClose': toBoolean,
  'debug.verbose': toBoolean,
};

function setNestedValue(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const [section, key] = dotPath.split('.');
  if (!section || !key) return;
  const existing = obj[section];
  const target: Record<string, unknown> =
    typeof existing === 'object' && existing !== null ? { ...existing } : {};
  target[key] = value;
  obj[section] = target;
}

export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): Record<string, unknown> {
  const config: Record<string, unknown> = {
    aggregator: {},
    reporter: {},
    debug: {},
  };

  for (const [envVar, dotPath] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined) continue;
    const coerce = COERCE_MAP[dotPath] ?? identity;
    setNestedValue(config, dotPath, coerce(raw));
  }

  return config;
}

export function createConfig(env: Record<string, string | undefined> = process.env): Config {
  try {
    return ConfigSchema.parse(loadConfigFromEnv(env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const summary = error.issues
        .map((issue, idx) => `${String(idx + 1)}. ${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Config validation failed: ${summary}`, 'validation');
    }
    throw error;
  }
}

export type { Config };
export const CONFIG = createConfig();
