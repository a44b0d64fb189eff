import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_DATABASE_PATH } from './db';

const booleanish = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  ALBUMPORTER_DB_PATH: z.string().min(1).default(DEFAULT_DATABASE_PATH),

  GPHOTOS_PROFILE_DIR: z.string().min(1).default('./.gphotos-profile'),
  GPHOTOS_BASE_URL: z.string().url().default('https://photos.google.com'),
  GPHOTOS_HEADLESS: booleanish.default('false'),
  GPHOTOS_NAV_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  GPHOTOS_WAIT_CEILING_MS: z.coerce.number().int().positive().default(15000),
  GPHOTOS_STABLE_POLLS: z.coerce.number().int().min(1).default(3),

  IMMICH_ENDPOINT: z.string().url().default('http://localhost:2283'),
  IMMICH_API_KEY: z.string().min(1).optional(),
  IMMICH_EMAIL_DOMAIN: z.string().min(1).default('immich.local'),
  IMMICH_DEFAULT_PASSWORD: z.string().min(1).default('change-me'),
  IMMICH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  LOG_LEVEL: z.string().optional(),
  LOG_FORMAT: z.enum(['text', 'json']).default('text'),
});

/** Environment-style overrides, typically from CLI flags */
export type ConfigOverrides = Partial<Record<keyof z.input<typeof EnvSchema>, string>>;

export interface SourceConfig {
  profileDir: string;
  baseUrl: string;
  headless: boolean;
  navigationTimeoutMs: number;
  waitCeilingMs: number;
  stablePolls: number;
}

export interface DestinationConfig {
  endpoint: string;
  apiKey: string | null;
  emailDomain: string;
  defaultPassword: string;
  timeoutMs: number;
}

export interface AppConfig {
  databasePath: string;
  source: SourceConfig;
  destination: DestinationConfig;
  logLevel: string | undefined;
  logFormat: 'text' | 'json';
}

/**
 * Read configuration from the environment (and .env). Values in `overrides`
 * come from CLI flags and take precedence.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  if (env === process.env) {
    dotenv.config();
  }

  // Blank values count as unset
  const merged: Record<string, string> = {};
  for (const [key, value] of [...Object.entries(env), ...Object.entries(overrides)]) {
    if (value !== undefined && value !== '') merged[key] = value;
  }

  const parsed = EnvSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    databasePath: e.ALBUMPORTER_DB_PATH,
    source: {
      profileDir: e.GPHOTOS_PROFILE_DIR,
      baseUrl: e.GPHOTOS_BASE_URL.replace(/\/+$/, ''),
      headless: e.GPHOTOS_HEADLESS,
      navigationTimeoutMs: e.GPHOTOS_NAV_TIMEOUT_MS,
      waitCeilingMs: e.GPHOTOS_WAIT_CEILING_MS,
      stablePolls: e.GPHOTOS_STABLE_POLLS,
    },
    destination: {
      endpoint: e.IMMICH_ENDPOINT.replace(/\/+$/, ''),
      apiKey: e.IMMICH_API_KEY ?? null,
      emailDomain: e.IMMICH_EMAIL_DOMAIN,
      defaultPassword: e.IMMICH_DEFAULT_PASSWORD,
      timeoutMs: e.IMMICH_TIMEOUT_MS,
    },
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT,
  };
}

export function requireApiKey(config: DestinationConfig): string {
  if (!config.apiKey) {
    throw new ConfigError('IMMICH_API_KEY is not set (use --api-key or the environment)');
  }
  return config.apiKey;
}
