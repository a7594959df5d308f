import { z } from 'zod';
import type { Config, Credentials } from './types.js';
import { COOKIE_DOMAINS, DEFAULT_LABELS, URLS } from './xserver/selectors.js';

type Env = Record<string, string | undefined>;

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

function getEnvOrNull(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return getEnvOrNull(env, key) ?? defaultValue;
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = getEnvOrNull(env, key)?.toLowerCase();
  if (value === undefined) return defaultValue;
  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  return defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = getEnvOrNull(env, key);
  if (value === null) return defaultValue;
  // NaN is left for the schema to reject
  return Number(value);
}

const LabelListSchema = z.array(z.string().min(1)).min(1);

const ConfigSchema = z.object({
  credentials: z
    .object({
      email: z.string().min(1),
      password: z.string().min(1),
    })
    .nullable(),
  cookie: z.string().min(1).nullable(),
  cookieDomains: LabelListSchema,
  targetGame: z.string().min(1).nullable(),
  renewHours: z.number().int().positive(),
  minIntervalHours: z.number().nonnegative(),
  forceRenew: z.boolean(),
  outcomeLogPath: z.string().min(1),
  logTimezone: z.string().min(1),
  headless: z.boolean(),
  defaultTimeoutMs: z.number().int().positive(),
  shortTimeoutMs: z.number().int().positive(),
  screenshotDir: z.string().min(1),
  pageDumpDir: z.string().min(1),
  strictSuccessDetection: z.boolean(),
  loginUrl: z.string().url(),
  indexUrl: z.string().url(),
  labels: z.object({
    loginMarkers: LabelListSchema,
    loginButton: LabelListSchema,
    emailLabels: LabelListSchema,
    passwordLabels: LabelListSchema,
    managementAction: z.string().min(1),
    upgrade: LabelListSchema,
    detail: LabelListSchema,
    contract: LabelListSchema,
    extendEntry: LabelListSchema,
    agreementKeywords: LabelListSchema,
    confirm: LabelListSchema,
    submit: LabelListSchema,
    success: LabelListSchema,
  }),
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

function readCredentials(env: Env): Credentials | null {
  const email = getEnvOrNull(env, 'XSERVER_EMAIL');
  const password = getEnvOrNull(env, 'XSERVER_PASSWORD');
  if (!email || !password) return null;
  return { email, password };
}

/**
 * Builds the run configuration from environment variables.
 * The result is validated and frozen; components receive it explicitly.
 */
export function loadConfig(env: Env = process.env): Readonly<Config> {
  const raw = {
    credentials: readCredentials(env),
    cookie: getEnvOrNull(env, 'XSERVER_COOKIE'),
    cookieDomains: getEnvOrDefault(env, 'XSERVER_COOKIE_DOMAINS', COOKIE_DOMAINS.join(','))
      .split(',')
      .map((d) => d.trim().toLowerCase())
      .filter((d) => d.length > 0),
    targetGame: getEnvOrNull(env, 'TARGET_GAME'),
    renewHours: getEnvNumber(env, 'RENEW_HOURS', 72),
    minIntervalHours: getEnvNumber(env, 'MIN_INTERVAL_HOURS', 24),
    forceRenew: getEnvBool(env, 'FORCE_RENEW', false),
    outcomeLogPath: getEnvOrDefault(env, 'RENEW_LOG_MD', 'renew_result.md'),
    logTimezone: getEnvOrDefault(env, 'LOG_TIMEZONE', 'Asia/Tokyo'),
    headless: getEnvBool(env, 'HEADLESS', true),
    defaultTimeoutMs: getEnvNumber(env, 'PLAYWRIGHT_TIMEOUT_MS', 15000),
    shortTimeoutMs: getEnvNumber(env, 'SHORT_TIMEOUT_MS', 4000),
    screenshotDir: getEnvOrDefault(env, 'SCREENSHOT_DIR', 'screenshots'),
    pageDumpDir: getEnvOrDefault(env, 'PAGE_DUMP_DIR', 'pages'),
    strictSuccessDetection: getEnvBool(env, 'STRICT_SUCCESS_DETECTION', false),
    loginUrl: getEnvOrDefault(env, 'XSERVER_LOGIN_URL', URLS.LOGIN),
    indexUrl: getEnvOrDefault(env, 'XSERVER_INDEX_URL', URLS.GAME_INDEX),
    labels: DEFAULT_LABELS,
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return Object.freeze({ ...parsed.data, labels: Object.freeze(parsed.data.labels) });
}
