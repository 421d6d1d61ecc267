import dotenv from 'dotenv';
import { existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError, formatZodIssues } from './core/errors.js';
import { parseZone } from './core/time_parser.js';
import { emailSchema } from './core/validation.js';
import { DB } from './db/db.js';
import { getConfigAll, setConfig, unsetConfig } from './db/repo.js';

type Env = Record<string, string | undefined>;

// `KEY=` in a .env file means "not set"
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema);

const boolish = z
  .string()
  .transform((v) => ['true', '1', 'yes', 'on'].includes(v.trim().toLowerCase()));

const pathsSchema = z.object({
  MAILCTL_DB: optional(z.string().default('./data/mailctl.db')),
  TEMPLATE_DIR: optional(z.string().default('./templates')),
  SCHEDULER_TIMEZONE: optional(
    z
      .string()
      .default('UTC')
      .superRefine((zone, ctx) => {
        try {
          parseZone(zone);
        } catch (err) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
        }
      })
  ),
});

const smtpSchema = z.object({
  SMTP_HOST: optional(z.string({ required_error: 'SMTP_HOST is required' })),
  SMTP_PORT: optional(z.coerce.number().int().min(1).max(65535).default(587)),
  SMTP_USERNAME: optional(z.string({ required_error: 'SMTP_USERNAME is required' })),
  SMTP_PASSWORD: optional(z.string({ required_error: 'SMTP_PASSWORD is required' })),
  SMTP_SECURE: optional(boolish.default('false')),
  SMTP_TIMEOUT: optional(z.coerce.number().positive().default(30)),
  SENDER_NAME: optional(z.string({ required_error: 'SENDER_NAME is required' })),
  SENDER_EMAIL: optional(emailSchema),
  REPLY_TO_EMAIL: optional(emailSchema.optional()),
});

export interface Paths {
  dbPath: string;
  templateDir: string;
  timezone: string;
}

export interface SmtpConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  secure: boolean;
  timeoutSec: number;
  sender: { name: string; email: string; replyTo: string };
}

/**
 * Load `.env` from the working directory, its parent, or ~/.mailctl/.env.
 * Values already in the environment win.
 */
export function loadEnvFile(cwd = process.cwd()) {
  const candidates = [path.join(cwd, '.env'), path.join(cwd, '..', '.env'), path.join(os.homedir(), '.mailctl', '.env')];
  const found = candidates.find((p) => existsSync(p));
  if (found) dotenv.config({ path: found });
  return found ?? null;
}

export function loadPaths(env: Env = process.env): Paths {
  const res = pathsSchema.safeParse(env);
  if (!res.success) throw new ConfigurationError(formatZodIssues(res.error).join('\n'));
  return {
    dbPath: res.data.MAILCTL_DB,
    templateDir: res.data.TEMPLATE_DIR,
    timezone: res.data.SCHEDULER_TIMEZONE,
  };
}

/** SMTP relay and sender identity. Every missing value is reported at once. */
export function loadSmtpConfig(env: Env = process.env): SmtpConfig {
  const res = smtpSchema.safeParse(env);
  if (!res.success) {
    throw new ConfigurationError(
      `Missing or invalid configuration:\n  ${formatZodIssues(res.error).join('\n  ')}\n` +
        `Add them to your .env file (see .env.example).`
    );
  }
  const e = res.data;
  return {
    host: e.SMTP_HOST,
    port: e.SMTP_PORT,
    username: e.SMTP_USERNAME,
    password: e.SMTP_PASSWORD,
    secure: e.SMTP_SECURE,
    timeoutSec: e.SMTP_TIMEOUT,
    sender: { name: e.SENDER_NAME, email: e.SENDER_EMAIL, replyTo: e.REPLY_TO_EMAIL ?? e.SENDER_EMAIL },
  };
}

const int = (min: number) => z.coerce.number().int().min(min);

/** Runtime tunables, stored in the `config` table. */
export const settingsSchema = z.object({
  rate_per_minute: int(1).default(8),
  burst: int(1).optional(),
  window_ms: int(1).default(60_000),
  max_attempts: int(1).default(4),
  backoff_base_ms: int(1).default(60_000),
  backoff_max_ms: int(1).default(3_600_000),
  backoff_jitter: z.coerce.number().min(0).max(0.99).default(0.2),
  batch_size: int(1).default(50),
  poll_interval_ms: int(10).default(1_000),
  concurrency: int(1).max(16).default(1),
  recovery_policy: z.enum(['requeue', 'fail']).default('requeue'),
  invalid_rows: z.enum(['record', 'skip']).default('record'),
});

export type Settings = z.infer<typeof settingsSchema>;

export const SETTING_KEYS = Object.keys(settingsSchema.shape);

export function parseSettings(raw: Record<string, string>): Settings {
  const res = settingsSchema.safeParse(raw);
  if (!res.success) throw new ConfigurationError(formatZodIssues(res.error).join('\n'));
  if (res.data.backoff_max_ms < res.data.backoff_base_ms) {
    throw new ConfigurationError('backoff_max_ms must be at least backoff_base_ms');
  }
  return res.data;
}

export function loadSettings(db: DB): Settings {
  return parseSettings(getConfigAll(db));
}

/** Validate and store one setting; an empty value resets it to the default. */
export function updateSetting(db: DB, key: string, value: string) {
  if (!SETTING_KEYS.includes(key)) {
    throw new ConfigurationError(`Unknown setting '${key}'. Known: ${SETTING_KEYS.join(', ')}`);
  }
  if (value.trim() === '') {
    unsetConfig(db, key);
    return;
  }
  parseSettings({ ...getConfigAll(db), [key]: value });
  setConfig(db, key, value.trim());
}
