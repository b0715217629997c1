import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z
  .object({
    PRICE_STORE: z.enum(['file', 'supabase']).default('file'),
    PRICE_DATA_FILE: z.string().min(1).default('price_data.json'),
    SUPABASE_URL: optionalText.pipe(z.string().url().optional()),
    SUPABASE_SERVICE_ROLE_KEY: optionalText,
    SUPABASE_BUCKET: z.string().min(1).default('pricewatch'),
    SUPABASE_OBJECT_KEY: z.string().min(1).default('price_data.json'),
    RESEND_API_KEY: optionalText,
    ALERT_TO: optionalText,
    EMAIL_FROM: z
      .string()
      .min(1)
      .default('Price Watcher <alerts@pricewatch.local>'),
    FETCH_TIMEOUT_MS: positiveInt(15_000),
    REDIRECT_TIMEOUT_MS: positiveInt(10_000),
    RENDER_TIMEOUT_MS: positiveInt(30_000),
    SELECTOR_WAIT_MS: positiveInt(5_000),
    HEADLESS: z.enum(['true', 'false']).default('true'),
    DEBUG_SCREENSHOT_DIR: z.string().min(1).default('debug-screenshots'),
    DEBUG_SCREENSHOT_LIMIT: z.coerce.number().int().min(0).default(5),
  })
  .superRefine((env, ctx) => {
    if (env.PRICE_STORE !== 'supabase') {
      return;
    }
    for (const key of ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'required when PRICE_STORE=supabase',
        });
      }
    }
  });

export type StoreConfig =
  | { backend: 'file'; path: string }
  | {
      backend: 'supabase';
      url: string;
      serviceRoleKey: string;
      bucket: string;
      objectKey: string;
    };

export interface EmailConfig {
  apiKey: string;
  from: string;
  to: string[];
}

export interface PricerConfig {
  store: StoreConfig;
  /** null when alerts are not configured */
  email: EmailConfig | null;
  fetchTimeoutMs: number;
  redirectTimeoutMs: number;
  renderTimeoutMs: number;
  selectorWaitMs: number;
  headless: boolean;
  debugScreenshotDir: string;
  debugScreenshotLimit: number;
}

function parseRecipients(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((address) => address.trim())
    .filter((address) => address.length > 0);
}

/**
 * Build the pricer configuration from environment variables.
 * Throws ConfigError naming every invalid variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): PricerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }

  const values = parsed.data;

  let store: StoreConfig = { backend: 'file', path: values.PRICE_DATA_FILE };
  if (
    values.PRICE_STORE === 'supabase' &&
    values.SUPABASE_URL &&
    values.SUPABASE_SERVICE_ROLE_KEY
  ) {
    store = {
      backend: 'supabase',
      url: values.SUPABASE_URL,
      serviceRoleKey: values.SUPABASE_SERVICE_ROLE_KEY,
      bucket: values.SUPABASE_BUCKET,
      objectKey: values.SUPABASE_OBJECT_KEY,
    };
  }

  const recipients = parseRecipients(values.ALERT_TO);
  const email =
    values.RESEND_API_KEY && recipients.length > 0
      ? {
          apiKey: values.RESEND_API_KEY,
          from: values.EMAIL_FROM,
          to: recipients,
        }
      : null;

  return {
    store,
    email,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    redirectTimeoutMs: values.REDIRECT_TIMEOUT_MS,
    renderTimeoutMs: values.RENDER_TIMEOUT_MS,
    selectorWaitMs: values.SELECTOR_WAIT_MS,
    headless: values.HEADLESS === 'true',
    debugScreenshotDir: values.DEBUG_SCREENSHOT_DIR,
    debugScreenshotLimit: values.DEBUG_SCREENSHOT_LIMIT,
  };
}

/**
 * Load `.env.local` then `.env` into process.env and parse it
 */
export function loadConfig(): PricerConfig {
  dotenv.config({ path: '.env.local' });
  dotenv.config();
  return parseConfig(process.env);
}
