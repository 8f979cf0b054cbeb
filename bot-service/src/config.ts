/**
 * Service Configuration
 *
 * Environment variables validated with zod. `getConfig()` throws a
 * ConfigError listing every invalid variable.
 */

import { z } from 'zod';

// =============================================================================
// Schema
// =============================================================================

const adminIdsSchema = z
  .string()
  .default('')
  .transform((value, ctx) => {
    const ids: number[] = [];
    for (const part of value.split(',')) {
      const trimmed = part.trim();
      if (!trimmed) continue;
      if (!/^\d+$/.test(trimmed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid admin id '${trimmed}'` });
        return z.NEVER;
      }
      ids.push(Number(trimmed));
    }
    return ids;
  });

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  WEBAPP_URL: z.string().url().default('https://example.com/webapp/'),
  ADMIN_IDS: adminIdsSchema,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  NAV_STACK_MAX_DEPTH: z.coerce.number().int().min(2).max(256).default(32),
  BOUQUET_BASE_PRICE: z.coerce.number().int().min(0).default(2000),
});

// =============================================================================
// Types
// =============================================================================

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface Config {
  telegram: {
    botToken: string;
    webAppUrl: string;
  };
  /** Telegram user ids allowed into the admin area; empty allows everyone */
  adminIds: number[];
  logLevel: LogLevel;
  nodeEnv: 'development' | 'production' | 'test';
  navigation: {
    maxStackDepth: number;
  };
  bouquet: {
    basePrice: number;
  };
}

export interface ConfigErrorDetail {
  variable: string;
  message: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly details: ConfigErrorDetail[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Parse configuration from the environment.
 *
 * @throws ConfigError if any variable is missing or malformed
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      variable: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid configuration: ${details.map((d) => `${d.variable}: ${d.message}`).join('; ')}`,
      details
    );
  }

  const parsed = result.data;
  return {
    telegram: {
      botToken: parsed.TELEGRAM_BOT_TOKEN,
      webAppUrl: parsed.WEBAPP_URL,
    },
    adminIds: parsed.ADMIN_IDS,
    logLevel: parsed.LOG_LEVEL,
    nodeEnv: parsed.NODE_ENV,
    navigation: {
      maxStackDepth: parsed.NAV_STACK_MAX_DEPTH,
    },
    bouquet: {
      basePrice: parsed.BOUQUET_BASE_PRICE,
    },
  };
}
