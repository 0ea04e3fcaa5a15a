import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalInt = z
  .string()
  .optional()
  .transform((val) => (val ? parseInt(val, 10) : undefined));

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    DATABASE_URL: z.string().optional(),
    LEDGER_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    JWT_SECRET: z.string().optional(),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    RECONCILE_EPSILON_CENTS: z.coerce.number().int().nonnegative().default(1),
    RECONCILE_WARNING_THRESHOLD_CENTS: z.coerce.number().int().positive().default(10000),
    RECONCILE_CONFIRMATION_THRESHOLD_CENTS: optionalInt,
    FUZZY_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
    ARBITRAGE_MIN_ANNUAL_SAVINGS_CENTS: z.coerce.number().int().nonnegative().default(10000),
    APPEND_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
    APPEND_BACKOFF_MS: z.coerce.number().int().nonnegative().default(50),
  })
  .refine((env) => env.LEDGER_STORE !== 'postgres' || !!env.DATABASE_URL, {
    message: 'DATABASE_URL is required when LEDGER_STORE=postgres',
    path: ['DATABASE_URL'],
  });

export type EnvConfig = z.infer<typeof envSchema>;

export interface AppConfig {
  env: EnvConfig['NODE_ENV'];
  port: number;
  databaseUrl?: string;
  store: EnvConfig['LEDGER_STORE'];
  jwtSecret?: string;
  logLevel: EnvConfig['LOG_LEVEL'];
  reconciliation: {
    epsilonCents: number;
    warningThresholdCents: number;
    confirmationThresholdCents?: number;
    matchThreshold: number;
  };
  optimization: {
    minAnnualSavingsCents: number;
  };
  append: {
    maxAttempts: number;
    backoffMs: number;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    store: env.LEDGER_STORE,
    jwtSecret: env.JWT_SECRET,
    logLevel: env.LOG_LEVEL,
    reconciliation: {
      epsilonCents: env.RECONCILE_EPSILON_CENTS,
      warningThresholdCents: env.RECONCILE_WARNING_THRESHOLD_CENTS,
      confirmationThresholdCents: env.RECONCILE_CONFIRMATION_THRESHOLD_CENTS,
      matchThreshold: env.FUZZY_MATCH_THRESHOLD,
    },
    optimization: {
      minAnnualSavingsCents: env.ARBITRAGE_MIN_ANNUAL_SAVINGS_CENTS,
    },
    append: {
      maxAttempts: env.APPEND_MAX_ATTEMPTS,
      backoffMs: env.APPEND_BACKOFF_MS,
    },
  };
}
