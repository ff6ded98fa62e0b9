import dotenv from 'dotenv';
import { IANAZone } from 'luxon';
import { z } from 'zod';
import { MAX_ROWS_PER_PAGE } from './services/reportAssembler';

dotenv.config();

const numeric = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((v) => v.trim() !== '' && Number.isFinite(Number(v)), { message: 'must be a number' })
    .transform(Number);

const list = z
  .string()
  .optional()
  .transform((v) =>
    v
      ? v
          .split(',')
          .map((s) => s.trim())
          .filter(Boolean)
      : []
  );

/**
 * Environment variable schema. Validated once at startup by loadConfig().
 */
const envSchema = z
  .object({
    // Server
    PORT: numeric('3000'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    ALLOWED_ORIGINS: list,

    // Database
    DATABASE_URL: z.string().optional(),

    // Exported artifacts + static file server
    BASE_URL: z.string().url().default('http://localhost:8000'),
    EXPORT_DIR: z.string().min(1).default('static'),
    STATIC_PATH: z
      .string()
      .regex(/^\/[A-Za-z0-9/_-]*$/, 'must start with "/"')
      .default('/static'),

    // Reporting window
    DEFAULT_TIMEZONE: z
      .string()
      .default('Asia/Jakarta')
      .refine((zone) => IANAZone.isValidZone(zone), { message: 'must be an IANA timezone' }),
    DEFAULT_WINDOW_DAYS: numeric('7'),
    MAX_WINDOW_DAYS: numeric('31'),
    REPORT_ROWS_PER_PAGE: numeric('28').refine((v) => Number.isInteger(v) && v >= 3 && v <= MAX_ROWS_PER_PAGE, {
      message: `must be a whole number between 3 and ${MAX_ROWS_PER_PAGE}`,
    }),

    // Calorie estimate for breast milk when the user has no own setting
    ASI_KCAL_PER_ML: numeric('0.67'),

    // Feature flags
    DISABLED_FEATURES: list,
  })
  .refine((env) => env.NODE_ENV === 'test' || Boolean(env.DATABASE_URL), {
    message: 'DATABASE_URL is required',
    path: ['DATABASE_URL'],
  })
  .refine((env) => env.DEFAULT_WINDOW_DAYS >= 1 && env.DEFAULT_WINDOW_DAYS <= env.MAX_WINDOW_DAYS, {
    message: 'DEFAULT_WINDOW_DAYS must be between 1 and MAX_WINDOW_DAYS',
    path: ['DEFAULT_WINDOW_DAYS'],
  });

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: Env['NODE_ENV'];
  allowedOrigins: string[];
  databaseUrl: string | undefined;
  export: {
    rootDir: string;
    baseUrl: string;
    publicPath: string;
  };
  reporting: {
    timezone: string;
    defaultWindowDays: number;
    maxWindowDays: number;
    rowsPerPage: number;
    asiKcalPerMl: number;
  };
  disabledFeatures: string[];
}

export function toAppConfig(env: Env): AppConfig {
  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    allowedOrigins: env.ALLOWED_ORIGINS,
    databaseUrl: env.DATABASE_URL,
    export: {
      rootDir: env.EXPORT_DIR,
      baseUrl: env.BASE_URL.replace(/\/+$/, ''),
      publicPath: env.STATIC_PATH.replace(/\/+$/, '') || '/static',
    },
    reporting: {
      timezone: env.DEFAULT_TIMEZONE,
      defaultWindowDays: env.DEFAULT_WINDOW_DAYS,
      maxWindowDays: env.MAX_WINDOW_DAYS,
      rowsPerPage: env.REPORT_ROWS_PER_PAGE,
      asiKcalPerMl: env.ASI_KCAL_PER_ML,
    },
    disabledFeatures: env.DISABLED_FEATURES,
  };
}

/**
 * Validates environment variables and maps them to the app config.
 * Throws if required variables are missing or invalid.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('Environment validation failed:');
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join('.')}: ${error.message}`);
    }
    throw new Error('Invalid environment configuration. See errors above.');
  }

  const env = result.data;

  if (env.DISABLED_FEATURES.length > 0) {
    console.warn(`[Config] Disabled features: ${env.DISABLED_FEATURES.join(', ')}`);
  }

  return toAppConfig(env);
}

export default loadConfig;
