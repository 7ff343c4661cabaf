import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { IANAZone } from 'luxon';
import { z } from 'zod';

const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), 'migrations');
const DEFAULT_BUSINESS_HOURS_FILE = path.resolve(process.cwd(), 'config/business-hours.json');

loadDotenv();

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined;
    return value !== 'false';
  });

const configSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    STORE_DRIVER: z.enum(['postgres', 'in-memory']).default('postgres'),
    DATABASE_URL: z.string().optional(),
    DATABASE_MAX_POOL: z.coerce.number().int().positive().optional(),
    LOG_LEVEL: z.string().default('info'),
    MIGRATIONS_DIR: z.string().optional(),
    SERVICE_NAME: z.string().default('appointment-scheduling'),
    BUSINESS_TIMEZONE: z
      .string()
      .default('UTC')
      .refine((zone) => IANAZone.isValidZone(zone), 'BUSINESS_TIMEZONE must be an IANA zone'),
    BUSINESS_HOURS_FILE: z.string().optional(),
    DEFAULT_DURATION_MINUTES: z.coerce.number().int().positive().default(30),
    DEFAULT_STEP_MINUTES: z.coerce.number().int().positive().default(15),
    DEFAULT_BUFFER_MINUTES: z.coerce.number().int().nonnegative().default(0),
    STATUS_TRANSITION_POLICY: z.enum(['permissive', 'strict']).default('permissive'),
    TRACING_EXPORT_JSON: booleanFlag,
    METRICS_ENABLED: booleanFlag
  })
  .superRefine((values, ctx) => {
    if (values.STORE_DRIVER === 'postgres' && !values.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORE_DRIVER is postgres'
      });
    }
  })
  .transform((values) => ({
    ...values,
    MIGRATIONS_DIR: values.MIGRATIONS_DIR ?? DEFAULT_MIGRATIONS_DIR,
    BUSINESS_HOURS_FILE: values.BUSINESS_HOURS_FILE ?? DEFAULT_BUSINESS_HOURS_FILE,
    METRICS_ENABLED: values.METRICS_ENABLED ?? true,
    DATABASE_MAX_POOL: values.DATABASE_MAX_POOL ?? 10,
    TRACING_EXPORT_JSON: values.TRACING_EXPORT_JSON ?? false
  }));

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super('Invalid configuration');
    this.name = 'ConfigError';
  }
}

let cachedConfig: AppConfig | null = null;

function parseEnvironment(
  source: NodeJS.ProcessEnv,
  { exitOnError }: { exitOnError: boolean }
): AppConfig {
  const result = configSchema.safeParse(source);

  if (!result.success) {
    if (exitOnError) {
      // eslint-disable-next-line no-console
      console.error('Invalid configuration', result.error.flatten().fieldErrors);
      process.exit(1);
    }

    throw new ConfigError(result.error.issues);
  }

  return Object.freeze(result.data);
}

export function loadConfig(overrides?: Partial<NodeJS.ProcessEnv>): AppConfig {
  if (overrides) {
    return parseEnvironment(
      {
        ...process.env,
        ...overrides
      },
      { exitOnError: false }
    );
  }

  if (!cachedConfig) {
    cachedConfig = parseEnvironment(process.env, { exitOnError: true });
  }

  return cachedConfig;
}

export const config = loadConfig();
