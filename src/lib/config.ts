import { z } from 'zod';

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const booleanFlag = z.preprocess(
  emptyToUndefined,
  z.enum(['true', 'false']).default('false').transform((value) => value === 'true')
);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:3001'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  STORE_BACKEND: z.enum(['redis', 'memory']).default('redis'),
  REDIS_URL: z.string().default('redis://localhost:6379'),

  OPENAI_API_KEY: z.string().default(''),
  OPENAI_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  LLM_MODEL: z.string().min(1).default('gpt-4.1-mini'),
  VISION_MODEL: z.string().min(1).default('gpt-4.1-mini'),
  EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  RATE_PER_SQM_DAY: z.coerce.number().nonnegative().default(10),
  FALLBACK_DURATION_DAYS: z.coerce.number().int().nonnegative().default(7),
  PAYMENT_ACCOUNT: z.string().min(1).default('123456789/0100'),
  PAYMENT_DUE_DAYS: z.coerce.number().int().positive().default(30),

  UPLOAD_DIR: z.string().min(1).default('uploads'),
  OUTPUT_DIR: z.string().min(1).default('output'),

  WATCH_ENABLED: booleanFlag,
  WATCH_DIR: z.string().min(1).default('Zadosti'),

  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  SMTP_FROM: optionalString,
  CLERK_EMAIL: z.string().email().default('clerk@municipality.cz'),
});

export interface MailConfig {
  readonly host?: string;
  readonly port: number;
  readonly user?: string;
  readonly password?: string;
  readonly from: string;
  readonly clerkEmail: string;
}

/**
 * Configuration built once at startup and passed to each component.
 */
export interface AppConfig {
  readonly server: { readonly port: number; readonly corsOrigins: readonly string[] };
  readonly logging: { readonly level: string };
  readonly storage: {
    readonly backend: 'redis' | 'memory';
    readonly redisUrl: string;
    readonly uploadDir: string;
    readonly outputDir: string;
  };
  readonly extraction: {
    readonly apiKey: string;
    readonly baseUrl?: string;
    readonly textModel: string;
    readonly visionModel: string;
    readonly timeoutMs: number;
  };
  readonly fees: {
    readonly ratePerSqmDay: number;
    readonly fallbackDurationDays: number;
    readonly paymentAccount: string;
    readonly paymentDueDays: number;
  };
  readonly watch: { readonly enabled: boolean; readonly folder: string };
  readonly mail: MailConfig;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Parses the environment into an immutable AppConfig.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return deepFreeze({
    server: {
      port: parsed.PORT,
      corsOrigins: parsed.CORS_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },
    logging: { level: parsed.LOG_LEVEL },
    storage: {
      backend: parsed.STORE_BACKEND,
      redisUrl: parsed.REDIS_URL,
      uploadDir: parsed.UPLOAD_DIR,
      outputDir: parsed.OUTPUT_DIR,
    },
    extraction: {
      apiKey: parsed.OPENAI_API_KEY,
      baseUrl: parsed.OPENAI_BASE_URL,
      textModel: parsed.LLM_MODEL,
      visionModel: parsed.VISION_MODEL,
      timeoutMs: parsed.EXTRACTION_TIMEOUT_MS,
    },
    fees: {
      ratePerSqmDay: parsed.RATE_PER_SQM_DAY,
      fallbackDurationDays: parsed.FALLBACK_DURATION_DAYS,
      paymentAccount: parsed.PAYMENT_ACCOUNT,
      paymentDueDays: parsed.PAYMENT_DUE_DAYS,
    },
    watch: { enabled: parsed.WATCH_ENABLED, folder: parsed.WATCH_DIR },
    mail: {
      host: parsed.SMTP_HOST,
      port: parsed.SMTP_PORT,
      user: parsed.SMTP_USER,
      password: parsed.SMTP_PASSWORD,
      from: parsed.SMTP_FROM ?? parsed.SMTP_USER ?? parsed.CLERK_EMAIL,
      clerkEmail: parsed.CLERK_EMAIL,
    },
  });
}
