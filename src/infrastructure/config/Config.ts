import { z } from 'zod';
import type { LogLevel } from '../../application/ports/LoggerPort.js';

export interface AppConfig {
  http: {
    port: number;
  };
  page: {
    url: string;
    loadDelayMs: number;
    settleDelayMs: number;
    locatorTimeoutMs: number;
  };
  browser: {
    executablePath: string;
  };
  checks: {
    intervalMs: number;
    startDelayMs: number;
    timeoutMs: number;
    pacingMs: number;
    workerPoolSize: number;
  };
  telegram: {
    botToken?: string;
  };
  storage: {
    databaseFile?: string;
  };
  logging: {
    level: LogLevel;
  };
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

// Node clamps timer delays above a signed 32-bit millisecond count to 1 ms.
const MAX_TIMER_MS = 2_147_483_647;
const MAX_TIMER_SECONDS = 2_147_483;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  BALANCE_PAGE_URL: z.string().url().default('https://www.dnb.no/kort/kronekort/saldo/'),
  PAGE_LOAD_DELAY_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(3000),
  RESULT_SETTLE_DELAY_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(5000),
  // Doubled for the navigation timeout.
  LOCATOR_TIMEOUT_MS: z.coerce.number().int().positive().max(Math.floor(MAX_TIMER_MS / 2)).default(15000),
  CHROME_EXECUTABLE_PATH: z.string().default('/usr/bin/google-chrome'),
  CHECK_INTERVAL_SECONDS: z.coerce.number().positive().max(MAX_TIMER_SECONDS).default(300),
  SWEEP_START_DELAY_SECONDS: z.coerce.number().nonnegative().max(MAX_TIMER_SECONDS).default(10),
  CHECK_TIMEOUT_SECONDS: z.coerce.number().positive().max(MAX_TIMER_SECONDS).default(60),
  SWEEP_PACING_SECONDS: z.coerce.number().nonnegative().max(MAX_TIMER_SECONDS).default(2),
  WORKER_POOL_SIZE: z.coerce.number().int().positive().default(2),
  TELEGRAM_BOT_TOKEN: optionalString,
  DATABASE_FILE: optionalString,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

const seconds = (value: number): number => Math.round(value * 1000);

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;

  return {
    http: {
      port: values.PORT,
    },
    page: {
      url: values.BALANCE_PAGE_URL,
      loadDelayMs: values.PAGE_LOAD_DELAY_MS,
      settleDelayMs: values.RESULT_SETTLE_DELAY_MS,
      locatorTimeoutMs: values.LOCATOR_TIMEOUT_MS,
    },
    browser: {
      executablePath: values.CHROME_EXECUTABLE_PATH,
    },
    checks: {
      intervalMs: seconds(values.CHECK_INTERVAL_SECONDS),
      startDelayMs: seconds(values.SWEEP_START_DELAY_SECONDS),
      timeoutMs: seconds(values.CHECK_TIMEOUT_SECONDS),
      pacingMs: seconds(values.SWEEP_PACING_SECONDS),
      workerPoolSize: values.WORKER_POOL_SIZE,
    },
    telegram: {
      botToken: values.TELEGRAM_BOT_TOKEN,
    },
    storage: {
      databaseFile: values.DATABASE_FILE,
    },
    logging: {
      level: values.LOG_LEVEL,
    },
  };
};
