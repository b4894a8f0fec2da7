import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

// Load .env when running locally; production supplies env vars directly
loadEnv()

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'on', 'off'])
  .transform((value) => value === 'true' || value === '1' || value === 'on')

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().default(8080),
  DATABASE_PATH: z.string().min(1, 'DATABASE_PATH is required'),
  MIGRATIONS_DIR: z.string().optional(),
  CORS_ALLOWED_ORIGINS: z.string().optional(),

  // Admin inbox + maintenance endpoints
  ADMIN_API_TOKEN: z.string().optional(),

  // Contact form policy
  CONTACT_FORM_ENABLED: booleanFlag.default('true'),
  CONTACT_REQUIRE_CHALLENGE: booleanFlag.default('false'),
  CHALLENGE_MAX_AGE_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  CHALLENGE_MIN_AGE_MS: z.coerce.number().int().nonnegative().default(2000),
  CHALLENGE_SESSION_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  SPAM_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),

  // reCAPTCHA verification (challenge route is disabled without a secret)
  RECAPTCHA_SECRET_KEY: z.string().optional(),
  RECAPTCHA_VERIFY_URL: z.string().url().default('https://www.google.com/recaptcha/api/siteverify'),

  // Retention of the submission audit log
  SUBMISSION_LOG_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  CRON_ENABLED: booleanFlag.default('false'),
  CRON_PURGE_EXPRESSION: z.string().default('0 3 * * *'),
})

export type Env = z.infer<typeof EnvSchema>

export const env: Env = EnvSchema.parse(process.env)
