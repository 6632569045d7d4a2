import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const csvList = z
  .string()
  .default('')
  .transform((raw) =>
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  );

export const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  REDIS_URL: z.string().min(1),

  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL_DEFAULT: z.string().default('gpt-4o'),
  OPENAI_MODEL_CLASSIFY: z.string().default('gpt-4o-mini'),
  OPENAI_MODEL_VISION: z.string().default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  PINECONE_API_KEY: optionalString,
  PINECONE_CONVERSATIONS_INDEX: z.string().default('tattoo-conversations'),
  PINECONE_PRICING_INDEX: z.string().default('tattoo-pricing'),

  IG_USER_ACCESS_TOKEN: z.string().min(1),
  META_APP_SECRET: optionalString,
  META_VERIFY_TOKEN: optionalString,
  ALLOWED_SENDER_IDS: csvList,
  REACTION_BOT_SENDER_ID: optionalString,

  GOOGLE_CALENDAR_ID: z.string().default('primary'),
  GOOGLE_CALENDAR_CREDENTIALS: optionalString,
  GOOGLE_OAUTH_CLIENT_ID: optionalString,
  GOOGLE_OAUTH_CLIENT_SECRET: optionalString,
  GOOGLE_OAUTH_REFRESH_TOKEN: optionalString,

  STUDIO_TIMEZONE: z.string().default('Europe/Athens'),
  CALENDAR_SLOT_CAPACITY: z.coerce.number().int().min(1).default(2),
  HOLD_TTL_SECONDS: z.coerce.number().int().min(60).max(3600).default(30 * 60),
  GRACE_WINDOW_SECONDS: z.coerce.number().int().min(0).default(20),
  MAX_HISTORY_LENGTH: z.coerce.number().int().positive().default(20),
  WEBHOOK_RATE_LIMIT_PER_HOUR: z.coerce.number().int().positive().default(100),

  SENTRY_DSN: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
