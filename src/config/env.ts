import z from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

const envSchema = z.object({
  PORT: z.coerce.number().default(4001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Error reporting (disabled when unset)
  SENTRY_DSN: z.string().url().optional(),

  // Compatibility engine
  // Max absolute USD difference between declared and computed totals before repair.
  COMPAT_PRICE_TOLERANCE: z.coerce.number().nonnegative().default(0.01),
  // Substituted for createdAt when the source timestamp is missing or unparseable.
  COMPAT_DATE_SENTINEL: z.string().min(1).default('UNKNOWN'),
  // JSON object of ISO code -> USD rate, merged over the built-in table, e.g. {"GBP":1.3}
  COMPAT_RATE_OVERRIDES: z.string().optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

export const config: AppConfig = parsed.data;
