import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

const numeric = (fallback: string) => z.string().default(fallback).transform(Number);

// Define environment variable schema with Zod for type-safe validation
const envSchema = z
  .object({
    // Node environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Server configuration
    PORT: numeric('3000'),

    // Persistence
    STORE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().url('Invalid database URL').optional(),
    DB_POOL_MAX: numeric('10'),
    LOCK_TIMEOUT_MS: numeric('5000'),

    // Raffle reservation configuration
    RESERVATION_TIMEOUT_MINUTES: numeric('15'),
    MIN_TICKETS_PER_ORDER: numeric('1'),
    MAX_TICKETS_PER_ORDER: numeric('50'),
    RANDOM_SCAN_BATCH_SIZE: numeric('500'),

    // Optional periodic expiry sweep (0 disables it)
    EXPIRY_SWEEP_INTERVAL_SECONDS: numeric('0'),

    // Payment confirmation notifications
    NOTIFICATION_WEBHOOK_URL: z.string().url('Invalid notification webhook URL').optional(),

    // Logging configuration
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

    // CORS configuration
    ALLOWED_ORIGINS: z.string().default('*'),
  })
  .superRefine((vars, ctx) => {
    if (vars.STORE_DRIVER === 'postgres' && !vars.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
      });
    }
    if (vars.MIN_TICKETS_PER_ORDER > vars.MAX_TICKETS_PER_ORDER) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MIN_TICKETS_PER_ORDER'],
        message: 'MIN_TICKETS_PER_ORDER must not exceed MAX_TICKETS_PER_ORDER',
      });
    }
  });

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

export type Environment = typeof env;
