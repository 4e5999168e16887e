import dotenv from 'dotenv';
import { z } from 'zod';

if (process.env.NODE_ENV === 'test') {
  dotenv.config({ path: '.env.test', quiet: true });
} else {
  dotenv.config({ quiet: true });
}

const optionalString = <T extends z.ZodType>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema.optional());

export const env = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: optionalString(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])),

    HOST: z.string().default('localhost'),
    PORT: z.coerce.number().default(8000),
    CORS: z.coerce.number().default(0),
    SWAGGER: z.coerce.number().default(1),

    POLL_ENABLED: z.coerce.number().default(1),
    POLL_INTERVAL_SEC: z.coerce.number().int().positive().default(180),
    FEEDS_CONFIG_PATH: z.string().default('config/feeds.json'),
    FEED_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

    PUSH_QUEUE_CAPACITY: z.coerce.number().int().positive().default(1000),
    PUSH_CONCURRENCY: z.coerce.number().int().positive().default(4),
    INCIDENT_IO_WEBHOOK_SECRET: optionalString(z.string()),
    GENERIC_WEBHOOK_SECRET: optionalString(z.string()),

    REDIS_URL: optionalString(z.url()),
  })
  .parse(process.env);
