import { z, ZodError } from 'zod';

/**
 * Environment variable schema with strict validation
 * Runtime switches (monitoring, retention caps, ban simulator) live in the
 * settings table; only process-level configuration comes from the environment
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // Data storage
  DATA_DIR: z.string().default('./data'),
  SQLITE_DB_PATH: z.string().default('./data/sentinel.db'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Task delivery
  TASK_POLL_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  TASK_RESULT_TTL_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'TASK_RESULT_TTL_MINUTES must be at least 1' })
    .default(30),

  // Hardware collection
  COLLECTOR_TIMEOUT_MS: z.coerce.number().int().min(1000).default(15000),

  // Stats retention
  STATS_MAX_CHANGE_EVENTS: z.coerce.number().int().min(1).default(500),
  STATS_MAX_DISTINCT_FINGERPRINTS: z.coerce.number().int().min(1).default(500),
  STATS_DAILY_RETENTION_DAYS: z.coerce.number().int().min(1).default(90),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for supported variables');
      process.exit(1);
    }
    throw error;
  }
}
