import { z } from 'zod'

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

export const configSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    // Database: SQLite file path or postgres:// URL
    DATABASE_URL: z.string().optional(),
    FLEETWISE_INSTANCE_ID: z.string().min(1).default('instance_default'),
    // Routing event consumer
    FLEETWISE_POLL_INTERVAL_MS: positiveInt(5_000),
    FLEETWISE_BATCH_SIZE: positiveInt(10),
    FLEETWISE_MAX_CONSECUTIVE_ERRORS: positiveInt(5),
    // Complexity score learner
    FLEETWISE_LEARNING_INTERVAL_MS: positiveInt(60_000),
    FLEETWISE_MIN_SAMPLE_THRESHOLD: positiveInt(100),
    FLEETWISE_SCORE_MIN: z.coerce.number().finite().default(0),
    FLEETWISE_SCORE_MAX: z.coerce.number().finite().default(5),
    FLEETWISE_DEFAULT_SCORE: z.coerce.number().finite().default(2.5),
    FLEETWISE_SUPPRESSION_EPSILON: z.coerce.number().finite().nonnegative().default(0.1),
    // Effectiveness tracking
    FLEETWISE_MIN_DATA_POINTS: positiveInt(10),
    // Agent coordination
    FLEETWISE_CONSENSUS_TIMEOUT_MS: positiveInt(30_000),
    FLEETWISE_CONSENSUS_POLL_INTERVAL_MS: positiveInt(500),
    FLEETWISE_METRICS_FLUSH_INTERVAL_MS: positiveInt(60_000),
    FLEETWISE_METRICS_BUFFER_CAPACITY: positiveInt(10_000),
    // Durable queue
    FLEETWISE_QUEUE_LEASE_MS: positiveInt(30_000),
  })
  .refine((env) => env.FLEETWISE_SCORE_MIN < env.FLEETWISE_SCORE_MAX, {
    message: 'FLEETWISE_SCORE_MIN must be lower than FLEETWISE_SCORE_MAX',
    path: ['FLEETWISE_SCORE_MIN'],
  })
  .refine(
    (env) =>
      env.FLEETWISE_DEFAULT_SCORE >= env.FLEETWISE_SCORE_MIN &&
      env.FLEETWISE_DEFAULT_SCORE <= env.FLEETWISE_SCORE_MAX,
    {
      message: 'FLEETWISE_DEFAULT_SCORE must lie within the score range',
      path: ['FLEETWISE_DEFAULT_SCORE'],
    }
  )

export type Config = z.infer<typeof configSchema>

let cachedConfig: Config | null = null

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (cachedConfig) {
    return cachedConfig
  }

  const result = configSchema.safeParse(env)

  if (!result.success) {
    console.error('Invalid environment configuration:')
    console.error(result.error.format())
    throw new Error('Invalid environment configuration')
  }

  cachedConfig = result.data
  return cachedConfig
}

/** Drops the cached config so the next loadConfig() re-reads the environment. */
export function resetConfigCache(): void {
  cachedConfig = null
}
