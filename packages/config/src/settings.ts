import type { Config } from './env'

export interface ConsumerSettings {
  pollIntervalMs: number
  batchSize: number
  maxConsecutiveErrors: number
}

export interface LearnerSettings {
  learningIntervalMs: number
  minSampleThreshold: number
  scoreMin: number
  scoreMax: number
  defaultScore: number
  suppressionEpsilon: number
  maxConsecutiveErrors: number
}

export interface CoordinatorSettings {
  instanceId: string
  consensusTimeoutMs: number
  consensusPollIntervalMs: number
}

export interface MetricsSettings {
  instanceId: string
  flushIntervalMs: number
  bufferCapacity: number
}

export interface LoopSettings {
  instanceId: string
  queueLeaseMs: number
  minDataPoints: number
  consumer: ConsumerSettings
  learner: LearnerSettings
  coordinator: CoordinatorSettings
  metrics: MetricsSettings
}

export function getLoopSettings(config: Config): LoopSettings {
  const instanceId = config.FLEETWISE_INSTANCE_ID
  return {
    instanceId,
    queueLeaseMs: config.FLEETWISE_QUEUE_LEASE_MS,
    minDataPoints: config.FLEETWISE_MIN_DATA_POINTS,
    consumer: {
      pollIntervalMs: config.FLEETWISE_POLL_INTERVAL_MS,
      batchSize: config.FLEETWISE_BATCH_SIZE,
      maxConsecutiveErrors: config.FLEETWISE_MAX_CONSECUTIVE_ERRORS,
    },
    learner: {
      learningIntervalMs: config.FLEETWISE_LEARNING_INTERVAL_MS,
      minSampleThreshold: config.FLEETWISE_MIN_SAMPLE_THRESHOLD,
      scoreMin: config.FLEETWISE_SCORE_MIN,
      scoreMax: config.FLEETWISE_SCORE_MAX,
      defaultScore: config.FLEETWISE_DEFAULT_SCORE,
      suppressionEpsilon: config.FLEETWISE_SUPPRESSION_EPSILON,
      maxConsecutiveErrors: config.FLEETWISE_MAX_CONSECUTIVE_ERRORS,
    },
    coordinator: {
      instanceId,
      consensusTimeoutMs: config.FLEETWISE_CONSENSUS_TIMEOUT_MS,
      consensusPollIntervalMs: config.FLEETWISE_CONSENSUS_POLL_INTERVAL_MS,
    },
    metrics: {
      instanceId,
      flushIntervalMs: config.FLEETWISE_METRICS_FLUSH_INTERVAL_MS,
      bufferCapacity: config.FLEETWISE_METRICS_BUFFER_CAPACITY,
    },
  }
}
