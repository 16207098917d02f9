export {
  AgentCoordinator,
  type AgentCoordinatorOptions,
  type ChangeExecutor,
  type CompleteExecutionInput,
  type MetricsReport,
  type PrioritizedProposal,
  type ProposalMetadata,
  type RollbackHook,
} from './agent-coordinator'

export { SafetyProfileRegistry } from './safety-profiles'

export {
  MIN_SUCCESS_RATE,
  MAX_LATENCY_P95_MS,
  MAX_COST_CENTS,
  findThresholdBreaches,
} from './rollback-thresholds'

export {
  MetricsReporter,
  type MetricsReporterOptions,
  type MetricsReporterStats,
} from './metrics-reporter'

export {
  EffectivenessTracker,
  InMemoryValidationHistory,
  createEffectivenessTracker,
  DEFAULT_MIN_DATA_POINTS,
  DEFAULT_IMPROVEMENT_THRESHOLD,
  costBenefit,
  recommend,
  type TimeRange,
  type CheckPerformance,
  type ImprovementOpportunity,
  type CheckTimeShare,
  type TimeBudgetAnalysis,
  type EffectivenessTrackerOptions,
} from './effectiveness-tracker'

export { ModelScoreCache, type CachedScore, type ModelScoreCacheOptions } from './model-score-cache'

export {
  ensureInstanceWorkers,
  stopInstanceWorkers,
  isInstanceWorkersBusy,
  processInstanceQueues,
  type InstanceWorkerContext,
} from './instance-workers'
