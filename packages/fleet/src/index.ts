export {
  analyzeAggregate,
  createPerformanceAnalyzer,
  LOW_SUCCESS_RATE_THRESHOLD,
  SLOW_RESPONSE_THRESHOLD_MS,
  type AdvisoryKind,
  type AdvisorySink,
  type AggregateSnapshot,
  type PerformanceAdvisory,
} from './performance-analyzer'

export {
  DEFAULT_CONSUMER_SETTINGS,
  ensureRoutingEventConsumer,
  stopRoutingEventConsumer,
  isRoutingEventConsumerBusy,
  getRoutingEventConsumerStatus,
  resumeRoutingEventConsumer,
  resetRoutingEventConsumerState,
  processRoutingEventBatch,
  RoutingMessageError,
  toRoutingDecisionRecord,
  type AggregateObserver,
  type RoutingBatchResult,
  type RoutingEventConsumerOptions,
  type RoutingEventConsumerStatus,
} from './routing-event-consumer'

export {
  DEFAULT_LEARNER_SETTINGS,
  computeScoreAdjustment,
  runLearningCycle,
  ensureComplexityScoreLearner,
  stopComplexityScoreLearner,
  isComplexityScoreLearnerBusy,
  getComplexityScoreLearnerStatus,
  resumeComplexityScoreLearner,
  resetComplexityScoreLearnerState,
  type ComplexityScoreLearnerOptions,
  type ComplexityScoreLearnerStatus,
  type LearnerMetric,
  type LearningCycleResult,
  type ScoreAdjustment,
} from './complexity-score-learner'

export {
  publishScoreUpdates,
  createModelScoreUpdater,
  type ModelScoreUpdaterOptions,
  type ScoreUpdatePublisher,
} from './model-score-updater'

export {
  ensureFleetWorkers,
  stopFleetWorkers,
  drainFleetWorkers,
  isFleetWorkersBusy,
  type FleetWorkersOptions,
} from './fleet-workers'

export { backoffDelayMs, MAX_BACKOFF_MS, type FatalHandler } from './worker-health'
