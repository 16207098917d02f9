export { generateUuidV7, generateProposalId } from './ids'
export {
  ValidationError,
  type ValidationErrorCode,
  NotFoundError,
  ConsensusTimeoutError,
  RollbackError,
  InvalidTransitionError,
  QueueUnavailableError,
  PersistenceError,
  type Result,
  ok,
  err,
  describeError,
} from './errors'
export { type Logger, type LogMeta, createLogger } from './logger'
export {
  ProposalStatus,
  PROPOSAL_STATUSES,
  TERMINAL_STATUSES,
  STATUS_TIMESTAMP_FIELD,
  DEFAULT_IMPACT_SCORE,
  DEFAULT_RISK_SCORE,
  type Proposal,
  type ChangePayload,
  type ConsensusDecision,
  canTransition,
  allowedSources,
  isTerminal,
  isProposalStatus,
  calculatePriority,
  proposalPriority,
} from './proposal'
export {
  type SafetyProfile,
  type BlastRadius,
  BLAST_RADII,
  DEFAULT_SAFETY_PROFILE,
  validateSafetyProfile,
} from './safety-profile'
export {
  type ProposalStore,
  type CreateProposalInput,
  type ProposalPatch,
  type TransitionInput,
  type ListProposalsOptions,
  InMemoryProposalStore,
} from './proposal-store'
export {
  QUEUES,
  scoreUpdateQueueFor,
  type DurableQueue,
  type DequeuedMessage,
  type InMemoryDurableQueueOptions,
  InMemoryDurableQueue,
} from './queue'
export * from './messages'
export {
  type ValidationCheckResult,
  type ValidationCheckRun,
  type ValidationHistorySource,
} from './validation'
