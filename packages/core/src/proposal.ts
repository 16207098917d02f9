import type { SafetyProfile } from './safety-profile'

export enum ProposalStatus {
  PENDING = 'pending',
  SENT_FOR_CONSENSUS = 'sent_for_consensus',
  CONSENSUS_REACHED = 'consensus_reached',
  CONSENSUS_FAILED = 'consensus_failed',
  EXECUTING = 'executing',
  APPLIED = 'applied',
  FAILED = 'failed',
  ROLLED_BACK = 'rolled_back',
}

export const PROPOSAL_STATUSES: readonly ProposalStatus[] = Object.values(ProposalStatus)

export const TERMINAL_STATUSES: ReadonlySet<ProposalStatus> = new Set([
  ProposalStatus.APPLIED,
  ProposalStatus.FAILED,
  ProposalStatus.CONSENSUS_FAILED,
  ProposalStatus.ROLLED_BACK,
])

/**
 * Forward-only lifecycle. Rollback is allowed from every state except itself,
 * including the other terminal states: rolling back an applied change is the
 * main reason rollback exists.
 */
const TRANSITIONS: Readonly<Record<ProposalStatus, readonly ProposalStatus[]>> = {
  [ProposalStatus.PENDING]: [
    ProposalStatus.SENT_FOR_CONSENSUS,
    ProposalStatus.APPLIED,
    ProposalStatus.ROLLED_BACK,
  ],
  [ProposalStatus.SENT_FOR_CONSENSUS]: [
    ProposalStatus.CONSENSUS_REACHED,
    ProposalStatus.CONSENSUS_FAILED,
    ProposalStatus.ROLLED_BACK,
  ],
  [ProposalStatus.CONSENSUS_REACHED]: [ProposalStatus.EXECUTING, ProposalStatus.ROLLED_BACK],
  [ProposalStatus.EXECUTING]: [
    ProposalStatus.APPLIED,
    ProposalStatus.FAILED,
    ProposalStatus.ROLLED_BACK,
  ],
  [ProposalStatus.APPLIED]: [ProposalStatus.ROLLED_BACK],
  [ProposalStatus.FAILED]: [ProposalStatus.ROLLED_BACK],
  [ProposalStatus.CONSENSUS_FAILED]: [ProposalStatus.ROLLED_BACK],
  [ProposalStatus.ROLLED_BACK]: [],
}

export function canTransition(from: ProposalStatus, to: ProposalStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

/** Statuses a proposal may currently be in for a move to `to` to be legal. */
export function allowedSources(to: ProposalStatus): ProposalStatus[] {
  return PROPOSAL_STATUSES.filter((from) => canTransition(from, to))
}

export function isTerminal(status: ProposalStatus): boolean {
  return TERMINAL_STATUSES.has(status)
}

export function isProposalStatus(value: unknown): value is ProposalStatus {
  return typeof value === 'string' && (PROPOSAL_STATUSES as readonly string[]).includes(value)
}

/** Opaque to the core apart from the required `type` discriminator. */
export type ChangePayload = { type: string } & Record<string, unknown>

export type ConsensusDecision = 'approved' | 'rejected'

export interface Proposal {
  id: string
  instanceId: string
  agentType: string
  agentId: string | null
  change: ChangePayload
  metadata: Record<string, unknown>
  /** Snapshot taken at creation time, never re-read from the registry */
  safetyProfile: SafetyProfile
  impactScore: number
  riskScore: number
  status: ProposalStatus
  consensusVotes: Record<string, unknown>
  consensusScore: number | null
  metricsBefore: Record<string, unknown> | null
  metricsAfter: Record<string, unknown> | null
  rollbackReason: string | null
  failureReason: string | null
  createdAt: Date
  updatedAt: Date
  sentForConsensusAt: Date | null
  consensusReachedAt: Date | null
  consensusFailedAt: Date | null
  executionStartedAt: Date | null
  appliedAt: Date | null
  failedAt: Date | null
  rolledBackAt: Date | null
}

export const DEFAULT_IMPACT_SCORE = 5.0
export const DEFAULT_RISK_SCORE = 5.0
const MIN_RISK_SCORE = 0.1

/**
 * priority = (impact × successRate) / (risk × costFactor)
 *
 * Risk is floored at 0.1 so a zero-risk estimate does not divide by zero.
 */
export function calculatePriority(
  impactScore: number,
  riskScore: number,
  profile: Pick<SafetyProfile, 'successRate' | 'costFactor'>
): number {
  const risk = Math.max(riskScore, MIN_RISK_SCORE)
  return (impactScore * profile.successRate) / (risk * profile.costFactor)
}

export function proposalPriority(
  proposal: Pick<Proposal, 'impactScore' | 'riskScore' | 'safetyProfile'>
): number {
  return calculatePriority(proposal.impactScore, proposal.riskScore, proposal.safetyProfile)
}

/** Which timestamp column records arrival at a given status. */
export const STATUS_TIMESTAMP_FIELD: Readonly<
  Record<ProposalStatus, keyof Proposal & `${string}At`>
> = {
  [ProposalStatus.PENDING]: 'createdAt',
  [ProposalStatus.SENT_FOR_CONSENSUS]: 'sentForConsensusAt',
  [ProposalStatus.CONSENSUS_REACHED]: 'consensusReachedAt',
  [ProposalStatus.CONSENSUS_FAILED]: 'consensusFailedAt',
  [ProposalStatus.EXECUTING]: 'executionStartedAt',
  [ProposalStatus.APPLIED]: 'appliedAt',
  [ProposalStatus.FAILED]: 'failedAt',
  [ProposalStatus.ROLLED_BACK]: 'rolledBackAt',
}
