import {
  type ChangePayload,
  type Proposal,
  ProposalStatus,
  STATUS_TIMESTAMP_FIELD,
  allowedSources,
} from './proposal'
import type { SafetyProfile } from './safety-profile'

export interface CreateProposalInput {
  id: string
  instanceId: string
  agentType: string
  agentId: string | null
  change: ChangePayload
  metadata: Record<string, unknown>
  safetyProfile: SafetyProfile
  impactScore: number
  riskScore: number
  metricsBefore: Record<string, unknown> | null
}

export type ProposalPatch = Partial<
  Pick<
    Proposal,
    'consensusVotes' | 'consensusScore' | 'metricsAfter' | 'rollbackReason' | 'failureReason'
  >
>

export interface TransitionInput {
  to: ProposalStatus
  /** Statuses the proposal must currently be in. Defaults to every legal source of `to`. */
  from?: readonly ProposalStatus[]
  patch?: ProposalPatch
}

export interface ListProposalsOptions {
  status?: ProposalStatus
  limit?: number
}

export interface ProposalStore {
  create(input: CreateProposalInput): Promise<Proposal>
  get(id: string): Promise<Proposal | null>
  list(options?: ListProposalsOptions): Promise<Proposal[]>
  /**
   * Compare-and-set status change. Returns the updated proposal, or null when
   * the proposal is missing or no longer in one of the `from` statuses.
   */
  transition(id: string, input: TransitionInput): Promise<Proposal | null>
  /** Updates non-status fields. Returns null when the proposal is missing. */
  update(id: string, patch: ProposalPatch): Promise<Proposal | null>
}

export class InMemoryProposalStore implements ProposalStore {
  private items: Map<string, Proposal> = new Map()

  create(input: CreateProposalInput): Promise<Proposal> {
    if (this.items.has(input.id)) {
      return Promise.reject(new Error(`Proposal already exists: ${input.id}`))
    }
    const now = new Date()
    const proposal: Proposal = {
      ...structuredClone(input),
      status: ProposalStatus.PENDING,
      consensusVotes: {},
      consensusScore: null,
      metricsAfter: null,
      rollbackReason: null,
      failureReason: null,
      createdAt: now,
      updatedAt: now,
      sentForConsensusAt: null,
      consensusReachedAt: null,
      consensusFailedAt: null,
      executionStartedAt: null,
      appliedAt: null,
      failedAt: null,
      rolledBackAt: null,
    }
    this.items.set(proposal.id, proposal)
    return Promise.resolve(clone(proposal))
  }

  get(id: string): Promise<Proposal | null> {
    const found = this.items.get(id)
    return Promise.resolve(found ? clone(found) : null)
  }

  list(options?: ListProposalsOptions): Promise<Proposal[]> {
    const { status, limit } = options ?? {}
    let items = Array.from(this.items.values()).sort(
      (a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id)
    )
    if (status) {
      items = items.filter((item) => item.status === status)
    }
    if (typeof limit === 'number') {
      items = items.slice(0, Math.max(0, limit))
    }
    return Promise.resolve(items.map(clone))
  }

  transition(id: string, input: TransitionInput): Promise<Proposal | null> {
    const existing = this.items.get(id)
    if (!existing) return Promise.resolve(null)

    const from = input.from ?? allowedSources(input.to)
    if (!from.includes(existing.status)) return Promise.resolve(null)

    const now = new Date()
    const updated: Proposal = { ...existing, ...input.patch, status: input.to, updatedAt: now }
    updated[STATUS_TIMESTAMP_FIELD[input.to]] = now
    this.items.set(id, updated)
    return Promise.resolve(clone(updated))
  }

  update(id: string, patch: ProposalPatch): Promise<Proposal | null> {
    const existing = this.items.get(id)
    if (!existing) return Promise.resolve(null)

    const updated: Proposal = { ...existing, ...patch, updatedAt: new Date() }
    this.items.set(id, updated)
    return Promise.resolve(clone(updated))
  }
}

function clone(proposal: Proposal): Proposal {
  return structuredClone(proposal)
}
