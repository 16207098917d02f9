import type { CoordinatorSettings } from '@fleetwise/config'
import {
  ConsensusTimeoutError,
  DEFAULT_IMPACT_SCORE,
  DEFAULT_RISK_SCORE,
  InvalidTransitionError,
  NotFoundError,
  ProposalStatus,
  QUEUES,
  QueueUnavailableError,
  RollbackError,
  ValidationError,
  changePayloadSchema,
  consensusResponseSchema,
  createLogger,
  describeError,
  err,
  generateProposalId,
  ok,
  proposalPriority,
  rollbackEventSchema,
  toWireSafetyProfile,
  type ConsensusDecision,
  type ConsensusRequest,
  type ConsensusResponse,
  type DurableQueue,
  type LearnedPatternMessage,
  type Proposal,
  type ProposalPatch,
  type ProposalStore,
  type Result,
} from '@fleetwise/core'
import { findThresholdBreaches } from './rollback-thresholds'
import { SafetyProfileRegistry } from './safety-profiles'

const log = createLogger('AgentCoordinator')

const DEFAULT_SETTINGS: CoordinatorSettings = {
  instanceId: 'instance_default',
  consensusTimeoutMs: 30_000,
  consensusPollIntervalMs: 500,
}

const SCORE_MIN = 0
const SCORE_MAX = 10
const RESPONSE_BATCH_SIZE = 50

export interface ProposalMetadata extends Record<string, unknown> {
  impactScore?: number
  riskScore?: number
  agentId?: string
  metricsBefore?: Record<string, unknown>
}

export type PrioritizedProposal = Proposal & { priorityScore: number }

/** Performs the actual change. May resolve with post-change metrics. */
export type ChangeExecutor = (
  proposal: Proposal
) => Promise<Record<string, unknown> | undefined | void>

export type RollbackHook = (proposal: Proposal, reason: string) => void | Promise<void>

export interface AgentCoordinatorOptions {
  store: ProposalStore
  queue: DurableQueue
  profiles?: SafetyProfileRegistry
  settings?: Partial<CoordinatorSettings>
  onRollbackTriggered?: RollbackHook
}

export interface CompleteExecutionInput {
  success: boolean
  metricsAfter?: Record<string, unknown>
  reason?: string
}

export interface MetricsReport {
  proposal: Proposal
  breaches: string[]
  rolledBack: boolean
}

function clampScore(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback
  return Math.min(SCORE_MAX, Math.max(SCORE_MIN, value))
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function withPriority(proposal: Proposal): PrioritizedProposal {
  return { ...proposal, priorityScore: proposalPriority(proposal) }
}

/** The consensus outcome a proposal already carries, if any. */
function recordedDecision(proposal: Proposal): ConsensusDecision | null {
  if (proposal.consensusFailedAt || proposal.status === ProposalStatus.CONSENSUS_FAILED) {
    return 'rejected'
  }
  if (proposal.consensusReachedAt || proposal.status === ProposalStatus.CONSENSUS_REACHED) {
    return 'approved'
  }
  return null
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Gates agent-initiated changes behind safety profiles and fleet consensus.
 *
 * Every status change goes through a compare-and-set transition on the store,
 * so concurrent callers working on the same proposal never overwrite each
 * other; the loser re-reads and reports what actually happened.
 */
export class AgentCoordinator {
  private readonly store: ProposalStore
  private readonly queue: DurableQueue
  private readonly profiles: SafetyProfileRegistry
  private readonly settings: CoordinatorSettings
  private readonly onRollbackTriggered?: RollbackHook
  /** Decisions that arrived for proposals someone is currently awaiting */
  private readonly inboxes: Map<string, ConsensusDecision> = new Map()
  private readonly waiters: Map<string, number> = new Map()

  constructor(options: AgentCoordinatorOptions) {
    this.store = options.store
    this.queue = options.queue
    this.profiles = options.profiles ?? new SafetyProfileRegistry()
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings }
    this.onRollbackTriggered = options.onRollbackTriggered
  }

  get safetyProfiles(): SafetyProfileRegistry {
    return this.profiles
  }

  async proposeChange(
    agentType: string,
    change: unknown,
    metadata: ProposalMetadata = {}
  ): Promise<Result<Proposal, ValidationError | QueueUnavailableError>> {
    if (typeof agentType !== 'string' || agentType.trim() === '') {
      return err(new ValidationError('invalid_change', 'agentType must be a non-empty string'))
    }
    const parsedChange = changePayloadSchema.safeParse(change)
    if (!parsedChange.success) {
      return err(
        new ValidationError('invalid_change', 'change must be an object with a non-empty "type"')
      )
    }

    const safetyProfile = { ...this.profiles.getProfile(agentType) }
    const proposal = await this.store.create({
      id: generateProposalId(this.settings.instanceId),
      instanceId: this.settings.instanceId,
      agentType,
      agentId: typeof metadata.agentId === 'string' ? metadata.agentId : null,
      change: parsedChange.data,
      metadata,
      safetyProfile,
      impactScore: clampScore(metadata.impactScore, DEFAULT_IMPACT_SCORE),
      riskScore: clampScore(metadata.riskScore, DEFAULT_RISK_SCORE),
      metricsBefore: isPlainObject(metadata.metricsBefore) ? metadata.metricsBefore : null,
    })

    log.info('Change proposed', {
      proposalId: proposal.id,
      agentType,
      changeType: proposal.change.type,
      needsConsensus: safetyProfile.needsConsensus,
    })

    if (!safetyProfile.needsConsensus) {
      return ok(
        await this.transitionOrCurrent(proposal, ProposalStatus.APPLIED, [ProposalStatus.PENDING])
      )
    }

    const request: ConsensusRequest = {
      proposal_id: proposal.id,
      instance_id: proposal.instanceId,
      agent_type: agentType,
      change: proposal.change,
      safety_profile: toWireSafetyProfile(safetyProfile),
      priority_score: proposalPriority(proposal),
      timestamp: new Date().toISOString(),
    }

    try {
      await this.queue.enqueue(QUEUES.consensusRequests, request)
    } catch (error) {
      log.error('Consensus request publish failed; proposal left pending', error, {
        proposalId: proposal.id,
      })
      return err(
        error instanceof QueueUnavailableError
          ? error
          : new QueueUnavailableError(QUEUES.consensusRequests, error)
      )
    }

    return ok(
      await this.transitionOrCurrent(proposal, ProposalStatus.SENT_FOR_CONSENSUS, [
        ProposalStatus.PENDING,
      ])
    )
  }

  /**
   * Waits for the fleet's decision by polling the response queue at a fixed
   * interval. On timeout the proposal stays `sent_for_consensus`, so a later
   * poll can still record the decision.
   */
  async awaitConsensus(
    id: string,
    timeoutMs: number = this.settings.consensusTimeoutMs
  ): Promise<
    Result<ConsensusDecision, NotFoundError | ConsensusTimeoutError | InvalidTransitionError>
  > {
    const proposal = await this.store.get(id)
    if (!proposal) {
      return err(new NotFoundError('Proposal', id))
    }

    const decided = recordedDecision(proposal)
    if (decided) return ok(decided)
    if (proposal.status !== ProposalStatus.SENT_FOR_CONSENSUS) {
      return err(
        new InvalidTransitionError({
          proposalId: id,
          from: proposal.status,
          to: ProposalStatus.CONSENSUS_REACHED,
        })
      )
    }

    const deadline = Date.now() + timeoutMs
    this.waiters.set(id, (this.waiters.get(id) ?? 0) + 1)
    try {
      for (;;) {
        try {
          await this.pollConsensusResponses()
        } catch (error) {
          log.warn('Consensus response poll failed', {
            proposalId: id,
            error: describeError(error),
          })
        }

        const fromInbox = this.inboxes.get(id)
        if (fromInbox) return ok(fromInbox)

        // Another coordinator sharing the store may have recorded it
        const current = await this.store.get(id)
        const recorded = current ? recordedDecision(current) : null
        if (recorded) return ok(recorded)

        const remaining = deadline - Date.now()
        if (remaining <= 0) {
          log.warn('Consensus wait timed out', { proposalId: id, timeoutMs })
          return err(new ConsensusTimeoutError(id, timeoutMs))
        }
        await sleep(Math.min(this.settings.consensusPollIntervalMs, remaining))
      }
    } finally {
      const count = (this.waiters.get(id) ?? 1) - 1
      if (count <= 0) {
        this.waiters.delete(id)
        this.inboxes.delete(id)
      } else {
        this.waiters.set(id, count)
      }
    }
  }

  /**
   * Drains one batch of consensus responses, recording each decision on its
   * proposal. Decisions for proposals nobody is waiting on (late ones
   * included) are still recorded. Returns the number of messages handled.
   */
  async pollConsensusResponses(): Promise<number> {
    const batch = await this.queue.dequeue(QUEUES.consensusResponses, RESPONSE_BATCH_SIZE)

    for (const item of batch) {
      const parsed = consensusResponseSchema.safeParse(item.message)
      if (parsed.success) {
        await this.recordConsensusDecision(parsed.data)
      } else {
        log.warn('Dropping malformed consensus response', {
          messageId: item.messageId,
          issues: parsed.error.issues.length,
        })
      }
      const acked = await this.queue.ack(QUEUES.consensusResponses, item.ackToken)
      if (!acked) {
        log.warn('Consensus response ack rejected; it may be redelivered', {
          messageId: item.messageId,
        })
      }
    }

    return batch.length
  }

  async startExecution(
    id: string
  ): Promise<Result<Proposal, NotFoundError | InvalidTransitionError>> {
    return this.strictTransition(id, ProposalStatus.EXECUTING, [ProposalStatus.CONSENSUS_REACHED])
  }

  async completeExecution(
    id: string,
    input: CompleteExecutionInput
  ): Promise<Result<Proposal, NotFoundError | InvalidTransitionError>> {
    const to = input.success ? ProposalStatus.APPLIED : ProposalStatus.FAILED
    return this.strictTransition(id, to, [ProposalStatus.EXECUTING], {
      metricsAfter: input.metricsAfter ?? null,
      failureReason: input.success ? null : (input.reason ?? 'execution failed'),
    })
  }

  /**
   * Runs an approved change through `executor`. A failing executor marks the
   * proposal failed, or rolls it back when the profile asks for auto-rollback.
   * Resolves with the proposal in its final state.
   */
  async executeApproved(
    id: string,
    executor: ChangeExecutor
  ): Promise<Result<Proposal, NotFoundError | InvalidTransitionError | RollbackError>> {
    const started = await this.startExecution(id)
    if (!started.ok) return started
    const proposal = started.value

    let metricsAfter: Record<string, unknown> | undefined
    try {
      const result = await executor(proposal)
      metricsAfter = isPlainObject(result) ? result : undefined
    } catch (error) {
      const reason = `execution failed: ${describeError(error)}`
      log.error('Change execution failed', error, { proposalId: id })

      if (proposal.safetyProfile.autoRollback) {
        const rolledBack = await this.handleRollback(id, reason)
        if (!rolledBack.ok) return rolledBack
        return this.require(id)
      }
      return this.completeExecution(id, { success: false, reason })
    }

    return this.completeExecution(id, { success: true, metricsAfter })
  }

  /**
   * Forces the proposal into `rolled_back`. Idempotent: a proposal that is
   * already rolled back returns success without any further writes. Never
   * touches other proposals.
   */
  async handleRollback(
    id: string,
    reason = 'manual rollback'
  ): Promise<Result<'rolled_back', NotFoundError | RollbackError>> {
    const proposal = await this.store.get(id)
    if (!proposal) {
      return err(new NotFoundError('Proposal', id))
    }
    if (proposal.status === ProposalStatus.ROLLED_BACK) {
      return ok('rolled_back')
    }

    const updated = await this.store.transition(id, {
      to: ProposalStatus.ROLLED_BACK,
      patch: { rollbackReason: reason },
    })

    if (!updated) {
      const current = await this.store.get(id)
      if (current?.status === ProposalStatus.ROLLED_BACK) {
        return ok('rolled_back')
      }
      const status = current?.status ?? 'unknown'
      return err(new RollbackError(id, `Rollback of ${id} did not apply (status ${status})`))
    }

    log.info('Proposal rolled back', { proposalId: id, from: proposal.status, reason })

    if (this.onRollbackTriggered) {
      try {
        await this.onRollbackTriggered(updated, reason)
      } catch (error) {
        log.error('Rollback hook failed', error, { proposalId: id })
      }
    }

    return ok('rolled_back')
  }

  /** Applies guardian-triggered rollbacks from the rollback-events queue. */
  async pollRollbackEvents(batchSize = RESPONSE_BATCH_SIZE): Promise<number> {
    const batch = await this.queue.dequeue(QUEUES.rollbackEvents, batchSize)

    for (const item of batch) {
      const parsed = rollbackEventSchema.safeParse(item.message)
      if (!parsed.success) {
        log.warn('Dropping malformed rollback event', { messageId: item.messageId })
      } else {
        const result = await this.handleRollback(
          parsed.data.proposal_id,
          parsed.data.reason ?? 'rollback event'
        )
        if (!result.ok) {
          log.warn('Rollback event not applied', {
            proposalId: parsed.data.proposal_id,
            error: result.error.message,
          })
        }
      }
      await this.queue.ack(QUEUES.rollbackEvents, item.ackToken)
    }

    return batch.length
  }

  /**
   * Stores post-change metrics. With auto-rollback enabled, any breached
   * guardian threshold rolls the proposal back.
   */
  async reportMetrics(
    id: string,
    metricsAfter: Record<string, unknown>
  ): Promise<Result<MetricsReport, NotFoundError | RollbackError>> {
    const updated = await this.store.update(id, { metricsAfter })
    if (!updated) {
      return err(new NotFoundError('Proposal', id))
    }

    const breaches = findThresholdBreaches(metricsAfter, updated.safetyProfile)
    if (breaches.length === 0 || updated.status === ProposalStatus.ROLLED_BACK) {
      return ok({ proposal: updated, breaches, rolledBack: false })
    }

    if (!updated.safetyProfile.autoRollback) {
      log.warn('Guardian thresholds breached; auto-rollback disabled', { proposalId: id, breaches })
      return ok({ proposal: updated, breaches, rolledBack: false })
    }

    const rolledBack = await this.handleRollback(id, `threshold breach: ${breaches.join('; ')}`)
    if (!rolledBack.ok) return rolledBack

    const current = await this.require(id)
    if (!current.ok) return current
    return ok({ proposal: current.value, breaches, rolledBack: true })
  }

  /** Publishes a learned pattern without waiting for the queue. */
  recordPattern(
    agentType: string,
    category: string,
    pattern: unknown
  ): Result<'recorded', ValidationError> {
    if (!isPlainObject(pattern) || Object.keys(pattern).length === 0) {
      return err(new ValidationError('invalid_pattern', 'pattern must be a non-empty object'))
    }
    if (agentType.trim() === '' || category.trim() === '') {
      return err(
        new ValidationError('invalid_pattern', 'agentType and category must be non-empty strings')
      )
    }

    const message: LearnedPatternMessage = {
      instance_id: this.settings.instanceId,
      agent_type: agentType,
      category,
      pattern,
      timestamp: new Date().toISOString(),
    }
    void this.queue.enqueue(QUEUES.learnedPatterns, message).catch((error: unknown) => {
      log.warn('Pattern publish failed', { agentType, category, error: describeError(error) })
    })
    return ok('recorded')
  }

  async getChangeStatus(id: string): Promise<Result<ProposalStatus, NotFoundError>> {
    const proposal = await this.store.get(id)
    return proposal ? ok(proposal.status) : err(new NotFoundError('Proposal', id))
  }

  async getProposal(id: string): Promise<PrioritizedProposal | null> {
    const proposal = await this.store.get(id)
    return proposal ? withPriority(proposal) : null
  }

  async listProposals(status?: ProposalStatus): Promise<PrioritizedProposal[]> {
    const proposals = await this.store.list(status ? { status } : undefined)
    return proposals.map(withPriority)
  }

  /** Highest-priority pending proposal; ties go to the oldest. */
  async nextProposal(): Promise<PrioritizedProposal | null> {
    const pending = await this.listProposals(ProposalStatus.PENDING)
    pending.sort(
      (a, b) =>
        b.priorityScore - a.priorityScore || a.createdAt.getTime() - b.createdAt.getTime()
    )
    return pending[0] ?? null
  }

  private async recordConsensusDecision(response: ConsensusResponse): Promise<void> {
    const to =
      response.decision === 'approved'
        ? ProposalStatus.CONSENSUS_REACHED
        : ProposalStatus.CONSENSUS_FAILED

    const updated = await this.store.transition(response.proposal_id, {
      to,
      from: [ProposalStatus.SENT_FOR_CONSENSUS],
      patch: {
        consensusVotes: response.votes,
        consensusScore: response.consensus_score ?? null,
      },
    })

    if (updated) {
      log.info('Consensus decision recorded', {
        proposalId: response.proposal_id,
        decision: response.decision,
        waiting: this.waiters.has(response.proposal_id),
      })
    } else {
      log.debug('Consensus decision ignored; proposal missing or already decided', {
        proposalId: response.proposal_id,
        decision: response.decision,
      })
    }

    if (this.waiters.has(response.proposal_id)) {
      const current = updated ?? (await this.store.get(response.proposal_id))
      const decision = current ? recordedDecision(current) : null
      if (decision) this.inboxes.set(response.proposal_id, decision)
    }
  }

  private async transitionOrCurrent(
    proposal: Proposal,
    to: ProposalStatus,
    from: ProposalStatus[]
  ): Promise<Proposal> {
    const updated = await this.store.transition(proposal.id, { to, from })
    if (updated) return updated
    log.warn('Proposal changed concurrently; returning current state', {
      proposalId: proposal.id,
      to,
    })
    return (await this.store.get(proposal.id)) ?? proposal
  }

  private async strictTransition(
    id: string,
    to: ProposalStatus,
    from: ProposalStatus[],
    patch?: ProposalPatch
  ): Promise<Result<Proposal, NotFoundError | InvalidTransitionError>> {
    const updated = await this.store.transition(id, { to, from, patch })
    if (updated) return ok(updated)

    const current = await this.store.get(id)
    if (!current) return err(new NotFoundError('Proposal', id))
    return err(new InvalidTransitionError({ proposalId: id, from: current.status, to }))
  }

  private async require(id: string): Promise<Result<Proposal, NotFoundError>> {
    const proposal = await this.store.get(id)
    return proposal ? ok(proposal) : err(new NotFoundError('Proposal', id))
  }
}
