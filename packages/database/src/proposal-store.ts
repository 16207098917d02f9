import { z } from 'zod'
import {
  type CreateProposalInput,
  type ListProposalsOptions,
  type Proposal,
  type ProposalPatch,
  type ProposalStore,
  type TransitionInput,
  PersistenceError,
  ProposalStatus,
  allowedSources,
  changePayloadSchema,
  fromWireSafetyProfile,
  isProposalStatus,
  toWireSafetyProfile,
  wireSafetyProfileSchema,
} from '@fleetwise/core'
import {
  findProposalById,
  insertProposal,
  listProposalRows,
  transitionProposalRow,
  updateProposalRow,
} from './repositories/proposals'
import type { ProposalRow, ProposalRowUpdate, ProposalTable } from './types'

const jsonObjectSchema = z.record(z.unknown())

type TimestampColumn = Exclude<keyof ProposalTable & `${string}_at`, 'updated_at'>

const STATUS_TIMESTAMP_COLUMN: Readonly<Record<ProposalStatus, TimestampColumn>> = {
  [ProposalStatus.PENDING]: 'created_at',
  [ProposalStatus.SENT_FOR_CONSENSUS]: 'sent_for_consensus_at',
  [ProposalStatus.CONSENSUS_REACHED]: 'consensus_reached_at',
  [ProposalStatus.CONSENSUS_FAILED]: 'consensus_failed_at',
  [ProposalStatus.EXECUTING]: 'execution_started_at',
  [ProposalStatus.APPLIED]: 'applied_at',
  [ProposalStatus.FAILED]: 'failed_at',
  [ProposalStatus.ROLLED_BACK]: 'rolled_back_at',
}

function parseJson<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  text: string,
  column: string
): T {
  const parsed = schema.safeParse(JSON.parse(text))
  if (!parsed.success) {
    throw new PersistenceError(`decode proposals.${column}`, parsed.error)
  }
  return parsed.data
}

function toDate(seconds: number | null): Date | null {
  return seconds === null ? null : new Date(seconds * 1000)
}

function dbRowToProposal(row: ProposalRow): Proposal {
  if (!isProposalStatus(row.status)) {
    throw new PersistenceError('decode proposals.status', `unknown status "${row.status}"`)
  }
  return {
    id: row.id,
    instanceId: row.instance_id,
    agentType: row.agent_type,
    agentId: row.agent_id,
    change: parseJson(changePayloadSchema, row.change, 'change'),
    metadata: parseJson(jsonObjectSchema, row.metadata, 'metadata'),
    safetyProfile: fromWireSafetyProfile(
      parseJson(wireSafetyProfileSchema, row.safety_profile, 'safety_profile')
    ),
    impactScore: row.impact_score,
    riskScore: row.risk_score,
    status: row.status,
    consensusVotes: parseJson(jsonObjectSchema, row.consensus_votes, 'consensus_votes'),
    consensusScore: row.consensus_score,
    metricsBefore: row.metrics_before
      ? parseJson(jsonObjectSchema, row.metrics_before, 'metrics_before')
      : null,
    metricsAfter: row.metrics_after
      ? parseJson(jsonObjectSchema, row.metrics_after, 'metrics_after')
      : null,
    rollbackReason: row.rollback_reason,
    failureReason: row.failure_reason,
    createdAt: new Date(row.created_at * 1000),
    updatedAt: new Date(row.updated_at * 1000),
    sentForConsensusAt: toDate(row.sent_for_consensus_at),
    consensusReachedAt: toDate(row.consensus_reached_at),
    consensusFailedAt: toDate(row.consensus_failed_at),
    executionStartedAt: toDate(row.execution_started_at),
    appliedAt: toDate(row.applied_at),
    failedAt: toDate(row.failed_at),
    rolledBackAt: toDate(row.rolled_back_at),
  }
}

function patchToRow(patch: ProposalPatch): Omit<ProposalRowUpdate, 'id' | 'status' | 'updated_at'> {
  const set: Omit<ProposalRowUpdate, 'id' | 'status' | 'updated_at'> = {}
  if (patch.consensusVotes !== undefined) set.consensus_votes = JSON.stringify(patch.consensusVotes)
  if (patch.consensusScore !== undefined) set.consensus_score = patch.consensusScore
  if (patch.metricsAfter !== undefined) {
    set.metrics_after = patch.metricsAfter === null ? null : JSON.stringify(patch.metricsAfter)
  }
  if (patch.rollbackReason !== undefined) set.rollback_reason = patch.rollbackReason
  if (patch.failureReason !== undefined) set.failure_reason = patch.failureReason
  return set
}

export class DatabaseProposalStore implements ProposalStore {
  async create(input: CreateProposalInput): Promise<Proposal> {
    const row = await insertProposal({
      id: input.id,
      instance_id: input.instanceId,
      agent_type: input.agentType,
      agent_id: input.agentId,
      change: JSON.stringify(input.change),
      metadata: JSON.stringify(input.metadata),
      safety_profile: JSON.stringify(toWireSafetyProfile(input.safetyProfile)),
      impact_score: input.impactScore,
      risk_score: input.riskScore,
      status: ProposalStatus.PENDING,
      consensus_votes: '{}',
      consensus_score: null,
      metrics_before: input.metricsBefore ? JSON.stringify(input.metricsBefore) : null,
      metrics_after: null,
      rollback_reason: null,
      failure_reason: null,
    })
    return dbRowToProposal(row)
  }

  async get(id: string): Promise<Proposal | null> {
    const row = await findProposalById(id)
    return row ? dbRowToProposal(row) : null
  }

  async list(options?: ListProposalsOptions): Promise<Proposal[]> {
    const rows = await listProposalRows(options)
    return rows.map(dbRowToProposal)
  }

  async transition(id: string, input: TransitionInput): Promise<Proposal | null> {
    const set = patchToRow(input.patch ?? {})
    set[STATUS_TIMESTAMP_COLUMN[input.to]] = Math.floor(Date.now() / 1000)
    const row = await transitionProposalRow(
      id,
      input.from ?? allowedSources(input.to),
      input.to,
      set
    )
    return row ? dbRowToProposal(row) : null
  }

  async update(id: string, patch: ProposalPatch): Promise<Proposal | null> {
    const row = await updateProposalRow(id, patchToRow(patch))
    return row ? dbRowToProposal(row) : null
  }
}
