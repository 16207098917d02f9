import { z } from 'zod'
import type { SafetyProfile } from './safety-profile'

export const complexityLevelSchema = z.enum(['simple', 'medium', 'complex'])
export type ComplexityLevel = z.infer<typeof complexityLevelSchema>

export const routingOutcomeSchema = z.enum(['routed', 'success', 'failure'])
export type RoutingOutcome = z.infer<typeof routingOutcomeSchema>

export const routingDecisionMessageSchema = z.object({
  instance_id: z.string().min(1),
  complexity: complexityLevelSchema,
  model: z.string().min(1),
  provider: z.string().min(1),
  score: z.number().finite(),
  outcome: routingOutcomeSchema,
  response_time_ms: z.number().finite().nonnegative().nullish(),
  capabilities_required: z.array(z.string()).optional(),
  preference: z.string().optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
})
export type RoutingDecisionMessage = z.infer<typeof routingDecisionMessageSchema>

export const scoreUpdateMessageSchema = z.object({
  model: z.string().min(1),
  complexity: complexityLevelSchema,
  old_score: z.number().finite(),
  new_score: z.number().finite(),
  reason: z.string(),
  confidence: z.number().min(0).max(1),
  based_on_samples: z.number().int().nonnegative(),
  timestamp: z.string().datetime({ offset: true }),
})
export type ScoreUpdateMessage = z.infer<typeof scoreUpdateMessageSchema>

export const agentMetricMessageSchema = z.object({
  agent_type: z.string().min(1),
  metric_name: z.string().min(1),
  value: z.number().finite(),
  timestamp: z.string().datetime({ offset: true }),
})
export type AgentMetricMessage = z.infer<typeof agentMetricMessageSchema>

export const agentMetricsBatchSchema = z.object({
  instance_id: z.string().min(1),
  sent_at: z.string().datetime({ offset: true }),
  metrics: z.array(agentMetricMessageSchema),
})
export type AgentMetricsBatch = z.infer<typeof agentMetricsBatchSchema>

export const wireSafetyProfileSchema = z.object({
  error_threshold: z.number().min(0).max(1),
  needs_consensus: z.boolean(),
  max_blast_radius: z.enum(['low', 'medium', 'high']),
  auto_rollback: z.boolean(),
  success_rate: z.number(),
  cost_factor: z.number(),
})
export type WireSafetyProfile = z.infer<typeof wireSafetyProfileSchema>

export function toWireSafetyProfile(profile: SafetyProfile): WireSafetyProfile {
  return {
    error_threshold: profile.errorThreshold,
    needs_consensus: profile.needsConsensus,
    max_blast_radius: profile.maxBlastRadius,
    auto_rollback: profile.autoRollback,
    success_rate: profile.successRate,
    cost_factor: profile.costFactor,
  }
}

export function fromWireSafetyProfile(wire: WireSafetyProfile): SafetyProfile {
  return {
    errorThreshold: wire.error_threshold,
    needsConsensus: wire.needs_consensus,
    maxBlastRadius: wire.max_blast_radius,
    autoRollback: wire.auto_rollback,
    successRate: wire.success_rate,
    costFactor: wire.cost_factor,
  }
}

/** Change payloads are opaque apart from a non-empty `type`. */
export const changePayloadSchema = z.object({ type: z.string().min(1) }).passthrough()

export const consensusRequestSchema = z.object({
  proposal_id: z.string().min(1),
  instance_id: z.string().min(1),
  agent_type: z.string().min(1),
  change: changePayloadSchema,
  safety_profile: wireSafetyProfileSchema,
  priority_score: z.number(),
  timestamp: z.string().datetime({ offset: true }),
})
export type ConsensusRequest = z.infer<typeof consensusRequestSchema>

export const consensusResponseSchema = z.object({
  proposal_id: z.string().min(1),
  decision: z.enum(['approved', 'rejected']),
  votes: z.record(z.unknown()).default({}),
  consensus_score: z.number().finite().nullish(),
})
export type ConsensusResponse = z.infer<typeof consensusResponseSchema>

export const learnedPatternMessageSchema = z.object({
  instance_id: z.string().min(1),
  agent_type: z.string().min(1),
  category: z.string().min(1),
  pattern: z.record(z.unknown()),
  timestamp: z.string().datetime({ offset: true }),
})
export type LearnedPatternMessage = z.infer<typeof learnedPatternMessageSchema>

export const rollbackEventSchema = z.object({
  proposal_id: z.string().min(1),
  reason: z.string().optional(),
})
export type RollbackEvent = z.infer<typeof rollbackEventSchema>
