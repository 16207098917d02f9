import type { Generated, Insertable, Selectable, Updateable } from 'kysely'

// ============================================================================
// Database Interface - Single source of truth for both SQLite and Postgres
// ============================================================================

export interface Database {
  proposals: ProposalTable
  routing_decisions: RoutingDecisionTable
  aggregated_metrics: AggregatedMetricTable
  model_scores: ModelScoreTable
  validation_check_records: ValidationCheckRecordTable
  queue_messages: QueueMessageTable
}

// ============================================================================
// Proposals (agent-initiated changes and their lifecycle)
// ============================================================================

export interface ProposalTable {
  id: string
  instance_id: string
  agent_type: string
  agent_id: string | null
  change: string // JSON, always carries a `type` field
  metadata: string // JSON
  safety_profile: string // JSON snapshot taken at creation
  impact_score: number
  risk_score: number
  status: Generated<string> // ProposalStatus
  consensus_votes: Generated<string> // JSON
  consensus_score: number | null
  metrics_before: string | null // JSON
  metrics_after: string | null // JSON
  rollback_reason: string | null
  failure_reason: string | null
  sent_for_consensus_at: number | null
  consensus_reached_at: number | null
  consensus_failed_at: number | null
  execution_started_at: number | null
  applied_at: number | null
  failed_at: number | null
  rolled_back_at: number | null
  created_at: Generated<number>
  updated_at: Generated<number>
}

export type ProposalRow = Selectable<ProposalTable>
export type NewProposalRow = Insertable<ProposalTable>
export type ProposalRowUpdate = Updateable<ProposalTable>

// ============================================================================
// Routing Decisions (append-only audit trail)
// ============================================================================

export interface RoutingDecisionTable {
  id: string
  message_id: string // queue message id, unique
  instance_id: string
  complexity_level: string // 'simple' | 'medium' | 'complex'
  model_name: string
  provider: string
  score: number
  outcome: string // 'routed' | 'success' | 'failure'
  response_time_ms: number | null
  capabilities_required: string | null // JSON array
  preference: string | null
  timestamp: number
  created_at: Generated<number>
}

export type RoutingDecision = Selectable<RoutingDecisionTable>
export type NewRoutingDecision = Insertable<RoutingDecisionTable>

// ============================================================================
// Aggregated Metrics (running stats per model and complexity)
// ============================================================================

export interface AggregatedMetricTable {
  id: string
  model_name: string
  complexity_level: string
  usage_count: number
  success_count: number
  avg_response_time_ms: number | null
  response_time_samples: number
  created_at: Generated<number>
  updated_at: number
}

export type AggregatedMetric = Selectable<AggregatedMetricTable>
export type NewAggregatedMetric = Insertable<AggregatedMetricTable>
export type AggregatedMetricUpdate = Updateable<AggregatedMetricTable>

// ============================================================================
// Model Scores (current learned score per model and complexity)
// ============================================================================

export interface ModelScoreTable {
  id: string
  model_name: string
  complexity_level: string
  score: number
  based_on_samples: number
  created_at: Generated<number>
  updated_at: number
}

export type ModelScore = Selectable<ModelScoreTable>
export type NewModelScore = Insertable<ModelScoreTable>

// ============================================================================
// Validation Check Records (append-only run history)
// ============================================================================

export interface ValidationCheckRecordTable {
  id: string
  check_id: string
  result: string // 'pass' | 'fail'
  runtime_ms: number
  timestamp: number
  created_at: Generated<number>
}

export type ValidationCheckRecord = Selectable<ValidationCheckRecordTable>
export type NewValidationCheckRecord = Insertable<ValidationCheckRecordTable>

// ============================================================================
// Queue Messages (durable at-least-once queue)
// ============================================================================

export interface QueueMessageTable {
  id: string
  queue_name: string
  payload: string // JSON
  status: Generated<string> // 'pending' | 'acked'
  enqueued_at_ms: number
  visible_at_ms: number // lease expiry while a delivery is outstanding
  ack_token: string | null
  delivery_count: Generated<number>
  acked_at: number | null
  created_at: Generated<number>
}

export type QueueMessage = Selectable<QueueMessageTable>
export type NewQueueMessage = Insertable<QueueMessageTable>
export type QueueMessageUpdate = Updateable<QueueMessageTable>
