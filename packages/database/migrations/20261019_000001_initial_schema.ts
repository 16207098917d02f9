import { Kysely, sql } from 'kysely'

const isPostgres =
  (process.env.DATABASE_URL || '').startsWith('postgres://') ||
  (process.env.DATABASE_URL || '').startsWith('postgresql://')

const defaultTimestamp = isPostgres ? sql`extract(epoch from now())::integer` : sql`(unixepoch())`
// Also used for millisecond epochs, which overflow a Postgres integer
const realType = isPostgres ? 'double precision' : 'real'

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('proposals')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('instance_id', 'text', (col) => col.notNull())
    .addColumn('agent_type', 'text', (col) => col.notNull())
    .addColumn('agent_id', 'text')
    .addColumn('change', 'text', (col) => col.notNull())
    .addColumn('metadata', 'text', (col) => col.notNull().defaultTo('{}'))
    .addColumn('safety_profile', 'text', (col) => col.notNull())
    .addColumn('impact_score', realType, (col) => col.notNull())
    .addColumn('risk_score', realType, (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('pending'))
    .addColumn('consensus_votes', 'text', (col) => col.notNull().defaultTo('{}'))
    .addColumn('consensus_score', realType)
    .addColumn('metrics_before', 'text')
    .addColumn('metrics_after', 'text')
    .addColumn('rollback_reason', 'text')
    .addColumn('failure_reason', 'text')
    .addColumn('sent_for_consensus_at', 'integer')
    .addColumn('consensus_reached_at', 'integer')
    .addColumn('consensus_failed_at', 'integer')
    .addColumn('execution_started_at', 'integer')
    .addColumn('applied_at', 'integer')
    .addColumn('failed_at', 'integer')
    .addColumn('rolled_back_at', 'integer')
    .addColumn('created_at', 'integer', (col) => col.notNull().defaultTo(defaultTimestamp))
    .addColumn('updated_at', 'integer', (col) => col.notNull().defaultTo(defaultTimestamp))
    .execute()

  await db.schema
    .createIndex('idx_proposals_status_created')
    .ifNotExists()
    .on('proposals')
    .columns(['status', 'created_at'])
    .execute()

  await db.schema
    .createTable('routing_decisions')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('message_id', 'text', (col) => col.notNull().unique())
    .addColumn('instance_id', 'text', (col) => col.notNull())
    .addColumn('complexity_level', 'text', (col) => col.notNull())
    .addColumn('model_name', 'text', (col) => col.notNull())
    .addColumn('provider', 'text', (col) => col.notNull())
    .addColumn('score', realType, (col) => col.notNull())
    .addColumn('outcome', 'text', (col) => col.notNull())
    .addColumn('response_time_ms', realType)
    .addColumn('capabilities_required', 'text')
    .addColumn('preference', 'text')
    .addColumn('timestamp', 'integer', (col) => col.notNull())
    .addColumn('created_at', 'integer', (col) => col.notNull().defaultTo(defaultTimestamp))
    .execute()

  await db.schema
    .createIndex('idx_routing_decisions_timestamp_instance')
    .ifNotExists()
    .on('routing_decisions')
    .columns(['timestamp', 'instance_id'])
    .execute()

  await db.schema
    .createIndex('idx_routing_decisions_model_complexity')
    .ifNotExists()
    .on('routing_decisions')
    .columns(['model_name', 'complexity_level'])
    .execute()

  await db.schema
    .createTable('aggregated_metrics')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('model_name', 'text', (col) => col.notNull())
    .addColumn('complexity_level', 'text', (col) => col.notNull())
    .addColumn('usage_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('success_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('avg_response_time_ms', realType)
    .addColumn('response_time_samples', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'integer', (col) => col.notNull().defaultTo(defaultTimestamp))
    .addColumn('updated_at', 'integer', (col) => col.notNull().defaultTo(defaultTimestamp))
    .execute()

  await db.schema
    .createIndex('idx_aggregated_metrics_model_complexity')
    .ifNotExists()
    .on('aggregated_metrics')
    .columns(['model_name', 'complexity_level'])
    .unique()
    .execute()

  await db.schema
    .createTable('model_scores')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('model_name', 'text', (col) => col.notNull())
    .addColumn('complexity_level', 'text', (col) => col.notNull())
    .addColumn('score', realType, (col) => col.notNull())
    .addColumn('based_on_samples', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'integer', (col) => col.notNull().defaultTo(defaultTimestamp))
    .addColumn('updated_at', 'integer', (col) => col.notNull().defaultTo(defaultTimestamp))
    .execute()

  await db.schema
    .createIndex('idx_model_scores_model_complexity')
    .ifNotExists()
    .on('model_scores')
    .columns(['model_name', 'complexity_level'])
    .unique()
    .execute()

  await db.schema
    .createTable('validation_check_records')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('check_id', 'text', (col) => col.notNull())
    .addColumn('result', 'text', (col) => col.notNull())
    .addColumn('runtime_ms', realType, (col) => col.notNull())
    .addColumn('timestamp', 'integer', (col) => col.notNull())
    .addColumn('created_at', 'integer', (col) => col.notNull().defaultTo(defaultTimestamp))
    .execute()

  await db.schema
    .createIndex('idx_validation_check_records_check_timestamp')
    .ifNotExists()
    .on('validation_check_records')
    .columns(['check_id', 'timestamp'])
    .execute()

  await db.schema
    .createTable('queue_messages')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('queue_name', 'text', (col) => col.notNull())
    .addColumn('payload', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('pending'))
    .addColumn('enqueued_at_ms', realType, (col) => col.notNull())
    .addColumn('visible_at_ms', realType, (col) => col.notNull())
    .addColumn('ack_token', 'text')
    .addColumn('delivery_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('acked_at', 'integer')
    .addColumn('created_at', 'integer', (col) => col.notNull().defaultTo(defaultTimestamp))
    .execute()

  await db.schema
    .createIndex('idx_queue_messages_queue_status_visible')
    .ifNotExists()
    .on('queue_messages')
    .columns(['queue_name', 'status', 'visible_at_ms'])
    .execute()
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('queue_messages').ifExists().execute()
  await db.schema.dropTable('validation_check_records').ifExists().execute()
  await db.schema.dropTable('model_scores').ifExists().execute()
  await db.schema.dropTable('aggregated_metrics').ifExists().execute()
  await db.schema.dropTable('routing_decisions').ifExists().execute()
  await db.schema.dropTable('proposals').ifExists().execute()
}
