export {
  getDb,
  closeDb,
  getDatabaseType,
  isPostgresUrl,
  type DatabaseType,
  DEFAULT_SQLITE_PATH,
} from './db'
export { migrateToLatest, runMigrations } from './migrate'
export * from './types'
export * from './repositories'
export { DatabaseProposalStore } from './proposal-store'
export { DatabaseDurableQueue, type DatabaseDurableQueueOptions } from './durable-queue'
export { DatabaseValidationHistory } from './validation-history'
