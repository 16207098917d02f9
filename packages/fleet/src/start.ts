import { createLogger } from '@fleetwise/core'
import { runMigrations } from '@fleetwise/database'
import { ensureFleetWorkers } from './fleet-workers'

const log = createLogger('Fleet')

async function main(): Promise<void> {
  await runMigrations()
  ensureFleetWorkers({
    keepAlive: true,
    handleSignals: true,
    onFatal: (error) => {
      log.error('Fleet loop halted', error)
    },
  })
}

main().catch((error: unknown) => {
  log.error('Fleet failed to start', error)
  process.exit(1)
})
