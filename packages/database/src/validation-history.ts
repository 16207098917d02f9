import type { ValidationCheckRun, ValidationHistorySource } from '@fleetwise/core'
import { listValidationCheckRecords } from './repositories/validation-checks'

export class DatabaseValidationHistory implements ValidationHistorySource {
  async listRuns(options: { since: Date; checkId?: string }): Promise<ValidationCheckRun[]> {
    const rows = await listValidationCheckRecords({
      since: Math.floor(options.since.getTime() / 1000),
      checkId: options.checkId,
    })
    const runs: ValidationCheckRun[] = []
    for (const row of rows) {
      if (row.result !== 'pass' && row.result !== 'fail') continue
      runs.push({
        checkId: row.check_id,
        result: row.result,
        runtimeMs: row.runtime_ms,
        timestamp: new Date(row.timestamp * 1000),
      })
    }
    return runs
  }
}
