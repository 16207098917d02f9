export type ValidationCheckResult = 'pass' | 'fail'

export interface ValidationCheckRun {
  checkId: string
  result: ValidationCheckResult
  runtimeMs: number
  timestamp: Date
}

/** Read side of the local check-run history. */
export interface ValidationHistorySource {
  /** Runs recorded at or after `since`, optionally for a single check. */
  listRuns(options: { since: Date; checkId?: string }): Promise<ValidationCheckRun[]>
}
