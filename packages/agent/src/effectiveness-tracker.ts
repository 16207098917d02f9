import type { LoopSettings } from '@fleetwise/config'
import {
  createLogger,
  type ValidationCheckRun,
  type ValidationHistorySource,
} from '@fleetwise/core'

const log = createLogger('EffectivenessTracker')

export type TimeRange = 'last_hour' | 'last_day' | 'last_week'

const TIME_RANGE_MS: Readonly<Record<TimeRange, number>> = {
  last_hour: 60 * 60 * 1000,
  last_day: 24 * 60 * 60 * 1000,
  last_week: 7 * 24 * 60 * 60 * 1000,
}

export const DEFAULT_MIN_DATA_POINTS = 10
export const DEFAULT_IMPROVEMENT_THRESHOLD = 0.7

export interface CheckPerformance {
  checkId: string
  effectivenessScore: number
  truePositives: number
  falsePositives: number
  avgRuntimeMs: number
  costBenefitRatio: number
  recommendation: string
}

export interface ImprovementOpportunity {
  checkId: string
  effectiveness: number
  runtimeMs: number
  costBenefitRatio: number
  issue: string
  recommendation: string
  /** 1 is most urgent */
  priority: 1 | 2 | 3
}

export interface CheckTimeShare {
  checkId: string
  avgRuntimeMs: number
  /** Share of the summed average runtimes, in percent, one decimal */
  percentOfTotal: number
}

export interface TimeBudgetAnalysis {
  timeRange: TimeRange
  totalAvgValidationTimeMs: number | null
  checksByTime: CheckTimeShare[]
  bottleneckCheck: string | null
  optimizationOpportunity: string | null
}

export interface EffectivenessTrackerOptions {
  history: ValidationHistorySource
  minDataPoints?: number
  now?: () => Date
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`
}

function average(values: number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

function groupByCheck(runs: ValidationCheckRun[]): Map<string, ValidationCheckRun[]> {
  const grouped = new Map<string, ValidationCheckRun[]>()
  for (const run of runs) {
    const existing = grouped.get(run.checkId)
    if (existing) {
      existing.push(run)
    } else {
      grouped.set(run.checkId, [run])
    }
  }
  return grouped
}

function effectivenessOf(runs: ValidationCheckRun[]): number {
  if (runs.length === 0) return 0
  return runs.filter((run) => run.result === 'pass').length / runs.length
}

/** Caught issues per second of check runtime. */
export function costBenefit(truePositives: number, avgRuntimeMs: number): number {
  if (avgRuntimeMs === 0 || truePositives === 0) return 0
  return truePositives / (avgRuntimeMs / 1000)
}

export function recommend(
  effectiveness: number,
  costBenefitRatio: number,
  avgRuntimeMs: number
): string {
  if (effectiveness < 0.5) {
    return `DISABLE - Low effectiveness (${percent(effectiveness)})`
  }
  if (effectiveness < 0.7 && avgRuntimeMs > 1000) {
    return `OPTIMIZE - Slow (${Math.round(avgRuntimeMs)}ms) with low benefit`
  }
  if (effectiveness > 0.9 && costBenefitRatio > 10) {
    return 'KEEP - Excellent effectiveness and efficiency'
  }
  if (effectiveness > 0.8) {
    return `KEEP - Good effectiveness (${percent(effectiveness)})`
  }
  return 'REVIEW - Consider improving or replacing'
}

function describeIssue(effectiveness: number, avgRuntimeMs: number): string {
  if (effectiveness < 0.5) {
    return `Low effectiveness (${percent(effectiveness)}) - many false positives`
  }
  if (effectiveness < 0.7 && avgRuntimeMs > 1000) {
    return `High cost (${Math.round(avgRuntimeMs)}ms) vs low benefit`
  }
  if (effectiveness < 0.7) return `Below threshold effectiveness (${percent(effectiveness)})`
  return 'Performance below optimal'
}

function improvementPriority(effectiveness: number): 1 | 2 | 3 {
  if (effectiveness < 0.5) return 1
  if (effectiveness < 0.7) return 2
  return 3
}

/**
 * Derives validation-check weights and recommendations from each check's own
 * pass/fail history. Nothing is cached: every call reads the window fresh.
 */
export class EffectivenessTracker {
  private readonly history: ValidationHistorySource
  private readonly minDataPoints: number
  private readonly now: () => Date

  constructor(options: EffectivenessTrackerOptions) {
    this.history = options.history
    this.minDataPoints = options.minDataPoints ?? DEFAULT_MIN_DATA_POINTS
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Pass-rate weights per check, normalized to sum to 1. Checks with fewer
   * than `minDataPoints` runs in the window are left out. When every eligible
   * check scores 0 the weights are split evenly.
   */
  async getValidationWeights(timeRange: TimeRange = 'last_week'): Promise<Record<string, number>> {
    const grouped = groupByCheck(await this.runsIn(timeRange))

    const eligible: Array<[string, number]> = []
    for (const [checkId, runs] of grouped) {
      if (runs.length >= this.minDataPoints) {
        eligible.push([checkId, effectivenessOf(runs)])
      } else {
        log.debug('Check excluded from weights; not enough data', {
          checkId,
          dataPoints: runs.length,
          minDataPoints: this.minDataPoints,
        })
      }
    }

    if (eligible.length === 0) {
      log.debug('No checks have the minimum data points', { timeRange })
      return {}
    }

    const total = eligible.reduce((sum, [, score]) => sum + score, 0)
    if (total === 0) {
      return Object.fromEntries(eligible.map(([checkId]) => [checkId, 1 / eligible.length]))
    }
    return Object.fromEntries(eligible.map(([checkId, score]) => [checkId, score / total]))
  }

  async analyzeCheckPerformance(
    checkId: string,
    timeRange: TimeRange = 'last_week'
  ): Promise<CheckPerformance | null> {
    const runs = await this.history.listRuns({ since: this.windowStart(timeRange), checkId })
    if (runs.length === 0) {
      log.debug('No data for check', { checkId, timeRange })
      return null
    }
    return this.analyzeRuns(checkId, runs)
  }

  /** Checks scoring below `threshold`, most urgent first. */
  async getImprovementOpportunities(
    options: { threshold?: number; timeRange?: TimeRange } = {}
  ): Promise<ImprovementOpportunity[]> {
    const threshold = options.threshold ?? DEFAULT_IMPROVEMENT_THRESHOLD
    const timeRange = options.timeRange ?? 'last_week'
    const grouped = groupByCheck(await this.runsIn(timeRange))

    const opportunities: ImprovementOpportunity[] = []
    for (const [checkId, runs] of grouped) {
      if (effectivenessOf(runs) >= threshold) continue
      const analysis = this.analyzeRuns(checkId, runs)
      opportunities.push({
        checkId,
        effectiveness: analysis.effectivenessScore,
        runtimeMs: analysis.avgRuntimeMs,
        costBenefitRatio: analysis.costBenefitRatio,
        issue: describeIssue(analysis.effectivenessScore, analysis.avgRuntimeMs),
        recommendation: analysis.recommendation,
        priority: improvementPriority(analysis.effectivenessScore),
      })
    }

    log.info('Improvement opportunities found', {
      timeRange,
      threshold,
      count: opportunities.length,
    })
    return opportunities.sort(
      (a, b) => a.priority - b.priority || a.checkId.localeCompare(b.checkId)
    )
  }

  /** How the average validation run's time splits across checks. */
  async getTimeBudgetAnalysis(timeRange: TimeRange = 'last_week'): Promise<TimeBudgetAnalysis> {
    const grouped = groupByCheck(await this.runsIn(timeRange))
    if (grouped.size === 0) {
      return {
        timeRange,
        totalAvgValidationTimeMs: null,
        checksByTime: [],
        bottleneckCheck: null,
        optimizationOpportunity: null,
      }
    }

    const averages = Array.from(grouped, ([checkId, runs]) => ({
      checkId,
      avgRuntimeMs: average(runs.map((run) => run.runtimeMs)),
    }))
    const total = averages.reduce((sum, entry) => sum + entry.avgRuntimeMs, 0)
    const checksByTime = averages
      .map((entry) => ({
        ...entry,
        percentOfTotal: total === 0 ? 0 : Math.round((entry.avgRuntimeMs / total) * 1000) / 10,
      }))
      .sort((a, b) => b.avgRuntimeMs - a.avgRuntimeMs || a.checkId.localeCompare(b.checkId))

    const bottleneck = checksByTime[0]
    return {
      timeRange,
      totalAvgValidationTimeMs: total,
      checksByTime,
      bottleneckCheck: bottleneck?.checkId ?? null,
      optimizationOpportunity: bottleneck
        ? `Parallelize ${bottleneck.checkId} (${Math.round(bottleneck.avgRuntimeMs)}ms)`
        : null,
    }
  }

  private analyzeRuns(checkId: string, runs: ValidationCheckRun[]): CheckPerformance {
    const effectiveness = effectivenessOf(runs)
    const avgRuntimeMs = average(runs.map((run) => run.runtimeMs))
    const truePositives = runs.filter((run) => run.result === 'pass').length
    const falsePositives = runs.length - truePositives
    const ratio = costBenefit(truePositives, avgRuntimeMs)

    return {
      checkId,
      effectivenessScore: effectiveness,
      truePositives,
      falsePositives,
      avgRuntimeMs,
      costBenefitRatio: ratio,
      recommendation: recommend(effectiveness, ratio, avgRuntimeMs),
    }
  }

  private runsIn(timeRange: TimeRange): Promise<ValidationCheckRun[]> {
    return this.history.listRuns({ since: this.windowStart(timeRange) })
  }

  private windowStart(timeRange: TimeRange): Date {
    return new Date(this.now().getTime() - TIME_RANGE_MS[timeRange])
  }
}

/** Builds a tracker from the loop settings' minimum run count. */
export function createEffectivenessTracker(
  history: ValidationHistorySource,
  settings: Pick<LoopSettings, 'minDataPoints'>
): EffectivenessTracker {
  return new EffectivenessTracker({ history, minDataPoints: settings.minDataPoints })
}

/** Test and embedding helper: history kept in process memory. */
export class InMemoryValidationHistory implements ValidationHistorySource {
  private runs: ValidationCheckRun[] = []

  record(run: ValidationCheckRun): void {
    this.runs.push({ ...run })
  }

  listRuns(options: { since: Date; checkId?: string }): Promise<ValidationCheckRun[]> {
    const since = options.since.getTime()
    return Promise.resolve(
      this.runs
        .filter(
          (run) =>
            run.timestamp.getTime() >= since &&
            (options.checkId === undefined || run.checkId === options.checkId)
        )
        .map((run) => ({ ...run }))
    )
  }
}
