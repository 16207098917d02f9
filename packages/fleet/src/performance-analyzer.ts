import { createLogger } from '@fleetwise/core'
import type { AggregatedMetric } from '@fleetwise/database'

const log = createLogger('PerformanceAnalyzer')

export const LOW_SUCCESS_RATE_THRESHOLD = 0.85
export const SLOW_RESPONSE_THRESHOLD_MS = 5000

export type AdvisoryKind = 'low_success_rate' | 'slow_response'

export interface PerformanceAdvisory {
  kind: AdvisoryKind
  modelName: string
  complexityLevel: string
  value: number
  threshold: number
  message: string
}

export type AggregateSnapshot = Pick<
  AggregatedMetric,
  'model_name' | 'complexity_level' | 'usage_count' | 'success_count' | 'avg_response_time_ms'
>

export type AdvisorySink = (advisories: PerformanceAdvisory[]) => void | Promise<void>

/** Advisories for one aggregate row. Never writes anything. */
export function analyzeAggregate(metric: AggregateSnapshot): PerformanceAdvisory[] {
  const advisories: PerformanceAdvisory[] = []
  const key = `${metric.model_name}/${metric.complexity_level}`

  if (metric.usage_count > 0) {
    const successRate = metric.success_count / metric.usage_count
    if (successRate < LOW_SUCCESS_RATE_THRESHOLD) {
      advisories.push({
        kind: 'low_success_rate',
        modelName: metric.model_name,
        complexityLevel: metric.complexity_level,
        value: successRate,
        threshold: LOW_SUCCESS_RATE_THRESHOLD,
        message: `${key} success rate ${(successRate * 100).toFixed(1)}% below 85%`,
      })
    }
  }

  const avg = metric.avg_response_time_ms
  if (avg !== null && avg > SLOW_RESPONSE_THRESHOLD_MS) {
    advisories.push({
      kind: 'slow_response',
      modelName: metric.model_name,
      complexityLevel: metric.complexity_level,
      value: avg,
      threshold: SLOW_RESPONSE_THRESHOLD_MS,
      message: `${key} average response ${Math.round(avg)}ms above 5000ms`,
    })
  }

  return advisories
}

/**
 * Returns a fire-and-forget analyzer: advisories are logged and handed to
 * `sink`, whose failures are logged and never reach the caller.
 */
export function createPerformanceAnalyzer(
  sink?: AdvisorySink
): (metric: AggregateSnapshot) => void {
  return (metric) => {
    const advisories = analyzeAggregate(metric)
    if (advisories.length === 0) return

    for (const advisory of advisories) {
      log.warn(advisory.message, { kind: advisory.kind })
    }
    if (!sink) return

    void Promise.resolve()
      .then(() => sink(advisories))
      .catch((error: unknown) => {
        log.error('Advisory sink failed', error, { count: advisories.length })
      })
  }
}
