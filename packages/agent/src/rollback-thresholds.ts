import type { SafetyProfile } from '@fleetwise/core'

export const MIN_SUCCESS_RATE = 0.9
export const MAX_LATENCY_P95_MS = 3000
export const MAX_COST_CENTS = 10

function numeric(metrics: Record<string, unknown>, key: string): number | null {
  const value = metrics[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

/**
 * Checks post-change metrics against the guardian thresholds. Returns a
 * description of every breached threshold, or an empty list. Metrics that are
 * absent are not evaluated.
 */
export function findThresholdBreaches(
  metrics: Record<string, unknown>,
  profile: Pick<SafetyProfile, 'errorThreshold'>
): string[] {
  const breaches: string[] = []

  const successRate = numeric(metrics, 'success_rate')
  if (successRate !== null && successRate < MIN_SUCCESS_RATE) {
    breaches.push(`success_rate ${successRate} < ${MIN_SUCCESS_RATE}`)
  }

  const errorRate = numeric(metrics, 'error_rate')
  if (errorRate !== null && errorRate > profile.errorThreshold) {
    breaches.push(`error_rate ${errorRate} > ${profile.errorThreshold}`)
  }

  const latency = numeric(metrics, 'latency_p95_ms')
  if (latency !== null && latency > MAX_LATENCY_P95_MS) {
    breaches.push(`latency_p95_ms ${latency} > ${MAX_LATENCY_P95_MS}`)
  }

  const cost = numeric(metrics, 'cost_cents')
  if (cost !== null && cost > MAX_COST_CENTS) {
    breaches.push(`cost_cents ${cost} > ${MAX_COST_CENTS}`)
  }

  return breaches
}
