import type { HealthVerdict } from '../types.js'

export const MAX_SCORE = 100

export const PENALTIES = {
  outdated: 20,
  perVulnerability: 15,
  maxVulnerabilities: 50,
  deprecated: 30
} as const

export const RECOMMENDATIONS = {
  deprecated: '⚠️ CRITICAL: Package is deprecated. Find an alternative immediately.',
  vulnerable: (count: number) => `🚨 URGENT: ${count} vulnerabilities found. Update immediately.`,
  outdated: '⚡ Update recommended to latest version.',
  healthy: '✅ Package is healthy and up-to-date.'
} as const

export interface HealthSignals {
  isOutdated: boolean
  vulnerabilityCount: number
  isDeprecated: boolean
}

export function computeHealthScore({ isOutdated, vulnerabilityCount, isDeprecated }: HealthSignals): number {
  let score = MAX_SCORE
  if (isOutdated) score -= PENALTIES.outdated
  if (vulnerabilityCount > 0) score -= Math.min(vulnerabilityCount * PENALTIES.perVulnerability, PENALTIES.maxVulnerabilities)
  if (isDeprecated) score -= PENALTIES.deprecated
  return Math.max(score, 0)
}

// First match wins, independent of the numeric score
export function recommend({ isOutdated, vulnerabilityCount, isDeprecated }: HealthSignals): string {
  if (isDeprecated) return RECOMMENDATIONS.deprecated
  if (vulnerabilityCount > 0) return RECOMMENDATIONS.vulnerable(vulnerabilityCount)
  if (isOutdated) return RECOMMENDATIONS.outdated
  return RECOMMENDATIONS.healthy
}

export function evaluateHealth(signals: HealthSignals): HealthVerdict {
  return { healthScore: computeHealthScore(signals), recommendation: recommend(signals) }
}
