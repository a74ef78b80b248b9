import type { OverallHealth, PackageHealth, Vulnerability } from '@dephealth/core'

export interface PackageHealthResponse {
  name: string
  current_version: string | null
  latest_version: string | null
  is_outdated: boolean
  has_vulnerabilities: boolean
  vulnerability_count: number
  is_deprecated: boolean
  health_score: number
  recommendation: string
  vulnerabilities: Vulnerability[]
}

export interface OverallHealthResponse {
  total_packages: number
  outdated_count: number
  vulnerable_count: number
  deprecated_count: number
  overall_health_score: number
  packages: PackageHealthResponse[]
}

export function toPackageResponse(p: PackageHealth): PackageHealthResponse {
  return {
    name: p.name,
    current_version: p.currentVersion ?? null,
    latest_version: p.latestVersion ?? null,
    is_outdated: p.isOutdated,
    has_vulnerabilities: p.hasVulnerabilities,
    vulnerability_count: p.vulnerabilityCount,
    is_deprecated: p.isDeprecated,
    health_score: p.healthScore,
    recommendation: p.recommendation,
    vulnerabilities: p.vulnerabilities
  }
}

export function toOverallResponse(o: OverallHealth): OverallHealthResponse {
  return {
    total_packages: o.totalPackages,
    outdated_count: o.outdatedCount,
    vulnerable_count: o.vulnerableCount,
    deprecated_count: o.deprecatedCount,
    overall_health_score: o.overallHealthScore,
    packages: o.packages.map(toPackageResponse)
  }
}
