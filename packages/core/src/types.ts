export type Ecosystem = 'python' | 'npm'

// Ecosystem tag used by the vulnerability database
export type VulnEcosystem = 'PyPI' | 'npm'

export interface Dependency {
  readonly name: string
  readonly version?: string
}

export interface RegistryInfo {
  latestVersion?: string
  // only meaningful when both the declared and the latest version are known
  isOutdated: boolean
  isDeprecated: boolean
}

export interface Vulnerability {
  id: string
  summary: string
  severity: string
  published: string
}

export interface HealthVerdict {
  healthScore: number
  recommendation: string
}

export interface PackageHealth extends HealthVerdict {
  name: string
  currentVersion?: string
  latestVersion?: string
  isOutdated: boolean
  hasVulnerabilities: boolean
  vulnerabilityCount: number
  isDeprecated: boolean
  vulnerabilities: Vulnerability[]
}

export interface OverallHealth {
  totalPackages: number
  outdatedCount: number
  vulnerableCount: number
  deprecatedCount: number
  overallHealthScore: number
  packages: PackageHealth[]
}
