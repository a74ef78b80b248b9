import type { HealthContext } from './config.js'
import type { Dependency, Ecosystem, OverallHealth, PackageHealth } from './types.js'
import { registryClientFor } from './collectors/registry/index.js'
import { lookupVulnerabilities } from './collectors/vulns/osv.js'
import { evaluateHealth } from './scoring/index.js'

export async function checkPackage(dep: Dependency, ecosystem: Ecosystem, ctx: HealthContext): Promise<PackageHealth> {
  const [registry, vulnerabilities] = await Promise.all([
    registryClientFor(ecosystem, ctx).lookup(dep.name, dep.version),
    lookupVulnerabilities(dep.name, ecosystem, ctx)
  ])
  const signals = {
    isOutdated: registry.isOutdated,
    vulnerabilityCount: vulnerabilities.length,
    isDeprecated: registry.isDeprecated
  }
  return {
    name: dep.name,
    currentVersion: dep.version,
    latestVersion: registry.latestVersion,
    ...signals,
    hasVulnerabilities: vulnerabilities.length > 0,
    ...evaluateHealth(signals),
    vulnerabilities
  }
}

export function summarize(packages: PackageHealth[]): OverallHealth {
  let outdatedCount = 0
  let vulnerableCount = 0
  let deprecatedCount = 0
  let total = 0
  for (const p of packages) {
    if (p.isOutdated) outdatedCount++
    if (p.hasVulnerabilities) vulnerableCount++
    if (p.isDeprecated) deprecatedCount++
    total += p.healthScore
  }
  return {
    totalPackages: packages.length,
    outdatedCount,
    vulnerableCount,
    deprecatedCount,
    overallHealthScore: packages.length === 0 ? 0 : Math.floor(total / packages.length),
    packages
  }
}

/** Output order matches `deps`; lookups run `config.concurrency` dependencies at a time. */
export async function analyzeDependencies(deps: readonly Dependency[], ecosystem: Ecosystem, ctx: HealthContext): Promise<OverallHealth> {
  const results: PackageHealth[] = []
  const conc = ctx.config.concurrency
  for (let i = 0; i < deps.length; i += conc) {
    results.push(...await Promise.all(deps.slice(i, i + conc).map(d => checkPackage(d, ecosystem, ctx))))
  }
  ctx.logger.info({ ecosystem, packages: results.length }, 'dependency batch analyzed')
  return summarize(results)
}
