export * from './types.js'
export * from './errors.js'
export * from './config.js'
export * from './logger.js'
export { leadingVersion, normalizeVersion } from './normalize.js'
export { parseConstraint, parseConstraintList, parseRequirementLine, parseRequirementsText } from './parsers/python/requirements.js'
export { mergeDependencyMaps, parseDependencyMap, parsePackageJsonText, type DependencyMap } from './parsers/npm/package-json.js'
export { registryClientFor, NpmRegistryClient, PypiRegistryClient, NO_REGISTRY_DATA, type RegistryClient } from './collectors/registry/index.js'
export { lookupVulnerabilities, mapAdvisory, osvEcosystem, DEFAULT_SUMMARY, UNKNOWN_SEVERITY } from './collectors/vulns/osv.js'
export { computeHealthScore, evaluateHealth, recommend, MAX_SCORE, PENALTIES, RECOMMENDATIONS, type HealthSignals } from './scoring/index.js'
export { analyzeDependencies, checkPackage, summarize } from './aggregate.js'
