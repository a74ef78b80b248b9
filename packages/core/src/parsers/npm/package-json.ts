import type { Dependency } from '../../types.js'
import { normalizeVersion } from '../../normalize.js'

export type DependencyMap = Record<string, string>

/** devDependencies override dependencies of the same name. */
export function mergeDependencyMaps(deps?: DependencyMap | null, devDeps?: DependencyMap | null): DependencyMap {
  return { ...(deps ?? {}), ...(devDeps ?? {}) }
}

export function parseDependencyMap(map: DependencyMap): Dependency[] {
  return Object.entries(map).map(([name, range]) => {
    const version = normalizeVersion(range)
    return version === undefined ? { name } : { name, version }
  })
}

export function parsePackageJsonText(jsonText: string): Dependency[] {
  let data: unknown
  try {
    data = JSON.parse(jsonText)
  } catch {
    return []
  }
  if (!isObject(data)) return []
  return parseDependencyMap(mergeDependencyMaps(stringEntries(data.dependencies), stringEntries(data.devDependencies)))
}

function stringEntries(value: unknown): DependencyMap {
  const out: DependencyMap = {}
  if (!isObject(value)) return out
  for (const [name, range] of Object.entries(value)) {
    if (typeof range === 'string') out[name] = range
  }
  return out
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value)
}
