import type { HealthContext } from '../../config.js'
import type { Ecosystem } from '../../types.js'
import { NpmRegistryClient } from './npm.js'
import { PypiRegistryClient } from './pypi.js'
import type { RegistryClient } from './types.js'

export function registryClientFor(ecosystem: Ecosystem, ctx: HealthContext): RegistryClient {
  switch (ecosystem) {
    case 'python': return new PypiRegistryClient(ctx)
    case 'npm': return new NpmRegistryClient(ctx)
  }
}

export { NpmRegistryClient, PypiRegistryClient }
export { NO_REGISTRY_DATA, type RegistryClient } from './types.js'
