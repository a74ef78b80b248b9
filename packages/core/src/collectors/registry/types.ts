import type { RegistryInfo } from '../../types.js'

export interface RegistryClient {
  lookup(name: string, declaredVersion?: string): Promise<RegistryInfo>
}

export const NO_REGISTRY_DATA: Readonly<RegistryInfo> = Object.freeze({
  latestVersion: undefined,
  isOutdated: false,
  isDeprecated: false
})
