import { z } from 'zod'
import type { HealthContext } from '../../config.js'
import type { RegistryInfo } from '../../types.js'
import { fetchJson } from '../../http.js'
import { NO_REGISTRY_DATA, type RegistryClient } from './types.js'

// https://warehouse.pypa.io/api-reference/json.html
const PypiProject = z.object({
  info: z.object({ version: z.string().min(1) }),
  releases: z.record(z.unknown()).optional()
})

export class PypiRegistryClient implements RegistryClient {
  constructor(private readonly ctx: HealthContext) {}

  async lookup(name: string, declaredVersion?: string): Promise<RegistryInfo> {
    const url = `${this.ctx.config.registryBaseUrls.python}/${encodeURIComponent(name)}/json`
    try {
      const data = await fetchJson(this.ctx, url, PypiProject)
      const latestVersion = data.info.version
      this.ctx.logger.debug({ package: name, latestVersion, releases: Object.keys(data.releases ?? {}).length }, 'PyPI lookup')
      return {
        latestVersion,
        isOutdated: declaredVersion ? declaredVersion !== latestVersion : false,
        // PyPI has no project-level deprecation marker
        isDeprecated: false
      }
    } catch (err) {
      this.ctx.logger.warn({ err, package: name, ecosystem: 'python' }, 'PyPI lookup failed')
      return { ...NO_REGISTRY_DATA }
    }
  }
}
