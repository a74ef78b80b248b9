import { z } from 'zod'
import type { HealthContext } from '../../config.js'
import type { RegistryInfo } from '../../types.js'
import { fetchJson } from '../../http.js'
import { NO_REGISTRY_DATA, type RegistryClient } from './types.js'

const DeprecationMarker = z.union([z.boolean(), z.string()]).optional()

const Packument = z.object({
  'dist-tags': z.object({ latest: z.string().optional() }).passthrough().optional(),
  deprecated: DeprecationMarker,
  // only the latest manifest is read; older ones are left unchecked
  versions: z.record(z.unknown()).optional()
})

const VersionManifest = z.object({ deprecated: DeprecationMarker.nullable() }).passthrough()

type Packument = z.infer<typeof Packument>

function isMarked(marker: boolean | string | null | undefined) {
  return marker === true || (typeof marker === 'string' && marker.length > 0)
}

// npm records deprecation on version manifests; some mirrors hoist it to the document root
function isDeprecated(doc: Packument, latest?: string) {
  if (isMarked(doc.deprecated)) return true
  if (latest === undefined) return false
  const manifest = VersionManifest.safeParse(doc.versions?.[latest])
  return manifest.success && isMarked(manifest.data.deprecated)
}

export class NpmRegistryClient implements RegistryClient {
  constructor(private readonly ctx: HealthContext) {}

  async lookup(name: string, declaredVersion?: string): Promise<RegistryInfo> {
    // scoped names keep their leading "@"; everything else is escaped
    const url = `${this.ctx.config.registryBaseUrls.npm}/${encodeURIComponent(name).replace(/^%40/, '@')}`
    try {
      const doc = await fetchJson(this.ctx, url, Packument)
      const latestVersion = doc['dist-tags']?.latest
      const info: RegistryInfo = {
        latestVersion,
        isOutdated: declaredVersion && latestVersion ? declaredVersion !== latestVersion : false,
        isDeprecated: isDeprecated(doc, latestVersion)
      }
      this.ctx.logger.debug({ package: name, ...info }, 'npm registry lookup')
      return info
    } catch (err) {
      this.ctx.logger.warn({ err, package: name, ecosystem: 'npm' }, 'npm registry lookup failed')
      return { ...NO_REGISTRY_DATA }
    }
  }
}
