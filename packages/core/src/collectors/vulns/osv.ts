import { z } from 'zod'
import type { HealthContext } from '../../config.js'
import type { Ecosystem, VulnEcosystem, Vulnerability } from '../../types.js'
import { fetchJson } from '../../http.js'

// Docs: https://google.github.io/osv.dev/post-v1-query/

export const DEFAULT_SUMMARY = 'No summary available'
export const UNKNOWN_SEVERITY = 'UNKNOWN'

const MAX_PAGES = 5

const OsvAdvisory = z.object({
  id: z.string().nullish(),
  aliases: z.array(z.string()).nullish(),
  summary: z.string().nullish(),
  severity: z.array(z.object({ type: z.string().nullish() }).passthrough().nullable()).nullish(),
  published: z.string().nullish()
}).passthrough()

const OsvQueryResult = z.object({
  vulns: z.array(OsvAdvisory).optional(),
  next_page_token: z.string().optional()
})

type OsvAdvisory = z.infer<typeof OsvAdvisory>

export function osvEcosystem(ecosystem: Ecosystem): VulnEcosystem {
  return ecosystem === 'python' ? 'PyPI' : 'npm'
}

export function mapAdvisory(v: OsvAdvisory): Vulnerability {
  return {
    id: v.id || v.aliases?.[0] || 'UNKNOWN',
    summary: v.summary ?? DEFAULT_SUMMARY,
    severity: v.severity?.[0]?.type ?? UNKNOWN_SEVERITY,
    published: v.published ?? ''
  }
}

/**
 * Known advisories for one package, in the order OSV returns them.
 * Never rejects: any failure, on any page, yields an empty list.
 */
export async function lookupVulnerabilities(name: string, ecosystem: Ecosystem, ctx: HealthContext): Promise<Vulnerability[]> {
  const url = `${ctx.config.vulnerabilityApiUrl}/v1/query`
  const query = { package: { name, ecosystem: osvEcosystem(ecosystem) } }
  const out: Vulnerability[] = []
  try {
    let pageToken: string | undefined
    for (let page = 0; page < MAX_PAGES; page++) {
      const body = pageToken ? { ...query, page_token: pageToken } : query
      const data = await fetchJson(ctx, url, OsvQueryResult, { method: 'POST', body })
      for (const v of data.vulns ?? []) out.push(mapAdvisory(v))
      pageToken = data.next_page_token
      if (!pageToken) break
    }
  } catch (err) {
    ctx.logger.warn({ err, package: name, ecosystem }, 'OSV lookup failed')
    return []
  }
  ctx.logger.debug({ package: name, ecosystem, count: out.length }, 'OSV lookup')
  return out
}
