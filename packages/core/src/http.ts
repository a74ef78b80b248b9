import type { z } from 'zod'
import type { HealthContext } from './config.js'

export class LookupError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message)
    this.name = 'LookupError'
  }
}

/**
 * Single bounded attempt: the request is aborted after `config.timeoutMs`, a non-2xx
 * status or a body that does not match `schema` rejects with a LookupError.
 */
export async function fetchJson<S extends z.ZodTypeAny>(
  ctx: HealthContext,
  url: string,
  schema: S,
  init: { method?: 'GET' | 'POST'; body?: unknown } = {}
): Promise<z.output<S>> {
  const res = await ctx.fetch(url, {
    method: init.method ?? 'GET',
    headers: init.body === undefined
      ? { accept: 'application/json' }
      : { accept: 'application/json', 'content-type': 'application/json' },
    body: init.body === undefined ? undefined : JSON.stringify(init.body),
    signal: AbortSignal.timeout(ctx.config.timeoutMs)
  })
  if (!res.ok) throw new LookupError(`${init.method ?? 'GET'} ${url} responded ${res.status}`, res.status)
  const parsed = schema.safeParse(await res.json())
  if (!parsed.success) throw new LookupError(`unexpected response shape from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
  return parsed.data
}
