import type { Ecosystem } from './types.js'
import { defaultLogger, type Logger } from './logger.js'

export interface HealthConfig {
  // upper bound for every single registry / vulnerability call
  timeoutMs: number
  registryBaseUrls: Record<Ecosystem, string>
  vulnerabilityApiUrl: string
  // how many dependencies are looked up at once
  concurrency: number
}

export type HealthConfigInput = Partial<Omit<HealthConfig, 'registryBaseUrls'>> & {
  registryBaseUrls?: Partial<Record<Ecosystem, string>>
}

export const DEFAULT_CONFIG: HealthConfig = {
  timeoutMs: 10_000,
  registryBaseUrls: {
    python: 'https://pypi.org/pypi',
    npm: 'https://registry.npmjs.org'
  },
  vulnerabilityApiUrl: 'https://api.osv.dev',
  concurrency: 6
}

export type FetchLike = typeof fetch

/** Everything a lookup needs; passed down explicitly instead of living in module state. */
export interface HealthContext {
  config: HealthConfig
  fetch: FetchLike
  logger: Logger
}

export function resolveHealthConfig(input: HealthConfigInput = {}): HealthConfig {
  const urls: Partial<Record<Ecosystem, string>> = input.registryBaseUrls ?? {}
  return {
    timeoutMs: positiveInt(input.timeoutMs, DEFAULT_CONFIG.timeoutMs),
    registryBaseUrls: {
      python: trimSlash(urls.python ?? DEFAULT_CONFIG.registryBaseUrls.python),
      npm: trimSlash(urls.npm ?? DEFAULT_CONFIG.registryBaseUrls.npm)
    },
    vulnerabilityApiUrl: trimSlash(input.vulnerabilityApiUrl ?? DEFAULT_CONFIG.vulnerabilityApiUrl),
    concurrency: positiveInt(input.concurrency, DEFAULT_CONFIG.concurrency)
  }
}

export function createHealthContext(overrides: { config?: HealthConfigInput; fetch?: FetchLike; logger?: Logger } = {}): HealthContext {
  return {
    config: resolveHealthConfig(overrides.config),
    fetch: overrides.fetch ?? globalThis.fetch,
    logger: overrides.logger ?? defaultLogger
  }
}

function positiveInt(value: number | undefined, fallback: number) {
  if (value === undefined || !Number.isFinite(value) || value < 1) return fallback
  return Math.floor(value)
}

function trimSlash(url: string) {
  return url.replace(/\/+$/, '')
}
