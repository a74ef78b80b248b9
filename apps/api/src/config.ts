import type { HealthConfigInput } from '@dephealth/core'

export interface ApiConfig {
  port: number
  host: string
  logLevel: string
  health: HealthConfigInput
}

type Env = Record<string, string | undefined>

function intFrom(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const n = Number(value)
  return Number.isInteger(n) ? n : undefined
}

export function loadConfig(env: Env = process.env): ApiConfig {
  return {
    port: intFrom(env.PORT) ?? 3333,
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    health: {
      timeoutMs: intFrom(env.REQUEST_TIMEOUT_MS),
      concurrency: intFrom(env.LOOKUP_CONCURRENCY),
      vulnerabilityApiUrl: env.OSV_API_URL || undefined,
      registryBaseUrls: {
        python: env.PYPI_REGISTRY_URL || undefined,
        npm: env.NPM_REGISTRY_URL || undefined
      }
    }
  }
}
