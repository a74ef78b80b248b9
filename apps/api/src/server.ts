import type { FastifyInstance } from 'fastify'
import { buildApp } from './app.js'
import { loadConfig } from './config.js'

const config = loadConfig()
const app = await buildApp({ logger: { level: config.logLevel }, health: config.health })

async function listenWithFallback(server: FastifyInstance, startPort: number, host: string) {
  const attempts = 10
  for (let i = 0; i <= attempts; i++) {
    const tryPort = startPort + i
    try {
      await server.listen({ port: tryPort, host })
      server.log.info(`API listening on http://localhost:${tryPort}`)
      return
    } catch (err) {
      if (!isAddrInUse(err)) {
        server.log.error({ err }, `Failed to start server on port ${tryPort}`)
        throw err
      }
      server.log.warn(`Port ${tryPort} in use. Trying next...`)
    }
  }
  // Last resort: let OS choose an ephemeral port
  await server.listen({ port: 0, host })
  const addr = server.server.address()
  const chosen = typeof addr === 'object' && addr ? addr.port : '(unknown)'
  server.log.warn(`All ports ${startPort}-${startPort + attempts} busy. Using ephemeral port ${chosen}.`)
}

function isAddrInUse(err: unknown) {
  return err instanceof Error && 'code' in err && err.code === 'EADDRINUSE'
}

try {
  await listenWithFallback(app, config.port, config.host)
} catch (err) {
  app.log.error({ err }, 'Failed to start server')
  process.exit(1)
}
