import Fastify, { type FastifyRequest, type FastifyServerOptions } from 'fastify'
import fastifyMultipart from '@fastify/multipart'
import { ZodError } from 'zod'
import {
  ValidationError,
  analyzeDependencies,
  checkPackage,
  createHealthContext,
  isValidationError,
  mergeDependencyMaps,
  parseConstraintList,
  parseDependencyMap,
  parsePackageJsonText,
  parseRequirementsText,
  type Dependency,
  type FetchLike,
  type HealthConfigInput
} from '@dephealth/core'
import { CheckPackageBody, CheckPackageQuery, NpmAnalyzeBody, PythonAnalyzeBody } from './schemas.js'
import { toOverallResponse, toPackageResponse } from './serialize.js'

export const SERVICE_NAME = 'Dependency Health Monitor'
export const SERVICE_VERSION = '1.0.0'

const MAX_UPLOAD_BYTES = 1024 * 1024

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger']
  health?: HealthConfigInput
  // injected so tests never reach the registries
  fetch?: FetchLike
}

function requireDependencies(deps: Dependency[]): Dependency[] {
  if (!deps.length) throw new ValidationError('No valid packages found in the provided content')
  return deps
}

async function readUpload(req: FastifyRequest, expectedName: RegExp): Promise<string> {
  if (!req.isMultipart()) throw new ValidationError('missing file')
  const mp = await req.file()
  if (!mp) throw new ValidationError('missing file')
  if (!expectedName.test(mp.filename)) req.log.warn({ filename: mp.filename }, 'Uploaded file name is not the expected manifest')
  const buf = await mp.toBuffer()
  return buf.toString('utf8')
}

function describeZodError(err: ZodError) {
  return err.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ')
}

export async function buildApp(opts: BuildAppOptions = {}) {
  const app = Fastify({ logger: opts.logger ?? true })
  await app.register(fastifyMultipart, { limits: { files: 1, fileSize: MAX_UPLOAD_BYTES } })

  const ctx = createHealthContext({ config: opts.health, fetch: opts.fetch, logger: app.log })

  app.setErrorHandler((err, req, reply) => {
    if (isValidationError(err)) {
      return reply.code(400).send({ code: err.code, message: err.message })
    }
    if (err instanceof ZodError) {
      return reply.code(400).send({ code: 'BAD_REQUEST', message: describeZodError(err) })
    }
    if (err.statusCode && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ code: err.code ?? 'BAD_REQUEST', message: err.message })
    }
    req.log.error({ err }, 'Request failed')
    return reply.code(500).send({ code: 'INTERNAL', message: 'internal error' })
  })

  // Minimal CORS for local front ends
  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('Access-Control-Allow-Origin', '*')
    reply.header('Access-Control-Allow-Headers', '*')
    reply.header('Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
    return payload
  })
  app.options('/*', async (req, reply) => reply.code(204).send())

  app.get('/', async () => ({
    message: `Welcome to ${SERVICE_NAME}`,
    version: SERVICE_VERSION,
    endpoints: {
      '/health': 'Check API health',
      '/analyze/python': 'Analyze Python packages (POST { packages: string[] })',
      '/analyze/python/upload': 'Analyze an uploaded requirements.txt (multipart)',
      '/analyze/npm': 'Analyze npm packages (POST { dependencies, devDependencies })',
      '/analyze/npm/upload': 'Analyze an uploaded package.json (multipart)',
      '/check-package': 'Check a single package (POST { name, version }, ?ecosystem=python|npm)'
    }
  }))

  app.get('/health', async () => ({ status: 'healthy', timestamp: new Date().toISOString() }))

  app.post('/analyze/python', async (req) => {
    const body = PythonAnalyzeBody.parse(req.body ?? {})
    const deps = requireDependencies(parseConstraintList(body.packages))
    return toOverallResponse(await analyzeDependencies(deps, 'python', ctx))
  })

  app.post('/analyze/npm', async (req) => {
    const body = NpmAnalyzeBody.parse(req.body ?? {})
    const deps = requireDependencies(parseDependencyMap(mergeDependencyMaps(body.dependencies, body.devDependencies)))
    return toOverallResponse(await analyzeDependencies(deps, 'npm', ctx))
  })

  app.post('/analyze/python/upload', async (req) => {
    const content = await readUpload(req, /requirements.*\.txt$/i)
    const deps = requireDependencies(parseRequirementsText(content))
    return toOverallResponse(await analyzeDependencies(deps, 'python', ctx))
  })

  app.post('/analyze/npm/upload', async (req) => {
    const content = await readUpload(req, /package\.json$/i)
    const deps = requireDependencies(parsePackageJsonText(content))
    return toOverallResponse(await analyzeDependencies(deps, 'npm', ctx))
  })

  app.post('/check-package', async (req) => {
    const { ecosystem } = CheckPackageQuery.parse(req.query ?? {})
    const body = CheckPackageBody.parse(req.body ?? {})
    const dep: Dependency = body.version == null ? { name: body.name } : { name: body.name, version: body.version }
    return toPackageResponse(await checkPackage(dep, ecosystem, ctx))
  })

  return app
}
