import { describe, it, expect } from 'vitest'
import { NO_REGISTRY_DATA, NpmRegistryClient, PypiRegistryClient, registryClientFor } from '../src/collectors/registry/index.js'
import { fakeRegistries, stubFetch, testContext } from './helpers/registries.js'

describe('PypiRegistryClient', () => {
  const { fetch, calls } = fakeRegistries({ pypi: { flask: '2.0.1', broken: 'down' } })
  const client = new PypiRegistryClient(testContext(fetch))

  it('reports the current release and compares it with the declared version', async () => {
    expect(await client.lookup('flask', '2.0.1')).toEqual({ latestVersion: '2.0.1', isOutdated: false, isDeprecated: false })
    expect(await client.lookup('flask', '1.1.4')).toEqual({ latestVersion: '2.0.1', isOutdated: true, isDeprecated: false })
    expect(calls[0]).toEqual({ method: 'GET', url: 'https://pypi.test/pypi/flask/json', body: undefined })
  })

  it('never marks a package without declared version as outdated', async () => {
    expect(await client.lookup('flask')).toEqual({ latestVersion: '2.0.1', isOutdated: false, isDeprecated: false })
  })

  it('degrades to no data on 404 and network errors', async () => {
    expect(await client.lookup('does-not-exist', '1.0')).toEqual(NO_REGISTRY_DATA)
    expect(await client.lookup('broken', '1.0')).toEqual(NO_REGISTRY_DATA)
  })

  it('degrades to no data on a malformed document', async () => {
    const stub = stubFetch(() => ({ json: { info: {} } }))
    const info = await new PypiRegistryClient(testContext(stub.fetch)).lookup('flask', '1.0')
    expect(info).toEqual({ latestVersion: undefined, isOutdated: false, isDeprecated: false })
  })

  it('gives up after the configured timeout', async () => {
    const stub = stubFetch(() => new Promise<never>(() => {}))
    const info = await new PypiRegistryClient(testContext(stub.fetch, { timeoutMs: 20 })).lookup('flask', '1.0')
    expect(info).toEqual(NO_REGISTRY_DATA)
  })
})

describe('NpmRegistryClient', () => {
  const { fetch, calls } = fakeRegistries({
    npm: {
      'left-pad': { latest: '1.3.0', deprecated: 'use String.prototype.padStart()' },
      request: { latest: '2.88.2', latestDeprecated: 'request has been deprecated' },
      express: { latest: '4.18.2', deprecated: false },
      '@types/node': { latest: '20.11.0' },
      untagged: {},
      broken: 'down'
    }
  })
  const client = new NpmRegistryClient(testContext(fetch))

  it('reads the latest dist-tag and the deprecation marker', async () => {
    expect(await client.lookup('left-pad', '1.0.0')).toEqual({ latestVersion: '1.3.0', isOutdated: true, isDeprecated: true })
    expect(await client.lookup('express', '4.18.2')).toEqual({ latestVersion: '4.18.2', isOutdated: false, isDeprecated: false })
  })

  it('picks up deprecation recorded on the latest version manifest', async () => {
    expect(await client.lookup('request', '2.88.2')).toEqual({ latestVersion: '2.88.2', isOutdated: false, isDeprecated: true })
  })

  it('escapes the slash of scoped names', async () => {
    expect(await client.lookup('@types/node', '20.11.0')).toEqual({ latestVersion: '20.11.0', isOutdated: false, isDeprecated: false })
    expect(calls.at(-1)?.url).toBe('https://npm.test/@types%2Fnode')
  })

  it('looks names with reserved characters up verbatim', async () => {
    expect(await client.lookup('express?x=1', '4.18.2')).toEqual(NO_REGISTRY_DATA)
    expect(calls.at(-1)?.url).toBe('https://npm.test/express%3Fx%3D1')
    expect(await client.lookup('express#frag', '4.18.2')).toEqual(NO_REGISTRY_DATA)
    expect(calls.at(-1)?.url).toBe('https://npm.test/express%23frag')
    expect(await client.lookup('a/../../express', '4.18.2')).toEqual(NO_REGISTRY_DATA)
    expect(calls.at(-1)?.url).toBe('https://npm.test/a%2F..%2F..%2Fexpress')
  })

  it('only reads the latest version manifest', async () => {
    const stub = stubFetch(() => ({
      json: {
        'dist-tags': { latest: '2.0.0' },
        versions: { '0.1.0': { deprecated: null, dist: 'odd' }, '1.0.0': 'junk', '2.0.0': { version: '2.0.0' } }
      }
    }))
    const info = await new NpmRegistryClient(testContext(stub.fetch)).lookup('odd-history', '1.0.0')
    expect(info).toEqual({ latestVersion: '2.0.0', isOutdated: true, isDeprecated: false })
  })

  it('only flags outdated when both versions are known', async () => {
    expect(await client.lookup('untagged', '1.0.0')).toEqual({ latestVersion: undefined, isOutdated: false, isDeprecated: false })
    expect(await client.lookup('express')).toEqual({ latestVersion: '4.18.2', isOutdated: false, isDeprecated: false })
  })

  it('degrades to no data on failure', async () => {
    expect(await client.lookup('broken', '1.0.0')).toEqual(NO_REGISTRY_DATA)
    expect(await client.lookup('missing', '1.0.0')).toEqual(NO_REGISTRY_DATA)
  })
})

describe('registryClientFor', () => {
  it('selects the client of the ecosystem', () => {
    const ctx = testContext(stubFetch(() => ({})).fetch)
    expect(registryClientFor('python', ctx)).toBeInstanceOf(PypiRegistryClient)
    expect(registryClientFor('npm', ctx)).toBeInstanceOf(NpmRegistryClient)
  })
})
