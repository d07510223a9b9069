import { describe, it, expect, afterEach } from 'vitest'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js'
import { isAuthorized, startHttpServer, type RunningHttpServer } from './http.js'
import { createOpenObserveServer } from './server.js'
import { createAllTools, createToolDependencies } from './core/tools/index.js'
import { silentLogger } from './core/helpers/logger.js'
import type { HttpTransportConfig } from './core/types/config.js'
import { fakeFetch, jsonResponse, testConfig } from './__tests__/fakes.js'

const TOKEN = 'test-token'

const INITIALIZE = {
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: { protocolVersion: '2025-03-26', capabilities: {}, clientInfo: { name: 'raw', version: '0.0.0' } },
}

let running: RunningHttpServer | null = null
let client: Client | null = null

async function start(http: Partial<HttpTransportConfig> = {}, limits: { maxBodyBytes?: number; sessionIdleMs?: number } = {}) {
  const config = testConfig()
  const backend = fakeFetch(() => jsonResponse({ list: [{ name: 'app' }] }))
  const tools = createAllTools(createToolDependencies(config, { fetch: backend.fetch, logger: silentLogger }))
  const server = await startHttpServer({
    http: { host: '127.0.0.1', port: 0, path: '/mcp', stateless: false, authToken: TOKEN, authDisabled: false, ...http },
    createMcpServer: () => createOpenObserveServer({ config, tools, logger: silentLogger }),
    logger: silentLogger,
    ...limits,
  })
  running = server
  return { server, backend }
}

async function connectClient(url: string, token?: string): Promise<Client> {
  const transport = new StreamableHTTPClientTransport(new URL(url), {
    requestInit: token ? { headers: { Authorization: `Bearer ${token}` } } : undefined,
  })
  const connected = new Client({ name: 'http-test', version: '0.0.0' })
  client = connected
  await connected.connect(transport)
  return connected
}

function post(url: string, body: unknown, headers: Record<string, string> = {}) {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', Accept: 'application/json, text/event-stream', ...headers },
    body: JSON.stringify(body),
  })
}

afterEach(async () => {
  await client?.close()
  client = null
  await running?.close()
  running = null
})

describe('isAuthorized', () => {
  it('accepts only the exact bearer token', () => {
    expect(isAuthorized(`Bearer ${TOKEN}`, TOKEN)).toBe(true)
    expect(isAuthorized(`bearer ${TOKEN}`, TOKEN)).toBe(true)
    expect(isAuthorized('Bearer test-tokem', TOKEN)).toBe(false)
    expect(isAuthorized('Bearer test-token-longer', TOKEN)).toBe(false)
    expect(isAuthorized(`Basic ${TOKEN}`, TOKEN)).toBe(false)
    expect(isAuthorized(undefined, TOKEN)).toBe(false)
  })
})

describe('HTTP transport', () => {
  it('rejects requests without a bearer token before any MCP handling', async () => {
    const { server, backend } = await start()

    const res = await post(server.url, INITIALIZE)

    expect(res.status).toBe(401)
    expect(res.headers.get('www-authenticate')).toBe('Bearer')
    expect(await res.json()).toEqual({ error: 'unauthorized' })
    expect(backend.calls).toHaveLength(0)
  })

  it('rejects a wrong token', async () => {
    const { server } = await start()

    const res = await post(server.url, INITIALIZE, { Authorization: 'Bearer wrong-token' })

    expect(res.status).toBe(401)
  })

  it('answers 404 off the MCP path', async () => {
    const { server } = await start()

    const res = await post(server.url.replace('/mcp', '/other'), INITIALIZE, { Authorization: `Bearer ${TOKEN}` })

    expect(res.status).toBe(404)
  })

  it('serves tools to an authenticated client', async () => {
    const { server, backend } = await start()
    const connected = await connectClient(server.url, TOKEN)

    const { tools } = await connected.listTools()
    const result = await connected.callTool({ name: 'list_streams', arguments: {} })

    expect(tools).toHaveLength(6)
    expect(result.isError).toBe(false)
    expect(backend.calls).toHaveLength(1)
  })

  it('refuses a non-initialize request without a session', async () => {
    const { server } = await start()

    const res = await post(server.url, { jsonrpc: '2.0', id: 2, method: 'tools/list' }, { Authorization: `Bearer ${TOKEN}` })

    expect(res.status).toBe(400)
  })

  it('accepts any client when auth is disabled', async () => {
    const { server } = await start({ authDisabled: true, authToken: null })
    const connected = await connectClient(server.url)

    const { tools } = await connected.listTools()
    const result = await connected.callTool({ name: 'list_streams', arguments: {} })

    expect(tools).toHaveLength(6)
    expect(result.isError).toBe(false)
  })

  it('answers 413 to an oversized body', async () => {
    const { server, backend } = await start({}, { maxBodyBytes: 1024 })

    const res = await post(server.url, { ...INITIALIZE, padding: 'x'.repeat(2000) }, { Authorization: `Bearer ${TOKEN}` })

    expect(res.status).toBe(413)
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Payload too large (limit 1024 bytes)' },
      id: null,
    })
    expect(backend.calls).toHaveLength(0)
  })

  it('expires idle sessions', async () => {
    const { server } = await start({}, { sessionIdleMs: 300 })
    const auth = { Authorization: `Bearer ${TOKEN}` }

    const init = await post(server.url, INITIALIZE, auth)
    const sessionId = init.headers.get('mcp-session-id') ?? ''
    await init.body?.cancel()
    const initialized = { jsonrpc: '2.0', method: 'notifications/initialized' }

    const fresh = await post(server.url, initialized, { ...auth, 'mcp-session-id': sessionId, 'mcp-protocol-version': '2025-03-26' })
    await new Promise((resolve) => setTimeout(resolve, 1000))
    const stale = await post(server.url, initialized, { ...auth, 'mcp-session-id': sessionId, 'mcp-protocol-version': '2025-03-26' })

    expect(sessionId).not.toBe('')
    expect(fresh.status).toBe(202)
    expect(stale.status).toBe(400)
  })

  describe('stateless mode', () => {
    it('serves each POST with a fresh server', async () => {
      const { server } = await start({ stateless: true })
      const connected = await connectClient(server.url, TOKEN)

      const result = await connected.callTool({ name: 'list_streams', arguments: {} })

      expect(result.isError).toBe(false)
    })

    it('answers 405 to GET', async () => {
      const { server } = await start({ stateless: true })

      const res = await fetch(server.url, { headers: { Authorization: `Bearer ${TOKEN}` } })

      expect(res.status).toBe(405)
      expect(res.headers.get('allow')).toBe('POST')
    })
  })
})
