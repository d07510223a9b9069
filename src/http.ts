/**
 * Streamable HTTP transport behind a bearer-token gate.
 *
 * Every request to the MCP path must carry `Authorization: Bearer <token>`
 * unless auth is disabled. The check runs before any MCP handling.
 */

import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http'
import { randomUUID, timingSafeEqual } from 'node:crypto'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js'
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js'
import type { HttpTransportConfig } from './core/types/config.js'
import type { Logger } from './core/helpers/logger.js'

export const DEFAULT_MAX_BODY_BYTES = 4 * 1024 * 1024
export const DEFAULT_SESSION_IDLE_MS = 30 * 60 * 1000

export interface HttpServerOptions {
  http: HttpTransportConfig
  /** Called once per session (stateful) or once per request (stateless). */
  createMcpServer: () => McpServer
  logger: Logger
  /** Larger request bodies get 413. */
  maxBodyBytes?: number
  /** Stateful sessions unused for this long are closed. */
  sessionIdleMs?: number
}

interface Session {
  transport: StreamableHTTPServerTransport
  lastSeen: number
}

export interface RunningHttpServer {
  server: HttpServer
  url: string
  close: () => Promise<void>
}

/* ─── Auth ─────────────────────────────────────────── */

export function isAuthorized(header: string | undefined, token: string): boolean {
  if (!header) return false
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header)
  if (!match) return false
  const received = Buffer.from(match[1], 'utf-8')
  const expected = Buffer.from(token, 'utf-8')
  if (received.length !== expected.length) return false
  return timingSafeEqual(received, expected)
}

/* ─── Responses ────────────────────────────────────── */

function sendJson(res: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
  res.writeHead(status, { 'Content-Type': 'application/json', ...headers })
  res.end(JSON.stringify(body))
}

function sendRpcError(res: ServerResponse, status: number, code: number, message: string, headers: Record<string, string> = {}): void {
  sendJson(res, status, { jsonrpc: '2.0', error: { code, message }, id: null }, headers)
}

type BodyResult = { ok: true; body: unknown } | { ok: false; status: 400 | 413 }

// Bytes past the limit are drained without buffering.
function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<BodyResult> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    let size = 0
    let tooLarge = false
    req.on('data', (chunk: Buffer | string) => {
      if (tooLarge) return
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)
      size += buf.length
      if (size > maxBytes) {
        tooLarge = true
        chunks.length = 0
        return
      }
      chunks.push(buf)
    })
    req.on('end', () => {
      if (tooLarge) {
        resolve({ ok: false, status: 413 })
        return
      }
      try {
        resolve({ ok: true, body: JSON.parse(Buffer.concat(chunks).toString('utf-8')) })
      } catch {
        resolve({ ok: false, status: 400 })
      }
    })
    req.on('error', reject)
  })
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name]
  return typeof value === 'string' ? value : undefined
}

/* ─── Server ───────────────────────────────────────── */

export async function startHttpServer(options: HttpServerOptions): Promise<RunningHttpServer> {
  const { http, createMcpServer, logger } = options
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES
  const sessionIdleMs = options.sessionIdleMs ?? DEFAULT_SESSION_IDLE_MS
  const sessions = new Map<string, Session>()

  if (http.authDisabled) {
    logger.warn('HTTP auth is disabled; any client that can reach this port can query OpenObserve')
  }

  function closeQuietly(label: string, work: Promise<void>): void {
    work.catch((e: unknown) => logger.warn(`Failed to close ${label}`, { error: e instanceof Error ? e.message : String(e) }))
  }

  async function readBodyOrReject(req: IncomingMessage, res: ServerResponse): Promise<{ body: unknown } | null> {
    const parsed = await readJsonBody(req, maxBodyBytes)
    if (parsed.ok) return { body: parsed.body }
    if (parsed.status === 413) {
      sendRpcError(res, 413, -32000, `Payload too large (limit ${maxBodyBytes} bytes)`)
    } else {
      sendRpcError(res, 400, -32700, 'Parse error')
    }
    return null
  }

  function expireIdleSessions(): void {
    const cutoff = Date.now() - sessionIdleMs
    for (const [id, session] of sessions) {
      if (session.lastSeen >= cutoff) continue
      sessions.delete(id)
      logger.info('MCP session expired', { sessionId: id })
      closeQuietly('idle session', session.transport.close())
    }
  }

  async function handleStateless(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.method !== 'POST') {
      sendRpcError(res, 405, -32000, 'Method not allowed in stateless mode', { Allow: 'POST' })
      return
    }
    const parsed = await readBodyOrReject(req, res)
    if (!parsed) return

    const server = createMcpServer()
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    })
    res.on('close', () => {
      closeQuietly('transport', transport.close())
      closeQuietly('server', server.close())
    })
    await server.connect(transport)
    await transport.handleRequest(req, res, parsed.body)
  }

  async function handleStateful(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const sessionId = headerValue(req, 'mcp-session-id')
    const session = sessionId ? sessions.get(sessionId) : undefined
    if (session) session.lastSeen = Date.now()
    const existing = session?.transport

    if (req.method !== 'POST') {
      if (!existing) {
        sendRpcError(res, 400, -32000, 'Bad Request: No valid session ID provided')
        return
      }
      await existing.handleRequest(req, res)
      return
    }

    const parsed = await readBodyOrReject(req, res)
    if (!parsed) return

    if (existing) {
      await existing.handleRequest(req, res, parsed.body)
      return
    }
    if (sessionId || !isInitializeRequest(parsed.body)) {
      sendRpcError(res, 400, -32000, 'Bad Request: No valid session ID provided')
      return
    }

    const server = createMcpServer()
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        sessions.set(id, { transport, lastSeen: Date.now() })
        logger.info('MCP session initialized', { sessionId: id })
      },
    })
    transport.onclose = () => {
      const id = transport.sessionId
      if (id && sessions.delete(id)) {
        logger.info('MCP session closed', { sessionId: id })
      }
    }
    await server.connect(transport)
    await transport.handleRequest(req, res, parsed.body)
  }

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname
    if (pathname !== http.path) {
      sendJson(res, 404, { error: 'not_found' })
      return
    }

    if (!http.authDisabled) {
      const token = http.authToken ?? ''
      if (!token || !isAuthorized(headerValue(req, 'authorization'), token)) {
        logger.warn('Rejected unauthenticated request', { method: req.method, remote: req.socket.remoteAddress })
        sendJson(res, 401, { error: 'unauthorized' }, { 'WWW-Authenticate': 'Bearer' })
        return
      }
    }

    if (http.stateless) {
      await handleStateless(req, res)
    } else {
      await handleStateful(req, res)
    }
  }

  const server = createServer((req, res) => {
    handle(req, res).catch((e: unknown) => {
      logger.error('HTTP handler error', { error: e instanceof Error ? e.message : String(e) })
      if (!res.headersSent) {
        sendRpcError(res, 500, -32603, 'Internal server error')
      } else {
        res.end()
      }
    })
  })

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(http.port, http.host, () => {
      server.off('error', reject)
      resolve()
    })
  })

  const sweeper = http.stateless ? null : setInterval(expireIdleSessions, Math.min(sessionIdleMs, 60_000))
  sweeper?.unref()

  const address = server.address()
  const port = typeof address === 'object' && address !== null ? address.port : http.port
  const url = `http://${http.host}:${port}${http.path}`
  logger.info('HTTP transport listening', { url, stateless: http.stateless, auth: !http.authDisabled })

  return {
    server,
    url,
    close: async () => {
      if (sweeper) clearInterval(sweeper)
      const open = [...sessions.values()]
      sessions.clear()
      await Promise.all(open.map((s) => s.transport.close()))
      server.closeAllConnections()
      await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())))
    },
  }
}
