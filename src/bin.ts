#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv'
import { CommanderError } from 'commander'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import type { ServerConfig } from './core/types/config.js'
import { loadConfig } from './core/config/loader.js'
import { ConfigurationError } from './core/helpers/errors.js'
import { createLogger, type Logger } from './core/helpers/logger.js'
import { createAllTools, createToolDependencies } from './core/tools/index.js'
import { PLUGIN_NAME } from './core/plugin-id.js'
import { parseCliArgs } from './cli.js'
import { createOpenObserveServer } from './server.js'
import { startHttpServer } from './http.js'

function loadOrExit(): ServerConfig {
  try {
    return loadConfig({ overrides: parseCliArgs(process.argv) })
  } catch (e) {
    if (e instanceof CommanderError) process.exit(e.exitCode)
    if (e instanceof ConfigurationError) {
      process.stderr.write(`Configuration error: ${e.message}\n`)
      process.exit(1)
    }
    throw e
  }
}

function onShutdown(logger: Logger, close: () => Promise<void>): void {
  let closing = false
  const handler = (signal: NodeJS.Signals) => {
    if (closing) return
    closing = true
    logger.info('Shutting down', { signal })
    close().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error('Shutdown failed', { error: e instanceof Error ? e.message : String(e) })
        process.exit(1)
      },
    )
  }
  process.on('SIGINT', handler)
  process.on('SIGTERM', handler)
}

async function main() {
  loadDotenv({ quiet: true })
  const config = loadOrExit()
  const logger = createLogger(PLUGIN_NAME, config.logLevel)

  const deps = createToolDependencies(config, { logger })
  const tools = createAllTools(deps)
  const buildServer = () => createOpenObserveServer({ config, tools, logger })

  logger.info('Starting', {
    transport: config.transport,
    baseUrl: config.connection.baseUrl,
    org: config.connection.org,
    limits: config.limits,
  })

  if (config.transport === 'http') {
    const running = await startHttpServer({ http: config.http, createMcpServer: buildServer, logger: logger.child('http') })
    onShutdown(logger, running.close)
    return
  }

  const server = buildServer()
  await server.connect(new StdioServerTransport())
  logger.info('Serving on stdio')
  onShutdown(logger, () => server.close())
}

main().catch((e) => {
  process.stderr.write(`Fatal: MCP server failed to start: ${e instanceof Error ? e.stack ?? e.message : String(e)}\n`)
  process.exit(1)
})
