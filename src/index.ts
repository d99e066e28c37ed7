#!/usr/bin/env node
/**
 * devops-mcp エントリーポイント
 * --sse 指定時はHTTP（SSE + OAuth）で、未指定時はstdioでMCPサーバーを起動する。
 */
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import dotenv from 'dotenv'
import type { Server } from 'http'
import { createApp } from './app.js'
import { createTokenStore } from './db/index.js'
import type { TokenStore } from './db/store.js'
import { createMcpServer } from './mcp/server.js'
import { SessionRegistry } from './mcp/sessions.js'
import { SystemTools } from './mcp/systemTools.js'
import { collectTools, type ToolDefinition, type ToolProvider } from './mcp/tools.js'
import { createOAuthContext } from './oauth/context.js'
import { loadConfig, type ServerConfig } from './utils/config.js'
import logger from './utils/logger.js'
import { redact } from './utils/secret.js'

// 最初に環境変数を読み込む
dotenv.config()

interface ToolSet {
  tools: ToolDefinition[]
  providers: ToolProvider[]
}

/**
 * 登録するツールを組み立てる
 */
function buildTools(config: ServerConfig): ToolSet {
  let tools: ToolDefinition[] = []
  const providers: ToolProvider[] = [
    new SystemTools({
      authRequired: config.authToken !== null,
      toolCount: () => tools.length,
    }),
  ]
  tools = collectTools(providers)
  return { tools, providers }
}

/**
 * stdioモードで起動する
 */
async function startStdio({ tools, providers }: ToolSet): Promise<void> {
  const server = createMcpServer(tools, providers)
  await server.connect(new StdioServerTransport())
  logger.info(`MCP server running on stdio (${tools.length} tools)`)
}

/**
 * SSEモードで起動する
 */
function startSse(config: ServerConfig, { tools, providers }: ToolSet): void {
  const store = createTokenStore(config)
  const ctx = createOAuthContext({
    store,
    accessTokenTtl: config.accessTokenTtl,
    authCodeTtl: config.authCodeTtl,
  })
  const sessions = new SessionRegistry(() => createMcpServer(tools, providers))
  const app = createApp(ctx, {
    serverUrl: config.serverUrl,
    authToken: config.authToken,
    corsOrigins: config.corsOrigins,
    tools,
    sessions,
  })

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Starting MCP SSE server on ${config.host}:${config.port}`)
    logger.info(`Public URL: ${config.serverUrl}`)
    logger.info(`Static auth token: ${redact(config.authToken)}`)
    logger.info(`API endpoints:`)
    logger.info(`  GET  /health - Health check`)
    logger.info(`  GET  /tools - Tool list`)
    logger.info(`  GET  /sse - MCP SSE stream`)
    logger.info(`  POST /messages - MCP messages`)
    logger.info(`  GET  /.well-known/oauth-authorization-server - OAuth metadata`)
    logger.info(`  POST /oauth/register, GET /oauth/authorize, POST /oauth/token - OAuth endpoints`)
  })
  server.on('error', (error) => {
    logger.error(`HTTP server error: ${error.message}`)
    process.exit(1)
  })

  registerShutdown(server, sessions, store)
}

/**
 * グレースフルシャットダウン
 */
function registerShutdown(server: Server, sessions: SessionRegistry, store: TokenStore): void {
  let shuttingDown = false
  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info(`${signal} received, shutting down gracefully`)
    try {
      await sessions.closeAll()
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()))
      })
      await store.close()
    } catch (error) {
      logger.error(`Error during shutdown: ${(error as Error).message}`)
    }
    process.exit(0)
  }
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'))
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'))
}

// 未処理のプロミス拒否をキャッチ
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${reason instanceof Error ? reason.stack : String(reason)}`)
})
// 未処理の例外をキャッチ
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.stack || error.message}`)
  process.exit(1)
})

/**
 * アプリケーションの起動
 */
async function main(): Promise<void> {
  const config = loadConfig(process.argv.slice(2))
  const toolSet = buildTools(config)
  if (config.sse) {
    startSse(config, toolSet)
  } else {
    await startStdio(toolSet)
  }
}

main().catch((error: unknown) => {
  logger.error(`Failed to start application: ${(error as Error).message}`)
  process.exit(1)
})
