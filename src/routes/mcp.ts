/**
 * MCPエンドポイント
 * - GET  /tools    ツール一覧（認証なし、動作確認用）
 * - GET  /sse      SSEストリーム（Bearer認証）
 * - POST /messages SSEセッションへのメッセージ（Bearer認証）
 */
import { Router, type RequestHandler } from 'express'
import type { SessionRegistry } from '../mcp/sessions.js'
import type { ToolDefinition } from '../mcp/tools.js'
import { readQueryParam } from '../services/params.js'
import logger from '../utils/logger.js'

export interface McpRouterOptions {
  tools: ToolDefinition[]
  sessions: SessionRegistry
  bearerAuth: RequestHandler
}

export function createMcpRouter(options: McpRouterOptions): Router {
  const { tools, sessions, bearerAuth } = options
  const router = Router()

  router.get('/tools', (req, res) => {
    res.json({ tools: tools.map(({ name, description }) => ({ name, description })) })
  })

  router.get('/sse', bearerAuth, async (req, res) => {
    logger.info(`SSE connection from ${req.ip}`)
    try {
      await sessions.connect(res)
    } catch (error) {
      logger.error(`SSE error: ${(error as Error).message}`)
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' })
      }
    }
  })

  router.post('/messages', bearerAuth, async (req, res) => {
    const sessionId = readQueryParam(req.query, 'sessionId')
    if (!sessionId) {
      res.status(400).json({ error: 'invalid_request', error_description: 'Missing sessionId' })
      return
    }
    const transport = sessions.get(sessionId)
    if (!transport) {
      logger.warn(`Message for unknown SSE session: ${sessionId}`)
      res.status(404).json({ error: 'Session not found' })
      return
    }
    await transport.handlePostMessage(req, res, req.body)
  })

  return router
}
