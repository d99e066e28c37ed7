/**
 * Expressアプリケーションの組み立て
 */
import cors from 'cors'
import express, { type NextFunction, type Request, type Response } from 'express'
import type { SessionRegistry } from './mcp/sessions.js'
import type { ToolDefinition } from './mcp/tools.js'
import { createBearerAuth } from './middleware/bearerAuth.js'
import { requestLogger } from './middleware/requestLogger.js'
import type { OAuthContext } from './oauth/context.js'
import { createHealthRouter } from './routes/health.js'
import { createMcpRouter } from './routes/mcp.js'
import { createOAuthRouter } from './routes/oauth.js'
import { createWellKnownRouter } from './routes/wellKnown.js'
import { isBodyParseError, sendOAuthError } from './services/oauthError.js'
import { createRegisterHandler } from './services/register.js'
import logger from './utils/logger.js'

export interface AppOptions {
  serverUrl: string
  /** 静的Bearerトークン */
  authToken: string | null
  /** CORS許可オリジン（nullなら全オリジン） */
  corsOrigins: string[] | null
  tools: ToolDefinition[]
  sessions: SessionRegistry
}

/**
 * アプリケーションを作成する
 * @param ctx OAuthコンテキスト
 * @param options アプリケーション設定
 * @returns Expressアプリケーション
 */
export function createApp(ctx: OAuthContext, options: AppOptions): express.Express {
  const app = express()

  // ミドルウェア設定
  app.use(
    cors({
      origin: options.corsOrigins ?? '*',
      methods: ['GET', 'POST', 'OPTIONS'],
      exposedHeaders: ['WWW-Authenticate'],
    }),
  )
  app.use(requestLogger)
  app.use(express.json({ limit: '1mb' }))
  app.use(express.urlencoded({ extended: false }))

  // ルート設定
  app.use('/.well-known', createWellKnownRouter(options.serverUrl))
  app.use('/oauth', createOAuthRouter(ctx))
  // 互換のためのパス（一部のクライアントが使用する）
  app.post('/register', createRegisterHandler(ctx))
  app.use(
    '/health',
    createHealthRouter({
      store: ctx.store,
      toolsCount: options.tools.length,
      authRequired: options.authToken !== null,
    }),
  )
  app.use(
    createMcpRouter({
      tools: options.tools,
      sessions: options.sessions,
      bearerAuth: createBearerAuth(ctx, { serverUrl: options.serverUrl, authToken: options.authToken }),
    }),
  )

  // 404ハンドラー
  app.use((req, res) => {
    const isProbeRequest = req.originalUrl.includes('/.well-known/') || req.originalUrl.includes('/favicon.ico')
    if (isProbeRequest) {
      logger.debug(`404 - ${req.method} ${req.originalUrl}`)
    } else {
      logger.warn(`404 - ${req.method} ${req.originalUrl}`)
    }
    res.status(404).json({ error: 'Endpoint not found' })
  })

  // エラーハンドラー
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      const isRegistration = req.path === '/register' || req.path === '/oauth/register'
      sendOAuthError(
        res,
        400,
        isRegistration ? 'invalid_client_metadata' : 'invalid_request',
        'Request body could not be parsed',
        `Malformed request body: ${req.method} ${req.path}`,
      )
      return
    }

    logger.error(`Error: ${(err as Error).stack || (err as Error).message}`)
    if (res.headersSent) return
    res.status(500).json({ error: 'Internal server error' })
  })

  return app
}
