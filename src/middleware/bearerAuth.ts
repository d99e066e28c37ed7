/**
 * Bearerトークン認証ミドルウェア
 * MCPのSSE・メッセージエンドポイントを保護する。
 *
 * 1. OAuthで発行したアクセストークン
 * 2. 静的トークン（MCP_AUTH_TOKEN / --auth-token）
 * の順に照合する。静的トークンが未設定の場合、Bearerヘッダーのないリクエストは認証なしで通す。
 */
import type { NextFunction, Request, RequestHandler, Response } from 'express'
import type { OAuthContext } from '../oauth/context.js'
import { validateAccessToken } from '../oauth/validator.js'
import type { AccessTokenRecord } from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { safeEqual } from '../utils/secret.js'

/**
 * 認証済みの主体（res.locals.auth に格納）
 */
export type AuthIdentity =
  | { kind: 'oauth'; clientId: string; scope: string; token: AccessTokenRecord }
  | { kind: 'static' }
  | { kind: 'anonymous' }

export interface BearerAuthOptions {
  serverUrl: string
  authToken: string | null
}

/**
 * Bearer認証ミドルウェアを作成する
 * @param ctx OAuthコンテキスト
 * @param options 静的トークンとメタデータURLの基点
 * @returns Expressミドルウェア
 */
export function createBearerAuth(ctx: OAuthContext, options: BearerAuthOptions): RequestHandler {
  const challenge = `Bearer resource_metadata="${options.serverUrl}/.well-known/oauth-protected-resource"`

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const identity = await authenticate(ctx, options.authToken, req.headers.authorization)
    if (!identity) {
      logger.warn(`Unauthorized ${req.method} ${req.path} - ${req.ip}`)
      res.set('WWW-Authenticate', challenge)
      res.status(401).json({ error: 'invalid_token' })
      return
    }
    res.locals.auth = identity
    next()
  }
}

/**
 * Authorizationヘッダーを照合する
 * @returns 認証済みの主体、拒否する場合はnull
 */
export async function authenticate(
  ctx: OAuthContext,
  authToken: string | null,
  header: string | undefined,
): Promise<AuthIdentity | null> {
  if (!header || !/^Bearer\b/i.test(header)) {
    return authToken ? null : { kind: 'anonymous' }
  }
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header)
  if (!match) return null

  const token = match[1]
  const record = await validateAccessToken(ctx, token)
  if (record) {
    return { kind: 'oauth', clientId: record.client_id, scope: record.scope, token: record }
  }
  if (authToken && safeEqual(token, authToken)) {
    return { kind: 'static' }
  }
  return null
}
