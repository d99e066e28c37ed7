/**
 * OAuth2ルーティング
 * 各エンドポイントはサービス層のハンドラーを呼び出して処理を行う。
 */
import { Router } from 'express'
import type { OAuthContext } from '../oauth/context.js'
import { createAuthorizeHandler } from '../services/authorize.js'
import { createRegisterHandler } from '../services/register.js'
import { createTokenHandler } from '../services/token.js'

/**
 * /oauth 配下のルーターを作成する
 * @param ctx OAuthコンテキスト
 */
export function createOAuthRouter(ctx: OAuthContext): Router {
  const router = Router()

  /**
   * 動的クライアント登録エンドポイント
   */
  router.post('/register', createRegisterHandler(ctx))

  /**
   * 認可エンドポイント
   */
  router.get('/authorize', createAuthorizeHandler(ctx))

  /**
   * トークンエンドポイント
   */
  router.post('/token', createTokenHandler(ctx))

  return router
}
