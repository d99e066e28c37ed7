/**
 * 動的クライアント登録エンドポイント
 * POST /oauth/register（互換のため /register でも受け付ける）
 */
import type { Request, RequestHandler, Response } from 'express'
import type { OAuthContext } from '../oauth/context.js'
import { InvalidClientMetadataError, registerClient } from '../oauth/registry.js'
import { sendOAuthError } from './oauthError.js'

/**
 * 登録ハンドラーを作成する
 * @param ctx OAuthコンテキスト
 * @returns Expressハンドラー
 */
export function createRegisterHandler(ctx: OAuthContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const client = await registerClient(ctx, req.body)
      res.status(201).json(client)
    } catch (err) {
      if (err instanceof InvalidClientMetadataError) {
        sendOAuthError(res, 400, 'invalid_client_metadata', err.message, `Client registration failed: ${err.message}`)
        return
      }
      sendOAuthError(
        res,
        500,
        'server_error',
        undefined,
        `Client registration error: ${(err as Error).stack || (err as Error).message}`,
      )
    }
  }
}
