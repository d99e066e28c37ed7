/**
 * トークンエンドポイント
 * POST /oauth/token
 * - Authorization Code Grant（PKCE検証を含む）
 * - Refresh Token Grant
 *
 * ボディはJSONとフォームの両方を受け付ける。Basic認証のクライアントIDはボディより優先する。
 */
import type { Request, RequestHandler, Response } from 'express'
import type { OAuthContext } from '../oauth/context.js'
import { exchangeCodeForTokens, refreshAccessToken } from '../oauth/tokens.js'
import { sendOAuthError } from './oauthError.js'
import { normalizeParams, parseBasicAuth, type RequestParams } from './params.js'

/**
 * トークンハンドラーを作成する
 * @param ctx OAuthコンテキスト
 * @returns Expressハンドラー
 */
export function createTokenHandler(ctx: OAuthContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    res.set('Cache-Control', 'no-store')
    res.set('Pragma', 'no-cache')

    try {
      const params = normalizeParams(req.body)

      const basic = parseBasicAuth(req.headers.authorization)
      if (basic.kind === 'invalid') {
        sendOAuthError(res, 400, 'invalid_request', 'Malformed Basic authorization header', '/oauth/token malformed Basic header')
        return
      }
      const clientId = basic.kind === 'credentials' ? basic.clientId : params.client_id

      switch (params.grant_type) {
        case 'authorization_code':
          await handleAuthorizationCodeGrant(ctx, res, params, clientId)
          return
        case 'refresh_token':
          await handleRefreshTokenGrant(ctx, res, params, clientId)
          return
        default:
          sendOAuthError(
            res,
            400,
            'unsupported_grant_type',
            undefined,
            `/oauth/token unsupported grant_type: ${params.grant_type}`,
          )
      }
    } catch (err) {
      sendOAuthError(res, 500, 'server_error', undefined, `Token endpoint error: ${(err as Error).stack || (err as Error).message}`)
    }
  }
}

/**
 * 認可コードグラントの処理
 */
async function handleAuthorizationCodeGrant(
  ctx: OAuthContext,
  res: Response,
  params: RequestParams,
  clientId: string | undefined,
): Promise<void> {
  const { code, redirect_uri: redirectUri, code_verifier: codeVerifier } = params
  if (!code || !clientId || !redirectUri) {
    sendOAuthError(res, 400, 'invalid_grant', 'Missing code, client_id or redirect_uri')
    return
  }

  const tokens = await exchangeCodeForTokens(ctx, { code, clientId, redirectUri, codeVerifier })
  if (!tokens) {
    sendOAuthError(res, 400, 'invalid_grant')
    return
  }
  res.json(tokens)
}

/**
 * リフレッシュトークングラントの処理
 */
async function handleRefreshTokenGrant(
  ctx: OAuthContext,
  res: Response,
  params: RequestParams,
  clientId: string | undefined,
): Promise<void> {
  const refreshToken = params.refresh_token
  if (!refreshToken || !clientId) {
    sendOAuthError(res, 400, 'invalid_grant', 'Missing refresh_token or client_id')
    return
  }

  const tokens = await refreshAccessToken(ctx, { refreshToken, clientId })
  if (!tokens) {
    sendOAuthError(res, 400, 'invalid_grant')
    return
  }
  res.json(tokens)
}
