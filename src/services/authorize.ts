/**
 * 認可エンドポイント
 * GET /oauth/authorize
 *
 * 利用者の同意画面は持たず、登録済みクライアントとリダイレクトURIが一致すれば自動承認する。
 * - response_type は 'code' のみ
 * - PKCE（S256 / plain）のチャレンジを認可コードに紐づける
 * - redirect_uri?code=...&state=... へ302リダイレクト
 */
import type { Request, RequestHandler, Response } from 'express'
import { createAuthorizationCode } from '../oauth/authorization.js'
import type { OAuthContext } from '../oauth/context.js'
import { DEFAULT_SCOPE } from '../oauth/metadata.js'
import { isCodeChallengeMethod } from '../oauth/pkce.js'
import { getClient } from '../oauth/registry.js'
import type { CodeChallengeMethod } from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { sendOAuthError } from './oauthError.js'
import { readQueryParam } from './params.js'

/**
 * 検証済みの認可リクエスト
 */
interface AuthorizeRequest {
  clientId: string
  redirectUri: string
  /** リダイレクト先の組み立て用 */
  redirectUrl: URL
  scope: string
  state: string | undefined
  codeChallenge: string | undefined
  codeChallengeMethod: CodeChallengeMethod | undefined
}

type ValidationResult = { valid: true; request: AuthorizeRequest } | { valid: false; message: string }

/**
 * 認可ハンドラーを作成する
 * @param ctx OAuthコンテキスト
 * @returns Expressハンドラー
 */
export function createAuthorizeHandler(ctx: OAuthContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const responseType = readQueryParam(req.query, 'response_type')
    if (responseType !== 'code') {
      sendOAuthError(
        res,
        400,
        'unsupported_response_type',
        'Only response_type=code is supported',
        `/oauth/authorize unsupported response_type: ${responseType}`,
      )
      return
    }

    const validation = validateAuthorizeParams(req.query)
    if (!validation.valid) {
      sendOAuthError(res, 400, 'invalid_request', validation.message, `/oauth/authorize validation error: ${validation.message}`)
      return
    }
    const { clientId, redirectUri, redirectUrl, scope, state, codeChallenge, codeChallengeMethod } = validation.request

    try {
      // クライアントとリダイレクトURIの照合
      const client = await getClient(ctx, clientId)
      if (!client) {
        sendOAuthError(res, 400, 'invalid_request', 'Unknown client_id', `/oauth/authorize unknown client: ${clientId}`)
        return
      }
      if (!client.redirect_uris.includes(redirectUri)) {
        sendOAuthError(
          res,
          400,
          'invalid_request',
          'redirect_uri is not registered for this client',
          `/oauth/authorize redirect_uri mismatch: client_id=${clientId}, redirect_uri=${redirectUri}`,
        )
        return
      }

      const code = await createAuthorizationCode(ctx, {
        clientId,
        redirectUri,
        scope,
        codeChallenge,
        codeChallengeMethod,
      })

      redirectUrl.searchParams.set('code', code)
      if (state) redirectUrl.searchParams.set('state', state)

      logger.info(`OAuth authorization granted for client ${clientId}`)
      res.redirect(302, redirectUrl.toString())
    } catch (err) {
      sendOAuthError(
        res,
        500,
        'server_error',
        'Internal server error',
        `/oauth/authorize error: ${(err as Error).stack || (err as Error).message}`,
      )
    }
  }
}

/**
 * クエリパラメータを検証する
 * @param query Express Request query object
 * @returns 検証結果
 */
export function validateAuthorizeParams(query: Request['query']): ValidationResult {
  const clientId = readQueryParam(query, 'client_id')
  const redirectUri = readQueryParam(query, 'redirect_uri')
  if (!clientId || !redirectUri) {
    return { valid: false, message: 'Missing required parameters: client_id, redirect_uri' }
  }

  let redirectUrl: URL
  try {
    redirectUrl = new URL(redirectUri)
  } catch {
    return { valid: false, message: 'redirect_uri must be an absolute URL' }
  }

  const codeChallenge = readQueryParam(query, 'code_challenge') || undefined
  let codeChallengeMethod: CodeChallengeMethod | undefined
  if (codeChallenge) {
    const method = readQueryParam(query, 'code_challenge_method') || 'plain'
    if (!isCodeChallengeMethod(method)) {
      return { valid: false, message: 'code_challenge_method must be S256 or plain' }
    }
    codeChallengeMethod = method
  }

  return {
    valid: true,
    request: {
      clientId,
      redirectUri,
      redirectUrl,
      scope: readQueryParam(query, 'scope') || DEFAULT_SCOPE,
      state: readQueryParam(query, 'state') || undefined,
      codeChallenge,
      codeChallengeMethod,
    },
  }
}
