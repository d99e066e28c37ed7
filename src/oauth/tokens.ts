/**
 * トークン交換
 * - Authorization Code Grant（PKCE検証を含む）
 * - Refresh Token Grant（アクセストークンのみ再発行、リフレッシュトークンは据え置き）
 *
 * 失敗はすべてnullで返す。呼び出し側で 400 invalid_grant に変換する。
 */
import type { AccessTokenRecord, TokenResponse } from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { generateToken, redact } from '../utils/secret.js'
import { type OAuthContext, nowSeconds } from './context.js'
import { verifyCodeChallenge } from './pkce.js'

export interface CodeExchangeParams {
  code: string
  clientId: string
  redirectUri: string
  codeVerifier?: string | null
}

export interface RefreshParams {
  refreshToken: string
  clientId: string
}

/**
 * 認可コードをアクセストークン・リフレッシュトークンに交換する
 *
 * 照合（client_id、redirect_uri、有効期限、PKCE）をすべて終えてからコードを削除する。
 * 削除に成功したリクエストのみがトークンを受け取るため、同じコードで発行されるのは1回限り。
 * @param ctx OAuthコンテキスト
 * @param params 交換パラメータ
 * @returns トークンレスポンス、失敗時はnull
 */
export async function exchangeCodeForTokens(
  ctx: OAuthContext,
  params: CodeExchangeParams,
): Promise<TokenResponse | null> {
  const record = await ctx.store.findAuthorizationCode(params.code)
  if (!record) {
    logger.debug(`Unknown authorization code: ${redact(params.code)}`)
    return null
  }

  if (record.client_id !== params.clientId || record.redirect_uri !== params.redirectUri) {
    logger.warn(`Authorization code parameter mismatch for client ${params.clientId}`)
    return null
  }

  const now = nowSeconds(ctx)
  if (record.expires_at < now) {
    await ctx.store.deleteAuthorizationCode(params.code)
    logger.debug(`Authorization code expired: ${redact(params.code)}`)
    return null
  }

  if (record.code_challenge) {
    if (!params.codeVerifier) {
      logger.warn('Missing code_verifier for PKCE flow')
      return null
    }
    if (!verifyCodeChallenge(record.code_challenge, record.code_challenge_method, params.codeVerifier)) {
      logger.warn('PKCE verification failed: code_verifier does not match code_challenge')
      return null
    }
  }

  // 使用済みコードを削除（同時交換の場合、削除できた1リクエストのみ続行）
  if (!(await ctx.store.deleteAuthorizationCode(params.code))) {
    logger.warn(`Authorization code already redeemed: ${redact(params.code)}`)
    return null
  }

  const accessToken = await issueAccessToken(ctx, record.client_id, record.scope)
  const refreshToken = generateToken()
  await ctx.store.saveRefreshToken({
    token: refreshToken,
    client_id: record.client_id,
    scope: record.scope,
    created_at: now,
  })

  logger.info(`OAuth tokens issued for client ${record.client_id}`)
  return toTokenResponse(ctx, accessToken, refreshToken)
}

/**
 * リフレッシュトークンで新しいアクセストークンを発行する
 * @param ctx OAuthコンテキスト
 * @param params リフレッシュパラメータ
 * @returns トークンレスポンス（refresh_tokenは入力と同じ値）、失敗時はnull
 */
export async function refreshAccessToken(
  ctx: OAuthContext,
  params: RefreshParams,
): Promise<TokenResponse | null> {
  const record = await ctx.store.findRefreshToken(params.refreshToken)
  if (!record || record.client_id !== params.clientId) {
    logger.warn(`Invalid refresh token for client ${params.clientId}`)
    return null
  }

  const accessToken = await issueAccessToken(ctx, record.client_id, record.scope)
  logger.info(`Access token refreshed for client ${record.client_id}`)
  return toTokenResponse(ctx, accessToken, record.token)
}

async function issueAccessToken(ctx: OAuthContext, clientId: string, scope: string): Promise<AccessTokenRecord> {
  const now = nowSeconds(ctx)
  const record: AccessTokenRecord = {
    token: generateToken(),
    client_id: clientId,
    scope,
    created_at: now,
    expires_at: now + ctx.accessTokenTtl,
  }
  await ctx.store.saveAccessToken(record)
  return record
}

function toTokenResponse(ctx: OAuthContext, accessToken: AccessTokenRecord, refreshToken: string): TokenResponse {
  return {
    access_token: accessToken.token,
    token_type: 'Bearer',
    expires_in: ctx.accessTokenTtl,
    refresh_token: refreshToken,
    scope: accessToken.scope,
  }
}
