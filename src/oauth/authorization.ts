/**
 * 認可コードの発行
 * クライアントIDの登録確認は行わない（リダイレクトURIの照合は認可エンドポイントで行う）。
 */
import type { CodeChallengeMethod } from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { generateToken, redact } from '../utils/secret.js'
import { type OAuthContext, nowSeconds } from './context.js'

export interface AuthorizationCodeParams {
  clientId: string
  redirectUri: string
  scope: string
  codeChallenge?: string | null
  codeChallengeMethod?: CodeChallengeMethod | null
}

/**
 * 認可コードを発行して保存する
 * @param ctx OAuthコンテキスト
 * @param params コードに紐づけるパラメータ
 * @returns 認可コード
 */
export async function createAuthorizationCode(
  ctx: OAuthContext,
  params: AuthorizationCodeParams,
): Promise<string> {
  const code = generateToken()
  const now = nowSeconds(ctx)
  const codeChallenge = params.codeChallenge || null

  await ctx.store.saveAuthorizationCode({
    code,
    client_id: params.clientId,
    redirect_uri: params.redirectUri,
    scope: params.scope,
    code_challenge: codeChallenge,
    code_challenge_method: codeChallenge ? (params.codeChallengeMethod ?? null) : null,
    created_at: now,
    expires_at: now + ctx.authCodeTtl,
  })

  logger.debug(`Authorization code issued: ${redact(code)} for client ${params.clientId}`)
  return code
}
