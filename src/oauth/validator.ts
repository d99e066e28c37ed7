/**
 * アクセストークンの検証
 */
import type { AccessTokenRecord } from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { redact } from '../utils/secret.js'
import { type OAuthContext, nowSeconds } from './context.js'

/**
 * アクセストークンを検証する
 * 期限切れのトークンはその場で削除する。
 * @param ctx OAuthコンテキスト
 * @param token Bearerトークン
 * @returns 保存済みのトークン情報、無効ならnull
 */
export async function validateAccessToken(ctx: OAuthContext, token: string): Promise<AccessTokenRecord | null> {
  const record = await ctx.store.findAccessToken(token)
  if (!record) return null

  if (record.expires_at < nowSeconds(ctx)) {
    await ctx.store.deleteAccessToken(token)
    logger.debug(`Access token expired: ${redact(token)}`)
    return null
  }
  return record
}
