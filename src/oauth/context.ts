/**
 * OAuth処理の共有コンテキスト
 * プロセス起動時に1度だけ作成し、すべてのハンドラへ渡す。
 */
import type { TokenStore } from '../db/store.js'
import { toEpochSeconds } from '../utils/time.js'

/**
 * アクセストークンの既定有効期限（秒）
 */
export const DEFAULT_ACCESS_TOKEN_TTL = 3600

/**
 * 認可コードの既定有効期限（秒）
 */
export const DEFAULT_AUTH_CODE_TTL = 600

export interface OAuthContext {
  store: TokenStore
  /** 現在時刻（エポックミリ秒）。テストでは差し替える */
  clock: () => number
  accessTokenTtl: number
  authCodeTtl: number
}

/**
 * コンテキストを作成する
 * @param options ストアと任意の上書き値
 * @returns OAuthコンテキスト
 */
export function createOAuthContext(options: {
  store: TokenStore
  clock?: () => number
  accessTokenTtl?: number
  authCodeTtl?: number
}): OAuthContext {
  return {
    store: options.store,
    clock: options.clock ?? Date.now,
    accessTokenTtl: options.accessTokenTtl ?? DEFAULT_ACCESS_TOKEN_TTL,
    authCodeTtl: options.authCodeTtl ?? DEFAULT_AUTH_CODE_TTL,
  }
}

/**
 * コンテキストの現在時刻（UNIX秒）
 */
export function nowSeconds(ctx: Pick<OAuthContext, 'clock'>): number {
  return toEpochSeconds(ctx.clock())
}
