/**
 * トークンストアのインターフェース
 * クライアント、認可コード、アクセストークン、リフレッシュトークンの4種類を保持する。
 * プロトコル処理はこのインターフェースのみに依存し、バックエンド（メモリ/Redis）は差し替え可能。
 */
import type {
  AccessTokenRecord,
  AuthorizationCodeRecord,
  RefreshTokenRecord,
  RegisteredClient,
} from '../types/oauth.types.js'

export interface TokenStore {
  saveClient(client: RegisteredClient): Promise<void>
  findClient(clientId: string): Promise<RegisteredClient | null>

  saveAuthorizationCode(record: AuthorizationCodeRecord): Promise<void>
  findAuthorizationCode(code: string): Promise<AuthorizationCodeRecord | null>
  /**
   * 認可コードを削除する
   * @returns この呼び出しで削除した場合のみtrue（同時交換の勝者判定に使う）
   */
  deleteAuthorizationCode(code: string): Promise<boolean>

  saveAccessToken(record: AccessTokenRecord): Promise<void>
  findAccessToken(token: string): Promise<AccessTokenRecord | null>
  deleteAccessToken(token: string): Promise<void>

  saveRefreshToken(record: RefreshTokenRecord): Promise<void>
  findRefreshToken(token: string): Promise<RefreshTokenRecord | null>

  /**
   * 期限切れの認可コードとアクセストークンを削除する
   * @param now 現在時刻（UNIX秒）
   * @returns 削除件数
   */
  sweepExpired(now: number): Promise<number>

  /** バックエンドの疎通確認 */
  ping(): Promise<boolean>
  close(): Promise<void>
}
