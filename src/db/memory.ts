/**
 * インメモリのトークンストア
 * プロセス内のMapで保持する。再起動で全データが失われる。
 * 各操作は同一tick内で完結するため、操作の途中で他リクエストが割り込むことはない。
 */
import type {
  AccessTokenRecord,
  AuthorizationCodeRecord,
  RefreshTokenRecord,
  RegisteredClient,
} from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { toEpochSeconds } from '../utils/time.js'
import type { TokenStore } from './store.js'

export class MemoryTokenStore implements TokenStore {
  private readonly clients = new Map<string, RegisteredClient>()
  private readonly codes = new Map<string, AuthorizationCodeRecord>()
  private readonly accessTokens = new Map<string, AccessTokenRecord>()
  private readonly refreshTokens = new Map<string, RefreshTokenRecord>()
  private sweepTimer: NodeJS.Timeout | null = null

  async saveClient(client: RegisteredClient): Promise<void> {
    this.clients.set(client.client_id, client)
  }

  async findClient(clientId: string): Promise<RegisteredClient | null> {
    return this.clients.get(clientId) ?? null
  }

  async saveAuthorizationCode(record: AuthorizationCodeRecord): Promise<void> {
    this.codes.set(record.code, record)
  }

  async findAuthorizationCode(code: string): Promise<AuthorizationCodeRecord | null> {
    return this.codes.get(code) ?? null
  }

  async deleteAuthorizationCode(code: string): Promise<boolean> {
    return this.codes.delete(code)
  }

  async saveAccessToken(record: AccessTokenRecord): Promise<void> {
    this.accessTokens.set(record.token, record)
  }

  async findAccessToken(token: string): Promise<AccessTokenRecord | null> {
    return this.accessTokens.get(token) ?? null
  }

  async deleteAccessToken(token: string): Promise<void> {
    this.accessTokens.delete(token)
  }

  async saveRefreshToken(record: RefreshTokenRecord): Promise<void> {
    this.refreshTokens.set(record.token, record)
  }

  async findRefreshToken(token: string): Promise<RefreshTokenRecord | null> {
    return this.refreshTokens.get(token) ?? null
  }

  async sweepExpired(now: number): Promise<number> {
    let removed = 0
    for (const [code, record] of this.codes) {
      if (record.expires_at < now) {
        this.codes.delete(code)
        removed++
      }
    }
    for (const [token, record] of this.accessTokens) {
      if (record.expires_at < now) {
        this.accessTokens.delete(token)
        removed++
      }
    }
    return removed
  }

  /**
   * 期限切れエントリの定期削除を開始する
   * タイマーはunrefするため、プロセス終了を妨げない。
   * @param intervalSeconds 実行間隔（秒）
   * @param clock 現在時刻（エポックミリ秒）を返す関数
   */
  startSweep(intervalSeconds: number, clock: () => number = Date.now): void {
    this.stopSweep()
    this.sweepTimer = setInterval(() => {
      this.sweepExpired(toEpochSeconds(clock()))
        .then((removed) => {
          if (removed > 0) logger.debug(`Swept ${removed} expired OAuth entries`)
        })
        .catch((error: unknown) => {
          logger.error(`OAuth sweep failed: ${(error as Error).message}`)
        })
    }, intervalSeconds * 1000)
    this.sweepTimer.unref()
  }

  /**
   * 定期削除を停止する
   */
  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
  }

  async ping(): Promise<boolean> {
    return true
  }

  async close(): Promise<void> {
    this.stopSweep()
  }

  /**
   * 保持件数（ヘルスチェック・テスト用）
   */
  size(): { clients: number; codes: number; accessTokens: number; refreshTokens: number } {
    return {
      clients: this.clients.size,
      codes: this.codes.size,
      accessTokens: this.accessTokens.size,
      refreshTokens: this.refreshTokens.size,
    }
  }
}
