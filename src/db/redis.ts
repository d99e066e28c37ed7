/**
 * Redisを使用したトークンストア
 * 複数インスタンス構成でもトークンを共有できる。
 * 認可コードとアクセストークンは有効期限に合わせてRedis側のTTLを設定する。
 */
import { Cluster, Redis } from 'ioredis'
import type {
  AccessTokenRecord,
  AuthorizationCodeRecord,
  RefreshTokenRecord,
  RegisteredClient,
} from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { redact } from '../utils/secret.js'
import type { TokenStore } from './store.js'

/**
 * ストアが使用するRedisコマンドの最小集合
 * 単一ノード（Redis）とクラスタ（Cluster）の両方が満たす。
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<unknown>
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>
  del(...keys: string[]): Promise<number>
  ping(): Promise<string>
  quit(): Promise<unknown>
}

/**
 * Redis接続設定
 */
export interface RedisConnectionOptions {
  /** 単一ノードのURL（例: redis://localhost:6379） */
  url: string | null
  /** クラスタノード（例: redis-1:7001,redis-2:7002） */
  clusterHosts: string | null
}

const KEY_PREFIX = {
  client: 'client:',
  code: 'authcode:',
  accessToken: 'access_token:',
  refreshToken: 'refresh_token:',
} as const

/**
 * Redisクライアントを作成する
 * クラスタ設定があればクラスタ、なければ単一ノードに接続する。
 * @param options 接続設定
 * @returns Redisクライアント
 */
export function createRedisClient(options: RedisConnectionOptions): RedisCommands {
  if (options.clusterHosts) {
    const nodes = options.clusterHosts.split(',').map((h) => {
      const [host, port] = h.trim().split(':')
      return { host, port: Number(port || 6379) }
    })
    logger.info(`Connecting to Redis Cluster: ${nodes.map((n) => `${n.host}:${n.port}`).join(', ')}`)
    return new Cluster(nodes)
  }
  if (options.url) {
    logger.info('Connecting to Redis')
    return new Redis(options.url)
  }
  throw new Error('REDIS_URL or REDIS_CLUSTER_HOSTS must be set when TOKEN_STORE=redis')
}

export class RedisTokenStore implements TokenStore {
  constructor(private readonly redis: RedisCommands) {}

  async saveClient(client: RegisteredClient): Promise<void> {
    await this.redis.set(`${KEY_PREFIX.client}${client.client_id}`, JSON.stringify(client))
  }

  async findClient(clientId: string): Promise<RegisteredClient | null> {
    return this.read<RegisteredClient>(`${KEY_PREFIX.client}${clientId}`)
  }

  async saveAuthorizationCode(record: AuthorizationCodeRecord): Promise<void> {
    await this.redis.set(
      `${KEY_PREFIX.code}${record.code}`,
      JSON.stringify(record),
      'EX',
      ttlOf(record.created_at, record.expires_at),
    )
  }

  async findAuthorizationCode(code: string): Promise<AuthorizationCodeRecord | null> {
    return this.read<AuthorizationCodeRecord>(`${KEY_PREFIX.code}${code}`)
  }

  async deleteAuthorizationCode(code: string): Promise<boolean> {
    // DELは削除したキー数を返すため、同時交換時に1を受け取るのは1リクエストのみ
    const removed = await this.redis.del(`${KEY_PREFIX.code}${code}`)
    return removed === 1
  }

  async saveAccessToken(record: AccessTokenRecord): Promise<void> {
    await this.redis.set(
      `${KEY_PREFIX.accessToken}${record.token}`,
      JSON.stringify(record),
      'EX',
      ttlOf(record.created_at, record.expires_at),
    )
  }

  async findAccessToken(token: string): Promise<AccessTokenRecord | null> {
    return this.read<AccessTokenRecord>(`${KEY_PREFIX.accessToken}${token}`)
  }

  async deleteAccessToken(token: string): Promise<void> {
    await this.redis.del(`${KEY_PREFIX.accessToken}${token}`)
    logger.debug(`Access token deleted: ${redact(token)}`)
  }

  async saveRefreshToken(record: RefreshTokenRecord): Promise<void> {
    await this.redis.set(`${KEY_PREFIX.refreshToken}${record.token}`, JSON.stringify(record))
  }

  async findRefreshToken(token: string): Promise<RefreshTokenRecord | null> {
    return this.read<RefreshTokenRecord>(`${KEY_PREFIX.refreshToken}${token}`)
  }

  async sweepExpired(): Promise<number> {
    // 期限切れはRedisのTTLで削除される
    return 0
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG'
    } catch (error) {
      logger.warn(`Redis ping failed: ${(error as Error).message}`)
      return false
    }
  }

  async close(): Promise<void> {
    await this.redis.quit()
    logger.info('Disconnected from Redis')
  }

  private async read<T>(key: string): Promise<T | null> {
    const val = await this.redis.get(key)
    if (!val) return null
    const parsed: T = JSON.parse(val)
    return parsed
  }
}

/**
 * Redis TTL（秒）を求める。EXは1以上が必要。
 */
function ttlOf(createdAt: number, expiresAt: number): number {
  return Math.max(1, expiresAt - createdAt)
}
