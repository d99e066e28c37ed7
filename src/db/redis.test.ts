import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { AuthorizationCodeRecord, RegisteredClient } from '../types/oauth.types.js'
import { createRedisClient, RedisTokenStore, type RedisCommands } from './redis.js'

const { mockRedis, mockCluster } = vi.hoisted(() => ({
  mockRedis: vi.fn(),
  mockCluster: vi.fn(),
}))

vi.mock('ioredis', () => ({
  Redis: mockRedis,
  Cluster: mockCluster,
}))
vi.mock('../utils/logger.js', () => ({
  default: { error: vi.fn(), info: vi.fn(), debug: vi.fn(), warn: vi.fn() },
}))

/**
 * インプロセスのRedis代替
 */
class FakeRedis implements RedisCommands {
  readonly data = new Map<string, string>()
  readonly ttl = new Map<string, number>()
  pingError: Error | null = null

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null
  }

  async set(key: string, value: string, mode?: 'EX', seconds?: number): Promise<unknown> {
    this.data.set(key, value)
    if (mode === 'EX' && seconds !== undefined) this.ttl.set(key, seconds)
    return 'OK'
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0
    for (const key of keys) {
      if (this.data.delete(key)) removed++
      this.ttl.delete(key)
    }
    return removed
  }

  async ping(): Promise<string> {
    if (this.pingError) throw this.pingError
    return 'PONG'
  }

  quit = vi.fn(async () => 'OK')
}

const client: RegisteredClient = {
  client_id: 'client-1',
  client_secret: 'test-secret',
  client_id_issued_at: 1000,
  client_secret_expires_at: 0,
  redirect_uris: ['https://app.example.com/cb'],
  token_endpoint_auth_method: 'client_secret_basic',
  grant_types: ['authorization_code', 'refresh_token'],
  response_types: ['code'],
  client_name: 'Test Client',
  scope: 'mcp:tools',
}

const code: AuthorizationCodeRecord = {
  code: 'code-1',
  client_id: 'client-1',
  redirect_uri: 'https://app.example.com/cb',
  scope: 'mcp:tools',
  code_challenge: 'challenge',
  code_challenge_method: 'S256',
  created_at: 1000,
  expires_at: 1600,
}

describe('createRedisClient', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('クラスタ設定があればClusterを作成する', () => {
    createRedisClient({ url: 'redis://localhost:6379', clusterHosts: 'redis-1:7001, redis-2:7002,redis-3' })
    expect(mockCluster).toHaveBeenCalledWith([
      { host: 'redis-1', port: 7001 },
      { host: 'redis-2', port: 7002 },
      { host: 'redis-3', port: 6379 },
    ])
    expect(mockRedis).not.toHaveBeenCalled()
  })

  it('URLのみなら単一ノードに接続する', () => {
    createRedisClient({ url: 'redis://localhost:6379', clusterHosts: null })
    expect(mockRedis).toHaveBeenCalledWith('redis://localhost:6379')
  })

  it('どちらも未設定ならエラー', () => {
    expect(() => createRedisClient({ url: null, clusterHosts: null })).toThrow(
      'REDIS_URL or REDIS_CLUSTER_HOSTS must be set when TOKEN_STORE=redis',
    )
  })
})

describe('RedisTokenStore', () => {
  let redis: FakeRedis
  let store: RedisTokenStore

  beforeEach(() => {
    redis = new FakeRedis()
    store = new RedisTokenStore(redis)
  })

  it('クライアントはTTLなしで保存される', async () => {
    await store.saveClient(client)
    expect(redis.data.get('client:client-1')).toBe(JSON.stringify(client))
    expect(redis.ttl.has('client:client-1')).toBe(false)
    expect(await store.findClient('client-1')).toEqual(client)
    expect(await store.findClient('unknown')).toBeNull()
  })

  it('認可コードは有効期限に合わせたTTLで保存される', async () => {
    await store.saveAuthorizationCode(code)
    expect(redis.ttl.get('authcode:code-1')).toBe(600)
    expect(await store.findAuthorizationCode('code-1')).toEqual(code)
  })

  it('認可コードの削除は最初の1回のみtrue', async () => {
    await store.saveAuthorizationCode(code)
    expect(await store.deleteAuthorizationCode('code-1')).toBe(true)
    expect(await store.deleteAuthorizationCode('code-1')).toBe(false)
  })

  it('アクセストークンはTTL付きで保存・削除できる', async () => {
    const record = { token: 'at-1', client_id: 'client-1', scope: 'mcp:tools', created_at: 1000, expires_at: 4600 }
    await store.saveAccessToken(record)
    expect(redis.ttl.get('access_token:at-1')).toBe(3600)
    expect(await store.findAccessToken('at-1')).toEqual(record)
    await store.deleteAccessToken('at-1')
    expect(await store.findAccessToken('at-1')).toBeNull()
  })

  it('TTLは最低1秒', async () => {
    await store.saveAccessToken({ token: 'at-0', client_id: 'c', scope: '', created_at: 1000, expires_at: 1000 })
    expect(redis.ttl.get('access_token:at-0')).toBe(1)
  })

  it('リフレッシュトークンはTTLなしで保存される', async () => {
    const record = { token: 'rt-1', client_id: 'client-1', scope: 'mcp:tools', created_at: 1000 }
    await store.saveRefreshToken(record)
    expect(redis.ttl.has('refresh_token:rt-1')).toBe(false)
    expect(await store.findRefreshToken('rt-1')).toEqual(record)
  })

  it('sweepExpiredはRedisのTTLに任せて0を返す', async () => {
    expect(await store.sweepExpired()).toBe(0)
  })

  it('pingの失敗はfalse', async () => {
    expect(await store.ping()).toBe(true)
    redis.pingError = new Error('connection refused')
    expect(await store.ping()).toBe(false)
  })

  it('closeで接続を閉じる', async () => {
    await store.close()
    expect(redis.quit).toHaveBeenCalledTimes(1)
  })
})
