/**
 * 設定に応じてトークンストアを作成する
 */
import type { ServerConfig } from '../utils/config.js'
import logger from '../utils/logger.js'
import { MemoryTokenStore } from './memory.js'
import { createRedisClient, RedisTokenStore } from './redis.js'
import type { TokenStore } from './store.js'

/**
 * トークンストアを作成する
 * メモリストアの場合は期限切れエントリの定期削除も開始する。
 * @param config サーバー設定
 * @returns トークンストア
 */
export function createTokenStore(
  config: Pick<ServerConfig, 'tokenStore' | 'redisUrl' | 'redisClusterHosts' | 'sweepInterval'>,
  clock: () => number = Date.now,
): TokenStore {
  if (config.tokenStore === 'redis') {
    const redis = createRedisClient({ url: config.redisUrl, clusterHosts: config.redisClusterHosts })
    logger.info('Token store: redis')
    return new RedisTokenStore(redis)
  }

  const store = new MemoryTokenStore()
  if (config.sweepInterval > 0) {
    store.startSweep(config.sweepInterval, clock)
  }
  logger.info(`Token store: memory (sweep interval: ${config.sweepInterval}s)`)
  return store
}
