import { Router } from 'express'
import type { TokenStore } from '../db/store.js'
import { SERVER_NAME, SERVER_VERSION } from '../mcp/server.js'
import logger from '../utils/logger.js'

export interface HealthOptions {
  store: TokenStore
  toolsCount: number
  authRequired: boolean
}

export function createHealthRouter(options: HealthOptions): Router {
  const router = Router()

  // ヘルスチェックエンドポイント
  router.get('/', async (req, res) => {
    let storeStatus: boolean
    try {
      storeStatus = await options.store.ping()
    } catch (error) {
      logger.error(`Health check failed: ${(error as Error).message}`)
      storeStatus = false
    }

    const healthStatus = {
      status: storeStatus ? 'healthy' : 'degraded',
      service: SERVER_NAME,
      version: SERVER_VERSION,
      tools_count: options.toolsCount,
      auth_required: options.authRequired,
      store: storeStatus ? 'connected' : 'disconnected',
      timestamp: new Date().toISOString(),
    }

    res.status(storeStatus ? 200 : 503).json(healthStatus)
  })

  return router
}
