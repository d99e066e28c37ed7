/**
 * ディスカバリーエンドポイント（/.well-known 配下）
 */
import { Router } from 'express'
import { authorizationServerMetadata, jwks, protectedResourceMetadata } from '../oauth/metadata.js'

export function createWellKnownRouter(serverUrl: string): Router {
  const router = Router()
  const serverMetadata = authorizationServerMetadata(serverUrl)
  const resourceMetadata = protectedResourceMetadata(serverUrl)

  router.get('/oauth-authorization-server', (req, res) => {
    res.json(serverMetadata)
  })

  // /sse 用のパス付きメタデータにも同じ内容を返す
  router.get(['/oauth-protected-resource', '/oauth-protected-resource/sse'], (req, res) => {
    res.json(resourceMetadata)
  })

  router.get('/jwks.json', (req, res) => {
    res.json(jwks())
  })

  return router
}
