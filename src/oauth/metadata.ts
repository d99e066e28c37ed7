/**
 * ディスカバリーメタデータ
 * 認可サーバーメタデータ（RFC 8414）と保護リソースメタデータ（RFC 9728）を組み立てる。
 */
import type { AuthorizationServerMetadata, ProtectedResourceMetadata } from '../types/oauth.types.js'

export const SUPPORTED_SCOPES = ['openid', 'profile', 'mcp:tools', 'mcp:resources']
export const RESOURCE_SCOPES = ['mcp:tools', 'mcp:resources']
export const DEFAULT_SCOPE = RESOURCE_SCOPES.join(' ')

export function authorizationServerMetadata(serverUrl: string): AuthorizationServerMetadata {
  return {
    issuer: serverUrl,
    authorization_endpoint: `${serverUrl}/oauth/authorize`,
    token_endpoint: `${serverUrl}/oauth/token`,
    registration_endpoint: `${serverUrl}/oauth/register`,
    jwks_uri: `${serverUrl}/.well-known/jwks.json`,
    scopes_supported: [...SUPPORTED_SCOPES],
    response_types_supported: ['code'],
    response_modes_supported: ['query'],
    grant_types_supported: ['authorization_code', 'refresh_token'],
    token_endpoint_auth_methods_supported: ['client_secret_basic', 'client_secret_post', 'none'],
    code_challenge_methods_supported: ['S256', 'plain'],
    service_documentation: `${serverUrl}/docs`,
  }
}

export function protectedResourceMetadata(serverUrl: string): ProtectedResourceMetadata {
  return {
    resource: serverUrl,
    authorization_servers: [serverUrl],
    scopes_supported: [...RESOURCE_SCOPES],
    bearer_methods_supported: ['header'],
  }
}

/**
 * JWKS
 * トークンは不透明トークンで署名しないため、鍵は空。
 */
export function jwks(): { keys: never[] } {
  return { keys: [] }
}
