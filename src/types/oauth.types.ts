/**
 * OAuth 2.1 認可サーバーのデータ定義
 * タイムスタンプはすべてUNIX秒
 */

/**
 * 登録済みクライアント（RFC 7591 動的クライアント登録）
 */
export interface RegisteredClient {
  client_id: string
  client_secret: string
  client_id_issued_at: number
  /** 0 = 無期限 */
  client_secret_expires_at: number
  redirect_uris: string[]
  token_endpoint_auth_method: string
  grant_types: string[]
  response_types: string[]
  client_name: string
  scope: string
}

/**
 * PKCEのチャレンジ方式
 */
export type CodeChallengeMethod = 'S256' | 'plain'

/**
 * 認可コード
 * 交換時には client_id と redirect_uri の完全一致が必要。使用は一度限り。
 */
export interface AuthorizationCodeRecord {
  code: string
  client_id: string
  redirect_uri: string
  scope: string
  code_challenge: string | null
  code_challenge_method: CodeChallengeMethod | null
  created_at: number
  expires_at: number
}

/**
 * アクセストークン（不透明トークン）
 */
export interface AccessTokenRecord {
  token: string
  client_id: string
  scope: string
  created_at: number
  expires_at: number
}

/**
 * リフレッシュトークン
 * 有効期限なし、ローテーションなし
 */
export interface RefreshTokenRecord {
  token: string
  client_id: string
  scope: string
  created_at: number
}

/**
 * トークンエンドポイントの成功レスポンス
 */
export interface TokenResponse {
  access_token: string
  token_type: 'Bearer'
  expires_in: number
  refresh_token: string
  scope: string
}

/**
 * OAuthエラーコード
 */
export type OAuthErrorCode =
  | 'invalid_request'
  | 'invalid_client_metadata'
  | 'unsupported_response_type'
  | 'invalid_grant'
  | 'unsupported_grant_type'
  | 'invalid_token'
  | 'server_error'

/**
 * OAuthエラーレスポンス
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode
  error_description?: string
}

/**
 * 認可サーバーメタデータ（RFC 8414）
 */
export interface AuthorizationServerMetadata {
  issuer: string
  authorization_endpoint: string
  token_endpoint: string
  registration_endpoint: string
  jwks_uri: string
  scopes_supported: string[]
  response_types_supported: string[]
  response_modes_supported: string[]
  grant_types_supported: string[]
  token_endpoint_auth_methods_supported: string[]
  code_challenge_methods_supported: CodeChallengeMethod[]
  service_documentation: string
}

/**
 * 保護リソースメタデータ（RFC 9728）
 */
export interface ProtectedResourceMetadata {
  resource: string
  authorization_servers: string[]
  scopes_supported: string[]
  bearer_methods_supported: string[]
}
