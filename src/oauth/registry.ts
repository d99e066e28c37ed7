/**
 * 動的クライアント登録（RFC 7591）
 * 受け取ったメタデータは寛容に受け入れ、未指定の項目は既定値で補う。
 */
import { v4 as uuidv4 } from 'uuid'
import type { RegisteredClient } from '../types/oauth.types.js'
import logger from '../utils/logger.js'
import { generateToken } from '../utils/secret.js'
import { type OAuthContext, nowSeconds } from './context.js'
import { DEFAULT_SCOPE } from './metadata.js'

/**
 * クライアントメタデータの型が不正な場合のエラー
 * フロントエンドで 400 invalid_client_metadata に変換する。
 */
export class InvalidClientMetadataError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidClientMetadataError'
  }
}

/**
 * 登録リクエストのメタデータ（すべて任意）
 */
export interface ClientMetadata {
  redirect_uris?: string[]
  token_endpoint_auth_method?: string
  grant_types?: string[]
  response_types?: string[]
  client_name?: string
  scope?: string
}

/**
 * クライアントを登録する
 * @param ctx OAuthコンテキスト
 * @param body リクエストボディ（JSONオブジェクト）
 * @returns 登録済みクライアント（client_secretを含む）
 * @throws InvalidClientMetadataError ボディがオブジェクトでない、または既知の項目の型が不正
 */
export async function registerClient(ctx: OAuthContext, body: unknown): Promise<RegisteredClient> {
  const metadata = parseClientMetadata(body)

  const client: RegisteredClient = {
    client_id: uuidv4(),
    client_secret: generateToken(),
    client_id_issued_at: nowSeconds(ctx),
    client_secret_expires_at: 0,
    redirect_uris: metadata.redirect_uris ?? [],
    token_endpoint_auth_method: metadata.token_endpoint_auth_method ?? 'client_secret_basic',
    grant_types: metadata.grant_types ?? ['authorization_code', 'refresh_token'],
    response_types: metadata.response_types ?? ['code'],
    client_name: metadata.client_name ?? 'Unknown Client',
    scope: metadata.scope ?? DEFAULT_SCOPE,
  }

  await ctx.store.saveClient(client)
  logger.info(`Registered new OAuth client: ${client.client_id} (${client.client_name})`)
  return client
}

/**
 * 登録済みクライアントを取得する
 */
export async function getClient(ctx: OAuthContext, clientId: string): Promise<RegisteredClient | null> {
  return ctx.store.findClient(clientId)
}

/**
 * 任意のJSON値をクライアントメタデータとして解釈する
 * 未知の項目は無視する。
 */
export function parseClientMetadata(body: unknown): ClientMetadata {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new InvalidClientMetadataError('Client metadata must be a JSON object')
  }

  const metadata: ClientMetadata = {}
  const redirectUris = readStringArray(body, 'redirect_uris')
  if (redirectUris !== undefined) metadata.redirect_uris = redirectUris
  const grantTypes = readStringArray(body, 'grant_types')
  if (grantTypes !== undefined) metadata.grant_types = grantTypes
  const responseTypes = readStringArray(body, 'response_types')
  if (responseTypes !== undefined) metadata.response_types = responseTypes
  const authMethod = readString(body, 'token_endpoint_auth_method')
  if (authMethod !== undefined) metadata.token_endpoint_auth_method = authMethod
  const clientName = readString(body, 'client_name')
  if (clientName !== undefined) metadata.client_name = clientName
  const scope = readString(body, 'scope')
  if (scope !== undefined) metadata.scope = scope
  return metadata
}

function readString(body: object, key: string): string | undefined {
  const value: unknown = Reflect.get(body, key)
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new InvalidClientMetadataError(`${key} must be a string`)
  }
  return value
}

function readStringArray(body: object, key: string): string[] | undefined {
  const value: unknown = Reflect.get(body, key)
  if (value === undefined || value === null) return undefined
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new InvalidClientMetadataError(`${key} must be an array of strings`)
  }
  return value
}
