/**
 * リクエストパラメータの正規化
 * JSONボディとフォームボディ、クエリ文字列を同じ形（文字列のマップ）に揃える。
 */
import type { Request } from 'express'

/**
 * 文字列値のみのパラメータマップ
 */
export type RequestParams = Record<string, string>

/**
 * リクエストボディを文字列のマップに変換する
 * 数値・真偽値は文字列化し、配列やオブジェクトなどそれ以外の値は捨てる。
 * @param body req.body（未解析ならundefined）
 * @returns 正規化したパラメータ
 */
export function normalizeParams(body: unknown): RequestParams {
  const params: RequestParams = {}
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return params

  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      params[key] = String(value)
    }
  }
  return params
}

/**
 * クエリパラメータを1つ取り出す
 * 同じキーが複数指定された場合は不正としてundefinedを返す。
 */
export function readQueryParam(query: Request['query'], key: string): string | undefined {
  const value = query[key]
  return typeof value === 'string' ? value : undefined
}

/**
 * Basic認証ヘッダーの解析結果
 */
export type BasicCredentials =
  | { kind: 'none' }
  | { kind: 'invalid' }
  | { kind: 'credentials'; clientId: string; clientSecret: string }

/**
 * Authorization: Basic ヘッダーからクライアント認証情報を取り出す
 * client_id / client_secret はフォームエンコードされている前提でデコードする（RFC 6749 2.3.1）。
 * @param header Authorizationヘッダー
 * @returns 解析結果（Basic以外のスキームはnone）
 */
export function parseBasicAuth(header: string | undefined): BasicCredentials {
  if (!header) return { kind: 'none' }
  const match = /^Basic\s+(\S+)\s*$/i.exec(header)
  if (!match) {
    return /^Basic\b/i.test(header) ? { kind: 'invalid' } : { kind: 'none' }
  }

  const encoded = match[1]
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(encoded)) return { kind: 'invalid' }

  const decoded = Buffer.from(encoded, 'base64').toString('utf8')
  const separator = decoded.indexOf(':')
  if (separator <= 0) return { kind: 'invalid' }

  try {
    return {
      kind: 'credentials',
      clientId: decodeFormComponent(decoded.slice(0, separator)),
      clientSecret: decodeFormComponent(decoded.slice(separator + 1)),
    }
  } catch {
    return { kind: 'invalid' }
  }
}

function decodeFormComponent(value: string): string {
  return decodeURIComponent(value.replace(/\+/g, ' '))
}
