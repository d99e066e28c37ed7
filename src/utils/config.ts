/**
 * サーバー設定の読み込み
 * 環境変数（.env）とCLI引数から型付きの設定を組み立てる。CLI引数が優先される。
 */
import { parseTimeToSeconds } from './time.js'

/**
 * トークンストアの種別
 */
export type TokenStoreKind = 'memory' | 'redis'

/**
 * サーバー設定
 */
export interface ServerConfig {
  /** SSEモードで起動するか（falseならstdio） */
  sse: boolean
  host: string
  port: number
  /** ディスカバリーメタデータのissuer */
  serverUrl: string
  /** 静的Bearerトークン（未設定なら認証なしを許可） */
  authToken: string | null
  /** アクセストークンの有効期限（秒） */
  accessTokenTtl: number
  /** 認可コードの有効期限（秒） */
  authCodeTtl: number
  /** 期限切れエントリの定期削除間隔（秒、0で無効） */
  sweepInterval: number
  tokenStore: TokenStoreKind
  redisUrl: string | null
  redisClusterHosts: string | null
  /** CORS許可オリジン（nullなら全オリジン許可） */
  corsOrigins: string[] | null
}

/**
 * CLI引数の解析結果
 */
export interface CliOptions {
  sse: boolean
  host?: string
  port?: string
  authToken?: string
}

/**
 * CLI引数を解析する
 * 対応: --sse, --host <host>, --port <port>, --auth-token <token>（--key=value形式も可）
 * @param argv process.argv.slice(2) 相当
 * @returns 解析結果
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { sse: false }
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const [flag, inlineValue] = arg.startsWith('--') && arg.includes('=') ? splitOnce(arg, '=') : [arg, undefined]
    const takeValue = (): string => {
      if (inlineValue !== undefined) return inlineValue
      const next = argv[i + 1]
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`Missing value for ${flag}`)
      }
      i++
      return next
    }

    switch (flag) {
      case '--sse':
        options.sse = true
        break
      case '--host':
        options.host = takeValue()
        break
      case '--port':
        options.port = takeValue()
        break
      case '--auth-token':
        options.authToken = takeValue()
        break
      default:
        throw new Error(`Unknown argument: ${arg}`)
    }
  }
  return options
}

/**
 * 設定を読み込む
 * @param argv CLI引数
 * @param env 環境変数
 * @returns サーバー設定
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const cli = parseCliArgs(argv)

  const portStr = cli.port ?? env.PORT ?? '8080'
  const port = Number(portStr)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${portStr}`)
  }

  const tokenStore = env.TOKEN_STORE || 'memory'
  if (tokenStore !== 'memory' && tokenStore !== 'redis') {
    throw new Error(`Invalid TOKEN_STORE: ${tokenStore} (expected "memory" or "redis")`)
  }

  return {
    sse: cli.sse,
    host: cli.host ?? env.HOST ?? '0.0.0.0',
    port,
    serverUrl: resolveServerUrl(env),
    authToken: cli.authToken || env.MCP_AUTH_TOKEN || null,
    accessTokenTtl: parseTimeToSeconds(env.ACCESS_TOKEN_EXPIRATION, 3600),
    authCodeTtl: parseTimeToSeconds(env.AUTHCODE_EXPIRATION, 600),
    sweepInterval: parseTimeToSeconds(env.OAUTH_SWEEP_INTERVAL, 300),
    tokenStore,
    redisUrl: env.REDIS_URL || null,
    redisClusterHosts: env.REDIS_CLUSTER_HOSTS || null,
    corsOrigins: env.CORS_ORIGIN
      ? env.CORS_ORIGIN.split(',')
          .map((o) => o.trim())
          .filter((o) => o.length > 0)
      : null,
  }
}

/**
 * 公開URLを決定する
 * MCP_SERVER_URL を優先し、未設定なら "https://" + MCP_SERVER_HOST（既定: localhost）
 * @param env 環境変数
 * @returns 末尾スラッシュを除いたURL
 */
export function resolveServerUrl(env: NodeJS.ProcessEnv = process.env): string {
  const url = env.MCP_SERVER_URL || `https://${env.MCP_SERVER_HOST || 'localhost'}`
  return url.replace(/\/+$/, '')
}

function splitOnce(value: string, separator: string): [string, string] {
  const index = value.indexOf(separator)
  return [value.slice(0, index), value.slice(index + 1)]
}
