/**
 * トークン・シークレット関連のユーティリティ
 */
import crypto from 'crypto'

/**
 * 不透明トークンのバイト長（32バイト = 256ビット）
 */
const TOKEN_BYTES = 32

/**
 * URLセーフな不透明トークンを生成する
 * 認可コード、アクセストークン、リフレッシュトークン、クライアントシークレットに使用する。
 * @returns base64url（パディングなし）の文字列
 */
export function generateToken(): string {
  return crypto.randomBytes(TOKEN_BYTES).toString('base64url')
}

/**
 * 文字列を定数時間で比較する
 * @param a 比較対象
 * @param b 比較対象
 * @returns 一致すればtrue
 */
export function safeEqual(a: string, b: string): boolean {
  const bufA = Buffer.from(a)
  const bufB = Buffer.from(b)
  if (bufA.length !== bufB.length) return false
  return crypto.timingSafeEqual(bufA, bufB)
}

/**
 * ログ出力用にシークレット値を短縮する
 * @param value トークンやコードなどの値
 * @returns 先頭6文字のみを残した文字列
 */
export function redact(value: string | undefined | null): string {
  if (!value) return '(none)'
  return value.length <= 6 ? '******' : `${value.slice(0, 6)}…`
}
