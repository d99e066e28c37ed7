/**
 * OAuthエラーレスポンスの共通処理
 */
import type { Response } from 'express'
import type { OAuthErrorCode, OAuthErrorResponse } from '../types/oauth.types.js'
import logger from '../utils/logger.js'

/**
 * OAuthエラーをJSONで返す
 * @param res Expressレスポンス
 * @param statusCode ステータスコード
 * @param error エラーコード
 * @param errorDescription エラー詳細（省略時は返さない）
 * @param logMessage ログメッセージ（5xxはerror、それ以外はwarnで出力）
 */
export function sendOAuthError(
  res: Response,
  statusCode: number,
  error: OAuthErrorCode,
  errorDescription?: string,
  logMessage?: string,
): void {
  if (logMessage) {
    if (statusCode >= 500) {
      logger.error(logMessage)
    } else {
      logger.warn(logMessage)
    }
  }
  const body: OAuthErrorResponse = errorDescription ? { error, error_description: errorDescription } : { error }
  res.status(statusCode).json(body)
}

/**
 * body-parserのパースエラーか判定する
 */
export function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && Reflect.get(err, 'type') === 'entity.parse.failed'
}
