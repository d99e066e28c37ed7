/**
 * アプリケーション共通ロガー
 * ファイル（日次ローテーション）とコンソール（stderr）へ出力する。
 * stdioモードではstdoutがMCPのJSON-RPCに使われるため、コンソール出力はすべてstderrへ送る。
 */
import dotenv from 'dotenv'
import fs from 'fs'
import path from 'path'
import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'

// 環境変数を確実に読み込む
dotenv.config()

const logDir = process.env.LOG_DIR || 'logs'
const retentionDays = parseInt(process.env.LOG_RETENTION_DAYS || '14', 10)
const level = process.env.LOG_LEVEL || 'info'
const fileLevel = process.env.LOG_FILE_LEVEL || level
const consoleLevel = process.env.LOG_CONSOLE_LEVEL || level

// ログディレクトリが存在しない場合は作成
const logDirPath = path.resolve(process.cwd(), logDir)
if (!fs.existsSync(logDirPath)) {
  fs.mkdirSync(logDirPath, { recursive: true })
}

/**
 * 1行フォーマット
 * 例: 2025/01/01 12:00:00 [INFO ] message {"key":"value"}
 */
export function formatLine({ timestamp, level, message, ...meta }: winston.Logform.TransformableInfo): string {
  // ログレベルを5文字で統一
  const paddedLevel = level.toUpperCase().padEnd(5, ' ')
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
  return `${timestamp} [${paddedLevel}] ${message}${metaStr}`
}

const transport = new DailyRotateFile({
  dirname: logDirPath,
  filename: 'devops-mcp-%DATE%.log',
  datePattern: 'YYYY-MM-DD',
  zippedArchive: true,
  maxSize: '20m',
  maxFiles: `${retentionDays}d`,
  auditFile: path.join(logDirPath, 'audit.json'),
  level: fileLevel,
})

const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY/MM/DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(formatLine),
  ),
  transports: [
    transport,
    new winston.transports.Console({
      level: consoleLevel,
      // 色付けはせず、ロガー共通の1行形式をそのまま出力する
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
})

// ファイル作成・ローテーション時のイベントハンドラ
transport.on('new', (filename: string) => {
  logger.info(`New log file created: ${filename}`)
})
transport.on('rotate', (oldFilename: string, newFilename: string) => {
  logger.info(`Log rotated from ${oldFilename} to ${newFilename}`)
})

logger.debug(`Log directory: ${logDirPath}, retention: ${retentionDays} days`)
logger.debug(`Log level: ${level}, file: ${fileLevel}, console: ${consoleLevel}`)

export default logger
