import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import { beforeAll, describe, expect, it, vi } from 'vitest'

type Listener = (...args: unknown[]) => void

const { MockTransport, transports } = vi.hoisted(() => {
  class MockTransport {
    private listeners = new Map<string, Listener[]>()

    on(event: string, listener: Listener): this {
      this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener])
      return this
    }

    emit(event: string, ...args: unknown[]): void {
      for (const listener of this.listeners.get(event) ?? []) listener(...args)
    }
  }
  const transports: MockTransport[] = []
  return { MockTransport, transports }
})

// DailyRotateFileのモック
vi.mock('winston-daily-rotate-file', () => ({
  default: vi.fn(function () {
    const transport = new MockTransport()
    transports.push(transport)
    return transport
  }),
}))

// winstonのモック
vi.mock('winston', () => {
  const winstonMock = {
    format: {
      timestamp: vi.fn(() => 'timestamp'),
      errors: vi.fn(() => 'errors'),
      printf: vi.fn(() => 'printf'),
      colorize: vi.fn(() => 'colorize'),
      combine: vi.fn((...formats: unknown[]) => formats),
    },
    transports: {
      Console: vi.fn(function () {
        return {}
      }),
    },
    createLogger: vi.fn(() => ({
      info: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
    })),
  }
  return { default: winstonMock, ...winstonMock }
})

describe('logger', () => {
  let logger: winston.Logger
  let formatLine: (info: winston.Logform.TransformableInfo) => string

  beforeAll(async () => {
    const loggerModule = await import('./logger.js')
    logger = loggerModule.default
    formatLine = loggerModule.formatLine
  })

  it('loggerインスタンスが存在するべき', () => {
    expect(logger).toBeDefined()
    expect(winston.createLogger).toHaveBeenCalledTimes(1)
  })

  it('日次ローテーションのファイル出力を設定するべき', () => {
    expect(DailyRotateFile).toHaveBeenCalledWith(
      expect.objectContaining({
        filename: 'devops-mcp-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '20m',
      }),
    )
  })

  it('コンソール出力はすべてstderrへ送り、色付けしないべき', () => {
    expect(winston.transports.Console).toHaveBeenCalledWith(
      expect.objectContaining({
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      }),
    )
    expect(winston.format.colorize).not.toHaveBeenCalled()
    expect(winston.format.printf).toHaveBeenCalledWith(formatLine)
  })

  it('新しいログファイル作成時に正しいメッセージを記録するべき', () => {
    transports[0].emit('new', 'devops-mcp-2025-01-01.log')
    expect(logger.info).toHaveBeenCalledWith('New log file created: devops-mcp-2025-01-01.log')
  })

  it('ログファイルのローテーション時に正しいメッセージを記録するべき', () => {
    transports[0].emit('rotate', 'devops-mcp-2025-01-01.log', 'devops-mcp-2025-01-02.log')
    expect(logger.info).toHaveBeenCalledWith(
      'Log rotated from devops-mcp-2025-01-01.log to devops-mcp-2025-01-02.log',
    )
  })
})

describe('formatLine', () => {
  let formatLine: (info: winston.Logform.TransformableInfo) => string

  beforeAll(async () => {
    formatLine = (await import('./logger.js')).formatLine
  })

  it('レベルを5文字に揃えた1行を返すべき', () => {
    expect(formatLine({ timestamp: '2025/01/01 12:00:00', level: 'info', message: 'hello' })).toBe(
      '2025/01/01 12:00:00 [INFO ] hello',
    )
    expect(formatLine({ timestamp: '2025/01/01 12:00:00', level: 'error', message: 'failed' })).toBe(
      '2025/01/01 12:00:00 [ERROR] failed',
    )
  })

  it('追加の項目はJSONで末尾に付けるべき', () => {
    expect(formatLine({ timestamp: '2025/01/01 12:00:00', level: 'warn', message: 'slow', ms: 1200 })).toBe(
      '2025/01/01 12:00:00 [WARN ] slow {"ms":1200}',
    )
  })
})
