/**
 * SSEセッションの管理
 * 接続ごとに SSEServerTransport とMCPサーバーを作成し、セッションIDで引けるようにする。
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js'
import type { ServerResponse } from 'http'
import logger from '../utils/logger.js'

export class SessionRegistry {
  private readonly transports = new Map<string, SSEServerTransport>()

  /**
   * @param createServer セッション用のMCPサーバーを作る関数
   * @param messagesPath クライアントがメッセージをPOSTするパス
   */
  constructor(
    private readonly createServer: () => McpServer,
    private readonly messagesPath = '/messages',
  ) {}

  /**
   * SSEストリームを開始してセッションを登録する
   * レスポンスが閉じられるとセッションは破棄される。
   * @param res SSEを書き込むレスポンス
   * @returns セッションのトランスポート
   */
  async connect(res: ServerResponse): Promise<SSEServerTransport> {
    const transport = new SSEServerTransport(this.messagesPath, res)
    const { sessionId } = transport
    this.transports.set(sessionId, transport)

    res.on('close', () => {
      this.transports.delete(sessionId)
      logger.info(`SSE session closed: ${sessionId}`)
    })

    await this.createServer().connect(transport)
    logger.info(`SSE session opened: ${sessionId}`)
    return transport
  }

  get(sessionId: string): SSEServerTransport | undefined {
    return this.transports.get(sessionId)
  }

  size(): number {
    return this.transports.size
  }

  /**
   * すべてのセッションを閉じる（シャットダウン時）
   */
  async closeAll(): Promise<void> {
    const transports = [...this.transports.values()]
    this.transports.clear()
    await Promise.all(
      transports.map((transport) =>
        transport.close().catch((err: unknown) => {
          logger.warn(`Failed to close SSE session ${transport.sessionId}: ${(err as Error).message}`)
        }),
      ),
    )
  }
}
