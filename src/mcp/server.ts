/**
 * MCPサーバーの組み立て
 * SSEではセッションごと、stdioではプロセスに1つ作成する。
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import logger from '../utils/logger.js'
import { describeIntegrations, textResult, type ToolDefinition, type ToolProvider } from './tools.js'

export const SERVER_NAME = 'devops-mcp'
export const SERVER_VERSION = '1.0.0'
export const CONFIG_RESOURCE_URI = 'config://devops-mcp'

/**
 * ツールを実行する
 * 例外はMCPのエラー結果（isError）として返す。
 */
async function runTool(tool: ToolDefinition, args: Record<string, unknown>): Promise<CallToolResult> {
  try {
    return await tool.handler(args)
  } catch (err) {
    logger.error(`Tool ${tool.name} failed: ${(err as Error).message}`)
    return textResult(`Error: ${(err as Error).message}`, true)
  }
}

/**
 * ツールと設定リソースを登録したMCPサーバーを作成する
 * @param tools ツール定義の一覧
 * @param providers 連携先の設定状況を持つツールの提供元
 * @returns 未接続のMCPサーバー
 */
export function createMcpServer(tools: ToolDefinition[], providers: ToolProvider[] = []): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

  for (const tool of tools) {
    if (tool.inputSchema) {
      server.registerTool(
        tool.name,
        { description: tool.description, inputSchema: tool.inputSchema },
        async (args): Promise<CallToolResult> => runTool(tool, args),
      )
    } else {
      // スキーマなしのツールは arguments を省略した呼び出しも受け付ける
      server.registerTool(tool.name, { description: tool.description }, async () => runTool(tool, {}))
    }
  }

  server.registerResource(
    'config',
    CONFIG_RESOURCE_URI,
    {
      title: 'DevOps MCP Configuration',
      description: 'Server version, integration status and tool count',
      mimeType: 'application/json',
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify(
            {
              version: SERVER_VERSION,
              integrations: describeIntegrations(providers),
              tools_count: tools.length,
              timestamp: new Date().toISOString(),
            },
            null,
            2,
          ),
        },
      ],
    }),
  )
  return server
}
