/**
 * 組み込みのシステムツール
 */
import { SERVER_NAME, SERVER_VERSION } from './server.js'
import { textResult, type ToolDefinition, type ToolProvider } from './tools.js'

export interface SystemToolsOptions {
  /** 静的トークンまたはOAuthでの認証が必要か */
  authRequired: boolean
  /** 登録済みツールの総数（自身を含む） */
  toolCount: () => number
}

export class SystemTools implements ToolProvider {
  constructor(private readonly options: SystemToolsOptions) {}

  getTools(): ToolDefinition[] {
    return [
      {
        name: 'server_info',
        description: 'Show the name, version, tool count and authentication mode of this MCP server',
        handler: async () =>
          textResult(
            JSON.stringify(
              {
                name: SERVER_NAME,
                version: SERVER_VERSION,
                tools_count: this.options.toolCount(),
                auth_required: this.options.authRequired,
              },
              null,
              2,
            ),
          ),
      },
    ]
  }
}
