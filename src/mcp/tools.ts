/**
 * MCPツールの提供インターフェース
 * 外部サービス連携などのツール群は ToolProvider を実装して登録する。
 */
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import { z, type ZodRawShape } from 'zod'

/**
 * ツール定義
 * inputSchema を持つツールは、検証済みの引数で handler が呼ばれる。
 */
export interface ToolDefinition {
  name: string
  description: string
  inputSchema?: ZodRawShape
  handler: (args: Record<string, unknown>) => Promise<CallToolResult>
}

/**
 * ツールの提供元
 */
export interface ToolProvider {
  /** 連携先の名前（設定リソースの integrations に載る） */
  readonly integration?: string
  /** 連携に必要な設定が揃っているか */
  isConfigured?(): boolean
  getTools(): ToolDefinition[]
}

/**
 * 引数の型をスキーマから推論してツールを定義する
 */
export function defineTool<Shape extends ZodRawShape>(tool: {
  name: string
  description: string
  inputSchema: Shape
  handler: (args: z.output<z.ZodObject<Shape>>) => Promise<CallToolResult>
}): ToolDefinition {
  const schema = z.object(tool.inputSchema)
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    handler: async (args) => tool.handler(schema.parse(args)),
  }
}

/**
 * 全プロバイダーのツールを1つの一覧にまとめる
 * @param providers ツールの提供元
 * @returns ツール定義の一覧
 * @throws 同名のツールが複数ある場合
 */
export function collectTools(providers: ToolProvider[]): ToolDefinition[] {
  const tools = new Map<string, ToolDefinition>()
  for (const provider of providers) {
    for (const tool of provider.getTools()) {
      if (tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`)
      }
      tools.set(tool.name, tool)
    }
  }
  return [...tools.values()]
}

/**
 * 連携先ごとの設定状況
 * integration と isConfigured を持つプロバイダーだけが対象。
 */
export function describeIntegrations(providers: ToolProvider[]): Record<string, boolean> {
  const integrations: Record<string, boolean> = {}
  for (const provider of providers) {
    if (provider.integration !== undefined && provider.isConfigured) {
      integrations[provider.integration] = provider.isConfigured()
    }
  }
  return integrations
}

/**
 * テキスト1件のツール結果を作る
 */
export function textResult(text: string, isError = false): CallToolResult {
  return isError ? { content: [{ type: 'text', text }], isError: true } : { content: [{ type: 'text', text }] }
}
