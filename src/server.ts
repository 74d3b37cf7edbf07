/**
 * MCP server exposing the conversion tools.
 *
 * Each registered handler is a thin adapter over a ToolDefinition: the
 * ToolResponse becomes a text result, failures are flagged with isError.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { tools as defaultTools } from './tools/index.js';
import type { ToolContext, ToolDefinition, ToolResponse } from './types.js';

export const SERVER_NAME = 'pandoc-convert';
export const SERVER_VERSION = '0.1.0';

export function toCallToolResult(response: ToolResponse): CallToolResult {
  if (response.success) {
    return { content: [{ type: 'text', text: response.output ?? '' }] };
  }
  return {
    content: [{ type: 'text', text: response.error ?? 'Unknown error' }],
    isError: true,
  };
}

export function createServer(
  ctx: ToolContext,
  tools: readonly ToolDefinition[] = defaultTools,
): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  for (const tool of tools) {
    server.registerTool(
      tool.name,
      { description: tool.description, inputSchema: tool.inputShape },
      async (args) => toCallToolResult(await tool.execute(args, ctx)),
    );
  }

  return server;
}
