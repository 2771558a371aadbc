/**
 * MCP server exposing the completion tool
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { CompletionService, COMPLETION_TOOL_NAME } from '../completion/completion-service';
import { completionArgumentsShape, toCompletionOverrides } from '../schemas/completion-arguments.schema';
import { Logger } from '../types/logger';

export const COMPLETION_TOOL_DESCRIPTION = 'Generate text completion using the local LLM';

export interface ServerIdentity {
  name: string;
  version: string;
}

/**
 * Build an MCP server with the generate_completion tool registered
 */
export function createCompletionMcpServer(
  service: CompletionService,
  identity: ServerIdentity,
  logger: Logger
): McpServer {
  const server = new McpServer({ name: identity.name, version: identity.version });

  server.registerTool(
    COMPLETION_TOOL_NAME,
    {
      description: COMPLETION_TOOL_DESCRIPTION,
      inputSchema: completionArgumentsShape,
    },
    async (args): Promise<CallToolResult> => {
      try {
        const response = await service.complete(toCompletionOverrides(args));
        return { content: [{ type: 'text', text: response.text }], isError: response.isError };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Unexpected failure in ${COMPLETION_TOOL_NAME}: ${message}`);
        return { content: [{ type: 'text', text: `Error generating completion: ${message}` }], isError: true };
      }
    }
  );

  return server;
}
