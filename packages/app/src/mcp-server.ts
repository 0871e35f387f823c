import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { Logger, ToolDefinition, ToolResponse } from '@vagrant-mcp/core';
import { silentLogger, toInputSchema } from '@vagrant-mcp/core';
import type { Dispatcher, ToolRegistry } from '@vagrant-mcp/tools';

export interface McpServerOptions {
  registry: ToolRegistry;
  dispatcher: Dispatcher;
  name: string;
  version: string;
  logger?: Logger;
}

/**
 * Create the MCP server exposing every registry tool.
 * The transport is attached by the caller via `server.connect()`.
 */
export function createMcpServer(options: McpServerOptions): Server {
  const { registry, dispatcher, logger = silentLogger } = options;

  const server = new Server(
    { name: options.name, version: options.version },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.definitions().map(toMcpTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug(`tools/call ${name}`);
    const response = await dispatcher.handle({ name, arguments: args });
    return {
      content: [{ type: 'text' as const, text: renderResponse(response) }],
      isError: !response.success,
    };
  });

  return server;
}

function toMcpTool(definition: ToolDefinition) {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: toInputSchema(definition),
    annotations: {
      readOnlyHint: definition.annotations?.readOnly ?? false,
      destructiveHint: definition.annotations?.destructive ?? false,
      idempotentHint: definition.annotations?.idempotent ?? false,
      openWorldHint: false,
    },
  };
}

/**
 * Text sent back for a tool call: the command output on success; the error
 * followed by any output captured before the failure otherwise.
 */
export function renderResponse(response: ToolResponse): string {
  if (response.success) {
    return response.content;
  }
  const error = `Error [${response.errorKind ?? 'execution_error'}]: ${response.error ?? 'unknown error'}`;
  const output = response.content.trim();
  return output ? `${error}\n\nOutput before failure:\n${output}` : error;
}
