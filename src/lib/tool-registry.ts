/**
 * Tool Registry
 *
 * Central registry that collects all tool definitions and registers them with the MCP server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type { ServerNotification, ServerRequest } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, ToolDefinition, ToolContext } from './tool-types.js';
import type { TraceLogger } from '../utils/trace-logger.js';

// Transfer planning
import {
  hohmannTransferTool,
  interplanetaryTransferTool,
  commonTransfersTool,
} from './tools/transfer.js';

// Reference data
import { listBodiesTool, orbitInfoTool } from './tools/bodies.js';

/**
 * All registered tools.
 * Each tool file exports a definition that is imported and added here.
 */
export const allTools: ToolDefinition[] = [
  // Transfer planning (Tier 1)
  hohmannTransferTool,
  interplanetaryTransferTool,

  // Reference (Tier 2)
  orbitInfoTool,
  listBodiesTool,
  commonTransfersTool,
];

/**
 * Context shared by every call; `log` is bound per request.
 */
export type BaseToolContext = Omit<ToolContext, 'log'>;

/**
 * Send a logging notification to the client that made the request.
 */
function createLogCallback(
  extra: RequestHandlerExtra<ServerRequest, ServerNotification>
): (message: string) => void {
  return (message: string) => {
    extra.sendNotification({
      method: 'notifications/message',
      params: {
        level: 'info',
        logger: 'hohmann-mcp',
        data: message,
      },
    }).catch((error: unknown) => {
      console.error('[hohmann-mcp] Failed to send log notification:', error);
    });
  };
}

function firstText(result: CallToolResult): string {
  const [first] = result.content;
  return first?.type === 'text' ? first.text : '';
}

/**
 * Run a tool handler, recording the call and its outcome in the trace.
 */
export async function invokeTool(
  tool: ToolDefinition,
  args: Record<string, unknown>,
  context: ToolContext,
  trace: TraceLogger
): Promise<CallToolResult> {
  trace.logCall(tool.name, args);
  const traced: ToolContext = {
    ...context,
    log: (message) => {
      trace.logInfo(`${tool.name} ${message}`);
      context.log(message);
    },
  };
  const result = await tool.handler(args, traced);
  if (result.isError) {
    trace.logError(tool.name, firstText(result));
  } else {
    trace.logResult(tool.name, firstText(result));
  }
  return result;
}

/**
 * Register all tools with the MCP server.
 */
export function registerAllTools(server: McpServer, context: BaseToolContext, trace: TraceLogger): void {
  for (const tool of allTools) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.inputSchema,
        annotations: tool.annotations,
        _meta: { tier: tool.tier },
      },
      (args, extra) => invokeTool(
        tool,
        args as Record<string, unknown>,
        { ...context, log: createLogCallback(extra) },
        trace
      )
    );
  }
}
