import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { config } from '../config/index.js';
import { HOHMANN_GUIDE } from '../config/mcp-resources.js';
import { listBodies } from '../lib/orbital/index.js';
import { registerAllTools, type BaseToolContext } from '../lib/tool-registry.js';
import type { CallToolResult } from '../lib/tool-types.js';
import { TraceLogger } from '../utils/trace-logger.js';

/**
 * Helper to create a success response.
 */
export function successResponse(_action: string, text: string): CallToolResult {
  return {
    content: [{ type: 'text' as const, text }],
  };
}

/**
 * Helper to create an error response.
 * In debug mode, the message is prefixed with the tool name.
 */
export function errorResponse(action: string, error: string): CallToolResult {
  const text = config.debug ? `${action}: ${error}` : error;
  return {
    content: [{ type: 'text' as const, text }],
    isError: true,
  };
}

export interface Closable {
  close(): Promise<void>;
}

/**
 * Close per-request objects once the response is finished.
 * Stateless HTTP builds a server and transport for every request.
 */
export function closeOnResponseClose(
  res: { once(event: 'close', listener: () => void): unknown },
  ...targets: Closable[]
): void {
  res.once('close', () => {
    for (const target of targets) {
      target.close().catch((error: unknown) => {
        console.error('[hohmann-mcp] Failed to close request resources:', error);
      });
    }
  });
}

export function createServer(trace: TraceLogger = new TraceLogger('server', config.trace)): McpServer {
  const server = new McpServer({
    name: 'hohmann-mcp',
    version: '0.1.0',
  });

  const context: BaseToolContext = {
    successResponse,
    errorResponse,
  };

  // Register all tools from the tool registry
  registerAllTools(server, context, trace);

  // =============================================================================
  // MCP Resources (documentation)
  // =============================================================================

  server.resource(
    'hohmann-guide',
    'hohmann://guide',
    async () => ({
      contents: [{
        uri: 'hohmann://guide',
        mimeType: 'text/markdown',
        text: HOHMANN_GUIDE,
      }],
    })
  );

  server.resource(
    'hohmann-bodies',
    'hohmann://bodies',
    async () => ({
      contents: [{
        uri: 'hohmann://bodies',
        mimeType: 'application/json',
        text: JSON.stringify(
          listBodies().map((body) => ({ name: body.name, gm: body.gm, radius: body.radius ?? null })),
          null,
          2
        ),
      }],
    })
  );

  return server;
}
