#!/usr/bin/env node
/**
 * hohmann-mcp Server Entry Point
 *
 * Starts the MCP server with configurable transport:
 * - stdio (default): For desktop clients and local tools
 * - http: For network access using Streamable HTTP transport
 *
 * @example
 * ```bash
 * # Default: stdio transport
 * hohmann-mcp
 *
 * # Network: Streamable HTTP transport
 * hohmann-mcp --transport http --port 3000 --host 0.0.0.0
 * ```
 */

import { randomUUID } from 'node:crypto';
import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { parseArgs } from 'node:util';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { config } from './config/index.js';
import { closeOnResponseClose, createServer } from './service/http-server.js';
import { TraceLogger } from './utils/trace-logger.js';

// =============================================================================
// Library API Re-exports (for direct imports from 'hohmann-mcp')
// =============================================================================

export * from './lib.js';

// =============================================================================
// Server Entry Point (only runs when executed directly, not when imported)
// =============================================================================

function showHelp(): void {
  console.log(`
hohmann-mcp - MCP server for Hohmann transfer planning

Usage:
  hohmann-mcp [options]

Options:
  -t, --transport <type>  Transport type: stdio (default), http
  -p, --port <port>       Port for HTTP transport (default: ${config.server.port})
  -h, --host <host>       Host for HTTP transport (default: ${config.server.host})
  --stateless             Run HTTP in stateless mode (no sessions)
  --help                  Show this help

Environment:
  HOHMANN_TRANSPORT, HOHMANN_HOST, HOHMANN_PORT set the defaults above.
  HOHMANN_TRACE=1 writes a log of every tool call to HOHMANN_TRACE_DIR (default: logs).

Examples:
  # Start with stdio transport (for desktop clients)
  hohmann-mcp

  # Start with Streamable HTTP transport for network access
  hohmann-mcp --transport http --port 3000

  # Stateless mode (each request is independent)
  hohmann-mcp --transport http --stateless
`);
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function startHttpServer(host: string, port: number, stateless: boolean, trace: TraceLogger) {
  // Track sessions -> transports for stateful mode
  const sessions = new Map<string, {
    transport: StreamableHTTPServerTransport;
    server: ReturnType<typeof createServer>;
  }>();

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // CORS headers for cross-origin access
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, mcp-session-id, Mcp-Protocol-Version');
    res.setHeader('Access-Control-Expose-Headers', 'mcp-session-id');

    if (req.method === 'OPTIONS') {
      res.writeHead(200);
      res.end();
      return;
    }

    const url = new URL(req.url || '/', `http://${req.headers.host ?? `${host}:${port}`}`);

    // Health check endpoint
    if (req.method === 'GET' && url.pathname === '/health') {
      sendJson(res, 200, {
        status: 'ok',
        transport: 'streamable-http',
        sessions: sessions.size,
        stateless,
      });
      return;
    }

    if (url.pathname !== '/mcp') {
      sendJson(res, 404, { error: 'Not found. Use /mcp for MCP requests or /health for status.' });
      return;
    }

    if (stateless) {
      // Stateless: new transport for each request
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
      });
      const server = createServer(trace);
      closeOnResponseClose(res, transport, server);
      await server.connect(transport);
      await transport.handleRequest(req, res);
      return;
    }

    const header = req.headers['mcp-session-id'];
    const sessionId = typeof header === 'string' ? header : undefined;

    if (sessionId) {
      const session = sessions.get(sessionId);
      if (session) {
        await session.transport.handleRequest(req, res);
      } else {
        sendJson(res, 404, { error: 'Session not found' });
      }
      return;
    }

    if (req.method !== 'POST') {
      sendJson(res, 400, { error: 'Missing mcp-session-id header' });
      return;
    }

    // New session - create transport and server
    const server = createServer(trace);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        console.error(`[${newSessionId}] Session initialized`);
        trace.logInfo(`Session ${newSessionId} initialized`);
        sessions.set(newSessionId, { transport, server });
      },
    });
    transport.onclose = () => {
      if (transport.sessionId) {
        console.error(`[${transport.sessionId}] Session closed`);
        trace.logInfo(`Session ${transport.sessionId} closed`);
        sessions.delete(transport.sessionId);
      }
    };

    await server.connect(transport);
    await transport.handleRequest(req, res);
  }

  const httpServer = createHttpServer((req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      console.error('[hohmann-mcp] Request failed:', error);
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal server error' });
      }
    });
  });

  httpServer.listen(port, host, () => {
    console.error(`hohmann-mcp server running on http://${host}:${port}`);
    console.error(`  MCP endpoint: http://${host}:${port}/mcp`);
    console.error(`  Health check: http://${host}:${port}/health`);
    console.error(`  Mode: ${stateless ? 'stateless' : 'stateful (session-based)'}`);
  });

  async function shutdown(): Promise<void> {
    console.error('\nShutting down...');
    for (const [sessionId, session] of sessions) {
      console.error(`Closing session ${sessionId}`);
      await session.transport.close();
    }
    httpServer.close();
    await trace.close();
  }

  // Cleanup on shutdown
  process.on('SIGINT', () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[hohmann-mcp] Shutdown failed:', error);
        process.exit(1);
      });
  });

  return httpServer;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      transport: {
        type: 'string',
        short: 't',
        default: config.server.transport,
      },
      port: {
        type: 'string',
        short: 'p',
        default: String(config.server.port),
      },
      host: {
        type: 'string',
        short: 'h',
        default: config.server.host,
      },
      stateless: {
        type: 'boolean',
        default: false,
      },
      help: {
        type: 'boolean',
      },
    },
    allowPositionals: false,
  });

  if (values.help) {
    showHelp();
    return;
  }

  const trace = new TraceLogger('server', config.trace);
  if (trace.filePath) {
    console.error(`[hohmann-mcp] Tracing tool calls to ${trace.filePath}`);
  }

  if (values.transport === 'http') {
    const port = Number.parseInt(values.port, 10);
    if (!Number.isInteger(port) || port <= 0) {
      throw new Error(`Invalid port: ${values.port}`);
    }
    startHttpServer(values.host, port, values.stateless, trace);
    trace.logInfo(`Server started (http ${values.host}:${port}, ${values.stateless ? 'stateless' : 'stateful'})`);
  } else {
    // Default: stdio transport
    const server = createServer(trace);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    trace.logInfo('Server started (stdio)');
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
