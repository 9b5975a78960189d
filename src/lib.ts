/**
 * hohmann-mcp Public API
 *
 * This module exports all public APIs for use as a library.
 *
 * @example
 * ```typescript
 * import { earth, lowOrbit, geostationaryOrbit, HohmannTransfer } from 'hohmann-mcp';
 *
 * const body = earth();
 * const transfer = new HohmannTransfer(lowOrbit(body), geostationaryOrbit(body));
 * console.log(transfer.result.totalDeltaV);
 * ```
 */

// =============================================================================
// Orbital mechanics
// =============================================================================

export * from './lib/orbital/index.js';

// =============================================================================
// Configuration
// =============================================================================

export { config, loadConfig } from './config/index.js';
export type { Config, ServerTransport } from './config/index.js';

// =============================================================================
// MCP Server
// =============================================================================

export { createServer } from './service/http-server.js';
export { allTools, registerAllTools, invokeTool } from './lib/tool-registry.js';
export type { BaseToolContext } from './lib/tool-registry.js';

// =============================================================================
// Tool Definitions (for direct use without MCP)
// =============================================================================

export {
  hohmannTransferTool,
  interplanetaryTransferTool,
  commonTransfersTool,
} from './lib/tools/transfer.js';
export { listBodiesTool, orbitInfoTool } from './lib/tools/bodies.js';
export { parseDistance, distanceSchema } from './lib/tool-types.js';
export type { ToolDefinition, ToolContext } from './lib/tool-types.js';

// =============================================================================
// Tracing
// =============================================================================

export { TraceLogger } from './utils/trace-logger.js';
export type { TraceLoggerOptions } from './utils/trace-logger.js';
