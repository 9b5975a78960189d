/**
 * Tool Types and Schemas
 *
 * Shared types, interfaces, and schemas for MCP tool definitions.
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { AU_M, PLANETS, matchBodyName } from './orbital/index.js';

// Re-export for convenience
export type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/**
 * Tool definition interface.
 * Each tool file exports a definition that includes metadata and handler.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  annotations: {
    readOnlyHint: boolean;
    destructiveHint: boolean;
    idempotentHint: boolean;
    openWorldHint: boolean;
  };
  tier: number;
  handler: (args: Record<string, unknown>, context: ToolContext) => Promise<CallToolResult>;
}

/**
 * Context passed to tool handlers.
 */
export interface ToolContext {
  successResponse: (action: string, text: string) => CallToolResult;
  errorResponse: (action: string, error: string) => CallToolResult;
  /** Informational message for the calling client */
  log: (message: string) => void;
}

/**
 * Annotations shared by every calculator tool: pure, repeatable, local.
 */
export const CALCULATION_ANNOTATIONS = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: false,
} as const;

// ============================================================================
// Shared Schemas
// ============================================================================

/** Metres per unit; unit names are case-sensitive so "Mm" is never read as "mm" */
const DISTANCE_UNITS: Readonly<Record<string, number>> = {
  m: 1,
  km: 1000,
  Mm: 1_000_000,
  AU: AU_M,
  au: AU_M,
};

/**
 * Parse distance string with optional units (m, km, Mm, AU) to meters.
 * Handles inputs like "400km" or "1.5 AU" and converts to meters.
 */
export function parseDistance(val: unknown): number | unknown {
  if (typeof val === 'number') return val;
  if (typeof val !== 'string') return val;

  const match = val.trim().match(/^(-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)\s*([A-Za-z]+)?$/);
  if (!match) return val; // Let Zod handle invalid input

  const factor = DISTANCE_UNITS[match[2] ?? 'm'];
  if (factor === undefined) return val;

  return Number.parseFloat(match[1]) * factor;
}

/**
 * Zod schema for distance values that accepts numbers or strings with units.
 * Examples: 400000, "400km", "0.4Mm", "1.52 AU"
 */
export const distanceSchema = z.preprocess(parseDistance, z.number().finite());

/**
 * Preprocess body name to handle aliases and misspellings.
 * Unknown names pass through unchanged so the handler can report them.
 */
export function parseBody(val: unknown): string | unknown {
  if (typeof val !== 'string') return val;
  return matchBodyName(val) ?? val;
}

export const bodySchema = z.preprocess(parseBody, z.string())
  .optional()
  .describe('Central body (Sun, Mercury, Venus, Earth, Moon, Mars, Jupiter, Saturn, Uranus, Neptune). Defaults to Earth.');

export const planetSchema = z.preprocess(
  (val) => (typeof val === 'string' ? val.trim().toLowerCase() : val),
  z.enum(PLANETS)
).describe(`Planet name: ${PLANETS.join(', ')}`);

export const formatSchema = z.enum(['text', 'json'])
  .optional()
  .default('text')
  .describe('Output format: text summary (default) or json');

/**
 * Message text for an unknown error value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
