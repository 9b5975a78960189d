/**
 * Central configuration for hohmann-mcp
 *
 * Loads environment variables from .env file (if present) and provides
 * typed defaults for all configurable values.
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   const body = findBody(config.defaults.body);
 */
import { config as loadDotenv } from 'dotenv';

// Load .env file (no-op if doesn't exist, quiet suppresses promotional message)
loadDotenv({ quiet: true });

export type ServerTransport = 'stdio' | 'http';

function parseTransport(value: string | undefined): ServerTransport {
  return value === 'http' ? 'http' : 'stdio';
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Build a configuration object from an environment map.
 */
export function loadConfig(env: NodeJS.ProcessEnv) {
  return Object.freeze({
    // MCP server defaults
    server: {
      /**
       * Transport type:
       * - 'stdio': for desktop clients and local tools (default)
       * - 'http': Streamable HTTP for network access
       */
      transport: parseTransport(env.HOHMANN_TRANSPORT),
      host: env.HOHMANN_HOST ?? '127.0.0.1',
      port: Math.trunc(parseNumber(env.HOHMANN_PORT, 3000)),
    },

    // Defaults used when a caller leaves an orbit or body unspecified
    defaults: {
      body: env.HOHMANN_DEFAULT_BODY || 'Earth',
      initialAltitudeKm: parseNumber(env.HOHMANN_INITIAL_ALT_KM, 400),
      finalAltitudeKm: parseNumber(env.HOHMANN_FINAL_ALT_KM, 35786),
    },

    /** Prefix tool errors with the tool name */
    debug: env.HOHMANN_DEBUG === '1',

    trace: {
      /** Write a per-session log of every tool call */
      enabled: Boolean(env.HOHMANN_TRACE),
      dir: env.HOHMANN_TRACE_DIR || 'logs',
    },
  });
}

export const config = loadConfig(process.env);

export type Config = ReturnType<typeof loadConfig>;
