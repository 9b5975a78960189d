/**
 * Transfer tools
 *
 * MCP tool definitions for Hohmann transfer planning around a single body
 * and between planets.
 */

import { config } from '../../config/index.js';
import {
  HohmannTransfer,
  commonTransfers,
  formatCommonTransfers,
  formatTransferSummary,
  heliocentricOrbit,
} from '../orbital/index.js';
import {
  CALCULATION_ANNOTATIONS,
  bodySchema,
  distanceSchema,
  errorMessage,
  formatSchema,
  planetSchema,
  type ToolContext,
  type ToolDefinition,
} from '../tool-types.js';
import { parseArgs, resolveBody, resolveOrbit } from './shared.js';

function renderTransfer(transfer: HohmannTransfer, format: 'text' | 'json'): string {
  return format === 'json'
    ? JSON.stringify(transfer.toJSON(), null, 2)
    : formatTransferSummary(transfer);
}

function logTransfer(ctx: ToolContext, transfer: HohmannTransfer): void {
  ctx.log(
    `${transfer.initialOrbit.body.name}: ${transfer.result.totalDeltaV.toFixed(1)} m/s total, ` +
    `${transfer.transferTimeHours().toFixed(2)} h coast`
  );
}

const hohmannTransferShape = {
  body: bodySchema,
  initialAltitude: distanceSchema.optional()
    .describe('Initial altitude above the surface. Number in meters or string with units ("400km"). Default: 400 km'),
  initialRadius: distanceSchema.optional()
    .describe('Initial radius from the body center, instead of initialAltitude. Required for bodies without a surface'),
  finalAltitude: distanceSchema.optional()
    .describe('Final altitude above the surface. Default: 35,786 km'),
  finalRadius: distanceSchema.optional()
    .describe('Final radius from the body center, instead of finalAltitude'),
  format: formatSchema,
};

export const hohmannTransferTool: ToolDefinition = {
  name: 'hohmann_transfer',
  description: 'Plan a Hohmann transfer between two circular orbits around one body. Returns both burns, total delta-v, coast time and rendezvous phase angle.',
  inputSchema: hohmannTransferShape,
  annotations: CALCULATION_ANNOTATIONS,
  tier: 1,
  handler: async (args, ctx) => {
    try {
      const input = parseArgs(hohmannTransferShape, args);
      const body = resolveBody(input.body);
      const initial = resolveOrbit(
        body,
        { altitude: input.initialAltitude, radius: input.initialRadius },
        config.defaults.initialAltitudeKm * 1000,
        ['initialAltitude', 'initialRadius']
      );
      const final = resolveOrbit(
        body,
        { altitude: input.finalAltitude, radius: input.finalRadius },
        config.defaults.finalAltitudeKm * 1000,
        ['finalAltitude', 'finalRadius']
      );

      const transfer = new HohmannTransfer(initial, final);
      logTransfer(ctx, transfer);
      return ctx.successResponse('hohmann_transfer', renderTransfer(transfer, input.format));
    } catch (error) {
      return ctx.errorResponse('hohmann_transfer', errorMessage(error));
    }
  },
};

const interplanetaryTransferShape = {
  from: planetSchema,
  to: planetSchema,
  format: formatSchema,
};

export const interplanetaryTransferTool: ToolDefinition = {
  name: 'interplanetary_transfer',
  description: 'Heliocentric Hohmann transfer between the mean orbits of two planets (e.g. earth to mars). Ignores departure and capture burns.',
  inputSchema: interplanetaryTransferShape,
  annotations: CALCULATION_ANNOTATIONS,
  tier: 1,
  handler: async (args, ctx) => {
    try {
      const input = parseArgs(interplanetaryTransferShape, args);
      const transfer = new HohmannTransfer(heliocentricOrbit(input.from), heliocentricOrbit(input.to));
      logTransfer(ctx, transfer);
      return ctx.successResponse('interplanetary_transfer', renderTransfer(transfer, input.format));
    } catch (error) {
      return ctx.errorResponse('interplanetary_transfer', errorMessage(error));
    }
  },
};

export const commonTransfersTool: ToolDefinition = {
  name: 'common_transfers',
  description: 'Delta-v and coast time for frequently quoted Earth transfers (LEO to GEO, GPS, lunar distance).',
  inputSchema: {},
  annotations: CALCULATION_ANNOTATIONS,
  tier: 2,
  handler: async (_args, ctx) => {
    try {
      return ctx.successResponse('common_transfers', formatCommonTransfers(commonTransfers()));
    } catch (error) {
      return ctx.errorResponse('common_transfers', errorMessage(error));
    }
  },
};
