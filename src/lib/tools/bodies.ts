/**
 * Body and orbit information tools
 */

import { formatOrbitInfo, listBodies } from '../orbital/index.js';
import {
  CALCULATION_ANNOTATIONS,
  bodySchema,
  distanceSchema,
  errorMessage,
  formatSchema,
  type ToolDefinition,
} from '../tool-types.js';
import { parseArgs, resolveBody, resolveOrbit } from './shared.js';

export const listBodiesTool: ToolDefinition = {
  name: 'list_bodies',
  description: 'List preset bodies with gravitational parameter and mean radius.',
  inputSchema: {},
  annotations: CALCULATION_ANNOTATIONS,
  tier: 2,
  handler: async (_args, ctx) => {
    try {
      const lines = listBodies().map((body) => {
        const radius = body.radius === undefined ? 'n/a' : `${(body.radius / 1000).toFixed(1)} km`;
        return `${body.name}: GM ${body.gm.toExponential()} m^3/s^2, radius ${radius}`;
      });
      return ctx.successResponse('list_bodies', lines.join('\n'));
    } catch (error) {
      return ctx.errorResponse('list_bodies', errorMessage(error));
    }
  },
};

const orbitInfoShape = {
  body: bodySchema,
  altitude: distanceSchema.optional()
    .describe('Altitude above the surface. Number in meters or string with units ("400km")'),
  radius: distanceSchema.optional()
    .describe('Radius from the body center, instead of altitude'),
  format: formatSchema,
};

export const orbitInfoTool: ToolDefinition = {
  name: 'orbit_info',
  description: 'Velocity, period and escape velocity of a circular orbit given by altitude or radius.',
  inputSchema: orbitInfoShape,
  annotations: CALCULATION_ANNOTATIONS,
  tier: 2,
  handler: async (args, ctx) => {
    try {
      const input = parseArgs(orbitInfoShape, args);
      if (input.altitude === undefined && input.radius === undefined) {
        return ctx.errorResponse('orbit_info', 'Specify altitude or radius');
      }
      const body = resolveBody(input.body);
      const orbit = resolveOrbit(body, input, 0);

      if (input.format === 'json') {
        const altitude = orbit.altitude();
        return ctx.successResponse('orbit_info', JSON.stringify({
          body: body.name,
          radius: orbit.radius,
          altitude: altitude ?? null,
          velocity: orbit.velocity(),
          escapeVelocity: orbit.escapeVelocity(),
          period: orbit.period(),
          periodHours: orbit.periodHours(),
        }, null, 2));
      }
      return ctx.successResponse('orbit_info', formatOrbitInfo(orbit));
    } catch (error) {
      return ctx.errorResponse('orbit_info', errorMessage(error));
    }
  },
};
