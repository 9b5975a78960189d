/**
 * Helpers shared by the calculator tools: resolving user input into bodies
 * and orbits.
 */

import { z } from 'zod';
import { config } from '../../config/index.js';
import {
  BODY_PRESETS,
  CircularOrbit,
  findBody,
  type GravitatingBody,
} from '../orbital/index.js';

/**
 * Resolve a body name (or the configured default) to a preset body.
 */
export function resolveBody(name: string | undefined): GravitatingBody {
  const requested = name ?? config.defaults.body;
  const body = findBody(requested);
  if (!body) {
    throw new Error(`Unknown body "${requested}". Known bodies: ${Object.keys(BODY_PRESETS).join(', ')}`);
  }
  return body;
}

export interface OrbitInput {
  altitude?: number;
  radius?: number;
}

/**
 * Build an orbit from either a radius or an altitude (metres).
 * When neither is given the fallback altitude is used.
 *
 * @param fields argument names used in the error message
 */
export function resolveOrbit(
  body: GravitatingBody,
  input: OrbitInput,
  fallbackAltitude: number,
  fields: readonly [string, string] = ['altitude', 'radius']
): CircularOrbit {
  if (input.altitude !== undefined && input.radius !== undefined) {
    throw new Error(`Specify either ${fields[0]} or ${fields[1]}, not both`);
  }
  if (input.radius !== undefined) {
    return new CircularOrbit(body, input.radius);
  }
  return CircularOrbit.fromAltitude(body, input.altitude ?? fallbackAltitude);
}

/**
 * Validate raw tool arguments against a tool's input shape.
 * Throws with every issue joined into one line.
 */
export function parseArgs<T extends z.ZodRawShape>(
  shape: T,
  args: Record<string, unknown>
): z.infer<z.ZodObject<T>> {
  const parsed = z.object(shape).safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new Error(`Invalid arguments: ${issues.join('; ')}`);
  }
  return parsed.data;
}
