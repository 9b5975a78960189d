/**
 * Preset bodies and orbits
 *
 * Factories returning fully-formed values from the reference data in
 * constants.ts, plus name lookup for user-facing input.
 *
 * @example
 * ```typescript
 * import { earth, lowOrbit, geostationaryOrbit, HohmannTransfer } from 'hohmann-mcp';
 *
 * const body = earth();
 * const transfer = new HohmannTransfer(lowOrbit(body), geostationaryOrbit(body));
 * ```
 */

import { GravitatingBody } from './body.js';
import { CircularOrbit } from './orbit.js';
import {
  BODY_RADIUS,
  GEOSTATIONARY_ALTITUDE,
  GM,
  LOW_ORBIT_ALTITUDE,
  NAVIGATION_ORBIT_ALTITUDE,
  ORBITAL_RADIUS,
  PLANETS,
  STATION_ORBIT_ALTITUDE,
  type PlanetName,
} from './constants.js';

// =============================================================================
// Bodies
// =============================================================================

export function sun(): GravitatingBody {
  return new GravitatingBody('Sun', GM.sun, BODY_RADIUS.sun);
}

export function mercury(): GravitatingBody {
  return new GravitatingBody('Mercury', GM.mercury);
}

export function venus(): GravitatingBody {
  return new GravitatingBody('Venus', GM.venus);
}

export function earth(): GravitatingBody {
  return new GravitatingBody('Earth', GM.earth, BODY_RADIUS.earth);
}

export function moon(): GravitatingBody {
  return new GravitatingBody('Moon', GM.moon, BODY_RADIUS.moon);
}

export function mars(): GravitatingBody {
  return new GravitatingBody('Mars', GM.mars, BODY_RADIUS.mars);
}

/** No solid surface, so no radius: altitude-based orbits around Jupiter fail */
export function jupiter(): GravitatingBody {
  return new GravitatingBody('Jupiter', GM.jupiter);
}

export function saturn(): GravitatingBody {
  return new GravitatingBody('Saturn', GM.saturn);
}

export function uranus(): GravitatingBody {
  return new GravitatingBody('Uranus', GM.uranus);
}

export function neptune(): GravitatingBody {
  return new GravitatingBody('Neptune', GM.neptune);
}

/**
 * Preset factories by canonical name, in order of distance from the Sun.
 */
export const BODY_PRESETS: Readonly<Record<string, () => GravitatingBody>> = Object.freeze({
  Sun: sun,
  Mercury: mercury,
  Venus: venus,
  Earth: earth,
  Moon: moon,
  Mars: mars,
  Jupiter: jupiter,
  Saturn: saturn,
  Uranus: uranus,
  Neptune: neptune,
});

export function listBodies(): GravitatingBody[] {
  return Object.values(BODY_PRESETS).map((factory) => factory());
}

// =============================================================================
// Name lookup
// =============================================================================

/**
 * Common alternative names, keyed by canonical name.
 */
const BODY_ALIASES: Record<string, string[]> = {
  'Sun': ['sol', 'the sun', 'star'],
  'Mercury': ['mercurius'],
  'Venus': ['the morning star'],
  'Earth': ['terra', 'the earth', 'tellus'],
  'Moon': ['luna', 'the moon', 'selene'],
  'Mars': ['the red planet'],
  'Jupiter': ['jove'],
  'Saturn': [],
  'Uranus': [],
  'Neptune': [],
};

/**
 * Calculate Levenshtein distance between two strings.
 */
function levenshtein(a: string, b: string): number {
  const matrix: number[][] = [];
  for (let i = 0; i <= b.length; i++) matrix[i] = [i];
  for (let j = 0; j <= a.length; j++) matrix[0][j] = j;
  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      matrix[i][j] = b[i - 1] === a[j - 1]
        ? matrix[i - 1][j - 1]
        : Math.min(matrix[i - 1][j - 1] + 1, matrix[i][j - 1] + 1, matrix[i - 1][j] + 1);
    }
  }
  return matrix[b.length][a.length];
}

function normalize(value: string): string {
  return value.toLowerCase().trim().replaceAll(/\s+/g, '');
}

/**
 * Resolve user input to a canonical preset name.
 * Tries exact names, then aliases, then a Levenshtein match.
 *
 * Fuzzy matches must share the first letter and be unambiguous; inputs
 * under five characters allow a single edit.
 */
export function matchBodyName(input: string): string | undefined {
  const normalized = normalize(input);
  if (normalized.length === 0) return undefined;

  for (const canonical of Object.keys(BODY_ALIASES)) {
    if (canonical.toLowerCase() === normalized) return canonical;
  }

  for (const [canonical, aliases] of Object.entries(BODY_ALIASES)) {
    for (const alias of aliases) {
      if (normalize(alias) === normalized) return canonical;
    }
  }

  let bestMatch: string | undefined;
  let bestScore = Infinity;
  let tied = false;
  const maxDistance = normalized.length < 5 ? 1 : Math.max(2, Math.floor(normalized.length * 0.4));

  for (const canonical of Object.keys(BODY_ALIASES)) {
    const candidate = canonical.toLowerCase();
    if (candidate[0] !== normalized[0]) continue;

    const distance = levenshtein(normalized, candidate);
    if (distance > maxDistance) continue;
    if (distance < bestScore) {
      bestScore = distance;
      bestMatch = canonical;
      tied = false;
    } else if (distance === bestScore) {
      tied = true;
    }
  }

  return tied ? undefined : bestMatch;
}

/**
 * Look up a preset body by (possibly misspelled) name.
 */
export function findBody(name: string): GravitatingBody | undefined {
  const canonical = matchBodyName(name);
  if (!canonical) return undefined;
  return BODY_PRESETS[canonical]?.();
}

// =============================================================================
// Orbits
// =============================================================================

/** Low orbit, 400 km */
export function lowOrbit(body: GravitatingBody): CircularOrbit {
  return CircularOrbit.fromAltitude(body, LOW_ORBIT_ALTITUDE);
}

/** Space-station altitude, 420 km */
export function stationOrbit(body: GravitatingBody): CircularOrbit {
  return CircularOrbit.fromAltitude(body, STATION_ORBIT_ALTITUDE);
}

/** Geostationary altitude, 35,786 km */
export function geostationaryOrbit(body: GravitatingBody): CircularOrbit {
  return CircularOrbit.fromAltitude(body, GEOSTATIONARY_ALTITUDE);
}

/** Navigation-constellation altitude, 20,200 km */
export function navigationOrbit(body: GravitatingBody): CircularOrbit {
  return CircularOrbit.fromAltitude(body, NAVIGATION_ORBIT_ALTITUDE);
}

export function isPlanetName(value: string): value is PlanetName {
  return PLANETS.some((planet) => planet === value);
}

/**
 * Circular orbit around the Sun at a planet's mean orbital radius.
 */
export function heliocentricOrbit(planet: PlanetName): CircularOrbit {
  return new CircularOrbit(sun(), ORBITAL_RADIUS[planet]);
}
