/**
 * Reference data for the preset bodies and orbits.
 *
 * All values are SI: metres, seconds, m^3/s^2.
 */

/** Gravitational parameters (GM) in m^3/s^2 */
export const GM = {
  sun: 1.32712440018e20,
  mercury: 2.2032e13,
  venus: 3.24859e14,
  earth: 3.986004418e14,
  moon: 4.9048695e12,
  mars: 4.282837e13,
  jupiter: 1.26686534e17,
  saturn: 3.7931187e16,
  uranus: 5.793939e15,
  neptune: 6.836529e15,
} as const;

/** Mean radii in metres, only for bodies with a well-defined surface */
export const BODY_RADIUS = {
  sun: 6.9634e8,
  earth: 6.371e6,
  moon: 1.7374e6,
  mars: 3.3895e6,
} as const;

export const PLANETS = [
  'mercury', 'venus', 'earth', 'mars', 'jupiter', 'saturn', 'uranus', 'neptune',
] as const;

export type PlanetName = typeof PLANETS[number];

/** Mean heliocentric orbital radii in metres */
export const ORBITAL_RADIUS: Readonly<Record<PlanetName, number>> = {
  mercury: 5.791e10,
  venus: 1.082e11,
  earth: 1.496e11, // 1 AU
  mars: 2.279e11,
  jupiter: 7.785e11,
  saturn: 1.432e12,
  uranus: 2.867e12,
  neptune: 4.515e12,
};

/** Preset orbit altitudes in metres */
export const LOW_ORBIT_ALTITUDE = 400e3;
export const STATION_ORBIT_ALTITUDE = 420e3;
export const NAVIGATION_ORBIT_ALTITUDE = 20200e3;
export const GEOSTATIONARY_ALTITUDE = 35786e3;

/** Mean Earth-Moon distance in metres, used as a transfer altitude */
export const LUNAR_DISTANCE = 384400e3;

/** Metres per astronomical unit */
export const AU_M = 149597870700;

/**
 * Largest gm difference (m^3/s^2) still treated as the same body.
 * Distinct bodies differ by orders of magnitude.
 */
export const SAME_BODY_GM_TOLERANCE = 1.0;

export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_DAY = 86400;
export const DEG_PER_RAD = 180 / Math.PI;
