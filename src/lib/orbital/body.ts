import { assertPositive } from './errors.js';

/**
 * A body that can be orbited, described by its gravitational parameter and,
 * when it has a solid surface, its mean radius.
 *
 * Instances are frozen at construction.
 */
export class GravitatingBody {
  readonly name: string;
  /** Gravitational parameter GM in m^3/s^2 */
  readonly gm: number;
  /** Mean radius in metres, undefined for bodies without a defined surface */
  readonly radius: number | undefined;

  constructor(name: string, gm: number, radius?: number) {
    assertPositive(gm, 'Gravitational parameter');
    if (radius !== undefined) {
      assertPositive(radius, 'Body radius');
    }
    this.name = name;
    this.gm = gm;
    this.radius = radius;
    Object.freeze(this);
  }

  /**
   * Circular orbital velocity (m/s) at a distance from the body centre.
   */
  circularVelocity(orbitalRadius: number): number {
    assertPositive(orbitalRadius, 'Orbital radius');
    return Math.sqrt(this.gm / orbitalRadius);
  }

  /**
   * Escape velocity (m/s) at a distance from the body centre.
   */
  escapeVelocity(distance: number): number {
    assertPositive(distance, 'Distance');
    return Math.sqrt((2 * this.gm) / distance);
  }

  /**
   * Period (s) of a circular orbit at the given radius.
   */
  orbitalPeriod(orbitalRadius: number): number {
    assertPositive(orbitalRadius, 'Orbital radius');
    return 2 * Math.PI * Math.sqrt(orbitalRadius ** 3 / this.gm);
  }
}
