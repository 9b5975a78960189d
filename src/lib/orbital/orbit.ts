import { GravitatingBody } from './body.js';
import { OrbitalError, assertPositive } from './errors.js';
import { SECONDS_PER_HOUR } from './constants.js';

/**
 * A circular orbit: a radius measured from the centre of a body.
 */
export class CircularOrbit {
  readonly body: GravitatingBody;
  /** Distance from the body centre in metres */
  readonly radius: number;

  constructor(body: GravitatingBody, radius: number) {
    assertPositive(radius, 'Orbital radius');
    // Own copy of the body; nothing outside can reach it through this orbit
    this.body = new GravitatingBody(body.name, body.gm, body.radius);
    this.radius = radius;
    Object.freeze(this);
  }

  /**
   * Build an orbit from an altitude above the body's mean surface.
   * Any altitude is accepted as long as the resulting radius is positive.
   *
   * @throws OrbitalError MissingData when the body has no defined radius
   */
  static fromAltitude(body: GravitatingBody, altitude: number): CircularOrbit {
    if (body.radius === undefined) {
      throw new OrbitalError(
        'MissingData',
        `Cannot create orbit from altitude: ${body.name} has no defined radius`
      );
    }
    return new CircularOrbit(body, body.radius + altitude);
  }

  /**
   * Altitude above the mean surface in metres, or undefined when the body
   * has no defined radius.
   */
  altitude(): number | undefined {
    if (this.body.radius === undefined) {
      return undefined;
    }
    return this.radius - this.body.radius;
  }

  velocity(): number {
    return this.body.circularVelocity(this.radius);
  }

  period(): number {
    return this.body.orbitalPeriod(this.radius);
  }

  periodHours(): number {
    return this.period() / SECONDS_PER_HOUR;
  }

  escapeVelocity(): number {
    return this.body.escapeVelocity(this.radius);
  }
}
