import type { CircularOrbit } from './orbit.js';
import { OrbitalError, assertPositive } from './errors.js';
import {
  DEG_PER_RAD,
  SAME_BODY_GM_TOLERANCE,
  SECONDS_PER_DAY,
  SECONDS_PER_HOUR,
} from './constants.js';

/**
 * Result of a Hohmann transfer calculation. Burn values are magnitudes.
 */
export interface TransferResult {
  /** Departure burn (m/s) */
  readonly deltaV1: number;
  /** Arrival burn (m/s) */
  readonly deltaV2: number;
  readonly totalDeltaV: number;
  /** Coast time from first to second burn (s) */
  readonly transferTime: number;
  /** Transfer ellipse semi-major axis (m) */
  readonly semiMajorAxis: number;
}

export function transferTimeHours(result: TransferResult): number {
  return result.transferTime / SECONDS_PER_HOUR;
}

export function transferTimeDays(result: TransferResult): number {
  return result.transferTime / SECONDS_PER_DAY;
}

/**
 * Compute a Hohmann transfer from radius r1 to radius r2 around a body with
 * gravitational parameter mu.
 *
 * The four speeds come from vis-viva, v² = mu(2/r − 1/a): circular at r1,
 * transfer ellipse at r1 and r2, circular at r2. Coast time is half the
 * transfer ellipse period.
 *
 * @throws OrbitalError InvalidParameter unless all three inputs are positive and finite
 */
export function computeTransfer(r1: number, r2: number, mu: number): TransferResult {
  assertPositive(r1, 'Initial radius');
  assertPositive(r2, 'Final radius');
  assertPositive(mu, 'Gravitational parameter');

  const aTransfer = (r1 + r2) / 2;
  const transferTime = Math.PI * Math.sqrt(aTransfer ** 3 / mu);

  // Same radius: nothing to burn. Vis-viva and sqrt(mu/r) round differently.
  if (r1 === r2) {
    return Object.freeze({
      deltaV1: 0,
      deltaV2: 0,
      totalDeltaV: 0,
      transferTime,
      semiMajorAxis: aTransfer,
    });
  }

  const v1 = Math.sqrt(mu / r1);
  const vTransfer1 = Math.sqrt(mu * (2 / r1 - 1 / aTransfer));
  const vTransfer2 = Math.sqrt(mu * (2 / r2 - 1 / aTransfer));
  const v2 = Math.sqrt(mu / r2);

  let dv1: number;
  let dv2: number;
  if (r2 > r1) {
    // Raising: prograde at periapsis, prograde again at apoapsis
    dv1 = vTransfer1 - v1;
    dv2 = v2 - vTransfer2;
  } else {
    // Lowering: retrograde at apoapsis, retrograde again at periapsis
    dv1 = v1 - vTransfer1;
    dv2 = vTransfer2 - v2;
  }

  const deltaV1 = Math.abs(dv1);
  const deltaV2 = Math.abs(dv2);

  return Object.freeze({
    deltaV1,
    deltaV2,
    totalDeltaV: deltaV1 + deltaV2,
    transferTime,
    semiMajorAxis: aTransfer,
  });
}

/**
 * Plain snapshot of a transfer, as written by `--json` and the MCP tools.
 */
export interface TransferSummary {
  body: string;
  initialRadius: number;
  finalRadius: number;
  initialAltitude: number | null;
  finalAltitude: number | null;
  raising: boolean;
  deltaV1: number;
  deltaV2: number;
  totalDeltaV: number;
  semiMajorAxis: number;
  transferTime: number;
  transferTimeHours: number;
  transferTimeDays: number;
  phaseAngleDeg: number;
}

/**
 * Two-impulse transfer between two circular orbits around the same body.
 *
 * Everything is computed in the constructor; the instance and its result
 * are frozen.
 *
 * @example
 * ```typescript
 * const earthBody = earth();
 * const transfer = new HohmannTransfer(lowOrbit(earthBody), geostationaryOrbit(earthBody));
 * transfer.result.totalDeltaV; // ≈ 3856.6 m/s
 * ```
 */
export class HohmannTransfer {
  readonly initialOrbit: CircularOrbit;
  readonly finalOrbit: CircularOrbit;
  readonly result: TransferResult;

  /**
   * @throws OrbitalError IncompatibleBodies when the orbits are around different bodies
   */
  constructor(initialOrbit: CircularOrbit, finalOrbit: CircularOrbit) {
    const gmDifference = Math.abs(initialOrbit.body.gm - finalOrbit.body.gm);
    if (gmDifference > SAME_BODY_GM_TOLERANCE) {
      throw new OrbitalError(
        'IncompatibleBodies',
        `Cannot transfer between orbits around different bodies (${initialOrbit.body.name} and ${finalOrbit.body.name})`
      );
    }

    this.initialOrbit = initialOrbit;
    this.finalOrbit = finalOrbit;
    this.result = computeTransfer(initialOrbit.radius, finalOrbit.radius, initialOrbit.body.gm);
    Object.freeze(this);
  }

  /** True when the final orbit is higher than the initial one */
  isRaising(): boolean {
    return this.finalOrbit.radius > this.initialOrbit.radius;
  }

  /**
   * Angle (rad) by which a target in the final orbit must lead the vehicle
   * at the first burn, so both arrive together after the vehicle sweeps π.
   *
   * Negative when the target must trail (lowering transfers). The value is
   * not normalised.
   */
  phaseAngle(): number {
    const r1 = this.initialOrbit.radius;
    const r2 = this.finalOrbit.radius;
    return Math.PI * (1 - Math.pow(r1 / r2 + 1, 1.5) / (2 * Math.SQRT2));
  }

  phaseAngleDegrees(): number {
    return this.phaseAngle() * DEG_PER_RAD;
  }

  transferTimeHours(): number {
    return transferTimeHours(this.result);
  }

  transferTimeDays(): number {
    return transferTimeDays(this.result);
  }

  toJSON(): TransferSummary {
    return {
      body: this.initialOrbit.body.name,
      initialRadius: this.initialOrbit.radius,
      finalRadius: this.finalOrbit.radius,
      initialAltitude: this.initialOrbit.altitude() ?? null,
      finalAltitude: this.finalOrbit.altitude() ?? null,
      raising: this.isRaising(),
      deltaV1: this.result.deltaV1,
      deltaV2: this.result.deltaV2,
      totalDeltaV: this.result.totalDeltaV,
      semiMajorAxis: this.result.semiMajorAxis,
      transferTime: this.result.transferTime,
      transferTimeHours: this.transferTimeHours(),
      transferTimeDays: this.transferTimeDays(),
      phaseAngleDeg: this.phaseAngleDegrees(),
    };
  }
}
