/**
 * Errors raised by the orbital core.
 *
 * Every failure is detected when a value is constructed, so callers either
 * hold a fully valid body/orbit/transfer or catch one of these.
 */

export type OrbitalErrorKind =
  | 'InvalidParameter'   // non-positive gm or radius, non-finite input
  | 'MissingData'        // body has no physical radius
  | 'IncompatibleBodies'; // transfer between orbits around different bodies

export class OrbitalError extends Error {
  readonly kind: OrbitalErrorKind;

  constructor(kind: OrbitalErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = 'OrbitalError';
  }
}

export function isOrbitalError(value: unknown): value is OrbitalError {
  return value instanceof OrbitalError;
}

/**
 * Throw InvalidParameter unless value is a finite number greater than zero.
 */
export function assertPositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new OrbitalError('InvalidParameter', `${label} must be a positive finite number (got ${value})`);
  }
}
