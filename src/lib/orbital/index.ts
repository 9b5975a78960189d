export { GravitatingBody } from './body.js';
export { CircularOrbit } from './orbit.js';
export {
  HohmannTransfer,
  computeTransfer,
  transferTimeHours,
  transferTimeDays,
} from './transfer.js';
export type { TransferResult, TransferSummary } from './transfer.js';
export { OrbitalError, isOrbitalError } from './errors.js';
export type { OrbitalErrorKind } from './errors.js';
export {
  sun,
  mercury,
  venus,
  earth,
  moon,
  mars,
  jupiter,
  saturn,
  uranus,
  neptune,
  BODY_PRESETS,
  listBodies,
  matchBodyName,
  findBody,
  lowOrbit,
  stationOrbit,
  geostationaryOrbit,
  navigationOrbit,
  heliocentricOrbit,
  isPlanetName,
} from './presets.js';
export {
  formatTransferSummary,
  formatOrbitInfo,
  formatCommonTransfers,
  commonTransfers,
} from './format.js';
export type { CommonTransfer } from './format.js';
export {
  GM,
  BODY_RADIUS,
  ORBITAL_RADIUS,
  PLANETS,
  AU_M,
  LOW_ORBIT_ALTITUDE,
  STATION_ORBIT_ALTITUDE,
  NAVIGATION_ORBIT_ALTITUDE,
  GEOSTATIONARY_ALTITUDE,
  LUNAR_DISTANCE,
  SAME_BODY_GM_TOLERANCE,
  SECONDS_PER_HOUR,
  SECONDS_PER_DAY,
} from './constants.js';
export type { PlanetName } from './constants.js';
