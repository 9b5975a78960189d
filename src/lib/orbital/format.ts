/**
 * Human-readable rendering of orbits and transfers, shared by the CLI and
 * the MCP tools.
 */

import { CircularOrbit } from './orbit.js';
import { HohmannTransfer } from './transfer.js';
import { earth, lowOrbit, stationOrbit, geostationaryOrbit, navigationOrbit } from './presets.js';
import { LUNAR_DISTANCE } from './constants.js';

const RULE = '========================================';

function km(metres: number): string {
  return `${(metres / 1000).toFixed(0)} km`;
}

function orbitLines(title: string, orbit: CircularOrbit): string[] {
  const lines = [`${title}:`, `  Radius:   ${km(orbit.radius)}`];
  const altitude = orbit.altitude();
  if (altitude !== undefined) {
    lines.push(`  Altitude: ${km(altitude)}`);
  }
  lines.push(`  Velocity: ${orbit.velocity().toFixed(2)} m/s`);
  lines.push(`  Period:   ${orbit.periodHours().toFixed(2)} hours`);
  return lines;
}

/**
 * Multi-line summary of a transfer: both orbits, the transfer ellipse, the
 * burns, the coast time and the rendezvous phase angle.
 */
export function formatTransferSummary(transfer: HohmannTransfer): string {
  const { result } = transfer;
  const hours = transfer.transferTimeHours();

  const lines = [
    RULE,
    '      Hohmann Transfer Summary',
    RULE,
    '',
    `Central Body: ${transfer.initialOrbit.body.name}`,
    '',
    ...orbitLines('Initial Orbit', transfer.initialOrbit),
    '',
    ...orbitLines('Final Orbit', transfer.finalOrbit),
    '',
    'Transfer Orbit:',
    `  Semi-major axis: ${km(result.semiMajorAxis)}`,
    `  Type: ${transfer.isRaising() ? 'Raising' : 'Lowering'}`,
    '',
    'Delta-v Requirements:',
    `  First burn (dv1):  ${result.deltaV1.toFixed(2)} m/s`,
    `  Second burn (dv2): ${result.deltaV2.toFixed(2)} m/s`,
    `  Total dv:          ${result.totalDeltaV.toFixed(2)} m/s`,
    '',
    'Transfer Time:',
  ];

  if (hours < 24) {
    lines.push(`  ${hours.toFixed(2)} hours`);
  } else {
    lines.push(`  ${transfer.transferTimeDays().toFixed(2)} days`);
    lines.push(`  (${hours.toFixed(2)} hours)`);
  }

  lines.push('');
  lines.push(`Phase Angle for Rendezvous: ${transfer.phaseAngleDegrees().toFixed(2)} deg`);
  lines.push(RULE);
  return lines.join('\n');
}

/**
 * Short description of a single orbit.
 */
export function formatOrbitInfo(orbit: CircularOrbit): string {
  const lines = [
    `Body: ${orbit.body.name}`,
    `  Radius:          ${km(orbit.radius)}`,
  ];
  const altitude = orbit.altitude();
  if (altitude !== undefined) {
    lines.push(`  Altitude:        ${km(altitude)}`);
  }
  lines.push(`  Velocity:        ${orbit.velocity().toFixed(2)} m/s`);
  lines.push(`  Escape velocity: ${orbit.escapeVelocity().toFixed(2)} m/s`);
  lines.push(`  Period:          ${orbit.periodHours().toFixed(2)} hours`);
  return lines.join('\n');
}

export interface CommonTransfer {
  label: string;
  transfer: HohmannTransfer;
}

/**
 * Frequently quoted Earth transfers.
 */
export function commonTransfers(): CommonTransfer[] {
  const body = earth();
  const leo = lowOrbit(body);
  const geo = geostationaryOrbit(body);

  return [
    { label: 'LEO (400 km) -> GEO (35,786 km)', transfer: new HohmannTransfer(leo, geo) },
    { label: 'LEO (400 km) -> GPS (20,200 km)', transfer: new HohmannTransfer(leo, navigationOrbit(body)) },
    { label: 'ISS (420 km) -> GEO (35,786 km)', transfer: new HohmannTransfer(stationOrbit(body), geo) },
    {
      label: 'LEO (400 km) -> Lunar distance (384,400 km)',
      transfer: new HohmannTransfer(leo, CircularOrbit.fromAltitude(body, LUNAR_DISTANCE)),
    },
  ];
}

export function formatCommonTransfers(rows: CommonTransfer[]): string {
  const lines = [RULE, '       Common Earth Orbit Transfers', RULE, ''];
  for (const { label, transfer } of rows) {
    lines.push(`${label}:`);
    lines.push(`  Total dv: ${transfer.result.totalDeltaV.toFixed(2)} m/s`);
    lines.push(`  Time:     ${transfer.transferTimeHours().toFixed(2)} hours`);
    lines.push('');
  }
  lines.push(RULE);
  return lines.join('\n');
}
