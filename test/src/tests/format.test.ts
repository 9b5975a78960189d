/**
 * Unit tests for text rendering of orbits and transfers
 */

import {
  CircularOrbit,
  HohmannTransfer,
  commonTransfers,
  earth,
  formatCommonTransfers,
  formatOrbitInfo,
  formatTransferSummary,
  geostationaryOrbit,
  heliocentricOrbit,
  jupiter,
  lowOrbit,
} from '../../../src/lib/orbital/index.js';

const RULE = '='.repeat(40);

describe('formatTransferSummary', () => {
  it('renders LEO to GEO', () => {
    const body = earth();
    const text = formatTransferSummary(new HohmannTransfer(lowOrbit(body), geostationaryOrbit(body)));

    expect(text.split('\n')).toEqual([
      RULE,
      '      Hohmann Transfer Summary',
      RULE,
      '',
      'Central Body: Earth',
      '',
      'Initial Orbit:',
      '  Radius:   6771 km',
      '  Altitude: 400 km',
      '  Velocity: 7672.60 m/s',
      '  Period:   1.54 hours',
      '',
      'Final Orbit:',
      '  Radius:   42157 km',
      '  Altitude: 35786 km',
      '  Velocity: 3074.92 m/s',
      '  Period:   23.93 hours',
      '',
      'Transfer Orbit:',
      '  Semi-major axis: 24464 km',
      '  Type: Raising',
      '',
      'Delta-v Requirements:',
      '  First burn (dv1):  2399.35 m/s',
      '  Second burn (dv2): 1457.23 m/s',
      '  Total dv:          3856.58 m/s',
      '',
      'Transfer Time:',
      '  5.29 hours',
      '',
      'Phase Angle for Rendezvous: 100.43 deg',
      RULE,
    ]);
  });

  it('shows days for long transfers', () => {
    const lines = formatTransferSummary(
      new HohmannTransfer(heliocentricOrbit('earth'), heliocentricOrbit('mars'))
    ).split('\n');

    expect(lines).toContain('Central Body: Sun');
    expect(lines).toContain('  258.83 days');
    expect(lines).toContain('  (6211.86 hours)');
    expect(lines).toContain('Phase Angle for Rendezvous: 44.33 deg');
  });

  it('marks lowering transfers', () => {
    const body = earth();
    const lines = formatTransferSummary(
      new HohmannTransfer(geostationaryOrbit(body), lowOrbit(body))
    ).split('\n');

    expect(lines).toContain('  Type: Lowering');
    expect(lines).toContain('Phase Angle for Rendezvous: -1056.19 deg');
  });

  it('omits altitude for bodies without radius', () => {
    const body = jupiter();
    const lines = formatTransferSummary(
      new HohmannTransfer(new CircularOrbit(body, 1e8), new CircularOrbit(body, 2e8))
    ).split('\n');

    expect(lines.slice(6, 8)).toEqual(['Initial Orbit:', '  Radius:   100000 km']);
    expect(lines[8]).toMatch(/^ {2}Velocity: /);
    expect(lines.some((line) => line.includes('Altitude'))).toBe(false);
  });
});

describe('formatOrbitInfo', () => {
  it('renders one orbit', () => {
    expect(formatOrbitInfo(lowOrbit(earth()))).toBe([
      'Body: Earth',
      '  Radius:          6771 km',
      '  Altitude:        400 km',
      '  Velocity:        7672.60 m/s',
      '  Escape velocity: 10850.69 m/s',
      '  Period:          1.54 hours',
    ].join('\n'));
  });
});

describe('formatCommonTransfers', () => {
  it('renders the common Earth transfers', () => {
    expect(formatCommonTransfers(commonTransfers()).split('\n')).toEqual([
      RULE,
      '       Common Earth Orbit Transfers',
      RULE,
      '',
      'LEO (400 km) -> GEO (35,786 km):',
      '  Total dv: 3856.58 m/s',
      '  Time:     5.29 hours',
      '',
      'LEO (400 km) -> GPS (20,200 km):',
      '  Total dv: 3418.66 m/s',
      '  Time:     2.98 hours',
      '',
      'ISS (420 km) -> GEO (35,786 km):',
      '  Total dv: 3848.93 m/s',
      '  Time:     5.29 hours',
      '',
      'LEO (400 km) -> Lunar distance (384,400 km):',
      '  Total dv: 3908.86 m/s',
      '  Time:     122.49 hours',
      '',
      RULE,
    ]);
  });
});
