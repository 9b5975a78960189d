/**
 * CLI tests
 *
 * Runs the calculator in-process with captured output.
 */

import { run, USAGE, type CliIO } from '../../../src/cli/index.js';

function capture(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => {
      stdout.push(text);
    },
    err: (text) => {
      stderr.push(text);
    },
  };
}

describe('hohmann CLI', () => {
  it('prints help', () => {
    const io = capture();
    expect(run(['--help'], io)).toBe(0);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('prints common transfers and the LEO to GEO summary by default', () => {
    const io = capture();
    expect(run([], io)).toBe(0);
    expect(io.stdout).toHaveLength(3);
    expect(io.stdout[0]).toContain('Common Earth Orbit Transfers');
    expect(io.stdout[1]).toBe('');
    expect(io.stdout[2].split('\n')).toContain('  Total dv:          3856.58 m/s');
  });

  it('computes a transfer between two altitudes', () => {
    const io = capture();
    expect(run(['400', '35786'], io)).toBe(0);
    const lines = io.stdout[0].split('\n');
    expect(lines).toContain('  First burn (dv1):  2399.35 m/s');
    expect(lines).toContain('  5.29 hours');
  });

  it('uses the named body', () => {
    const io = capture();
    expect(run(['100', '1000', '--body', 'luna'], io)).toBe(0);
    const lines = io.stdout[0].split('\n');
    expect(lines).toContain('Central Body: Moon');
    expect(lines).toContain('  Total dv:          292.38 m/s');
    expect(lines).toContain('  1.36 hours');
  });

  it('computes interplanetary transfers as JSON', () => {
    const io = capture();
    expect(run(['--from', 'earth', '--to', 'Mars', '--json'], io)).toBe(0);
    const json = JSON.parse(io.stdout[0]);
    expect(json.body).toBe('Sun');
    expect(json.transferTimeDays).toBeCloseTo(258.83, 2);
  });

  it('rejects non-numeric altitudes', () => {
    const io = capture();
    expect(run(['abc', '1'], io)).toBe(1);
    expect(io.stderr).toEqual(['Error: Altitudes must be numbers in km (got abc, 1)']);
  });

  it('rejects blank altitudes', () => {
    const io = capture();
    expect(run(['', '35786'], io)).toBe(1);
    expect(io.stdout).toEqual([]);
    expect(io.stderr).toEqual(['Error: Altitudes must be numbers in km (got , 35786)']);

    const spaces = capture();
    expect(run(['400', '  '], spaces)).toBe(1);
    expect(spaces.stderr).toEqual(['Error: Altitudes must be numbers in km (got 400,   )']);
  });

  it('prints usage for a wrong number of altitudes', () => {
    const io = capture();
    expect(run(['400'], io)).toBe(1);
    expect(io.stderr).toEqual(['Error: Expected 2 altitudes, got 1', USAGE]);
  });

  it('prints usage for unknown options', () => {
    const io = capture();
    expect(run(['--bogus'], io)).toBe(1);
    expect(io.stderr[0]).toMatch(/^Error: /);
    expect(io.stderr[1]).toBe(USAGE);
  });

  it('requires --from and --to together', () => {
    const io = capture();
    expect(run(['--from', 'earth'], io)).toBe(1);
    expect(io.stderr[0]).toBe('Error: --from and --to must be given together, without altitudes');
  });

  it('reports unknown planets', () => {
    const io = capture();
    expect(run(['--from', 'earth', '--to', 'pluto'], io)).toBe(1);
    expect(io.stderr).toEqual([
      'Error: Unknown planet "pluto". Known planets: mercury, venus, earth, mars, jupiter, saturn, uranus, neptune',
    ]);
  });

  it('reports bodies without radius', () => {
    const io = capture();
    expect(run(['100', '1000', '--body', 'Jupiter'], io)).toBe(1);
    expect(io.stderr).toEqual(['Error: Cannot create orbit from altitude: Jupiter has no defined radius']);
  });
});
