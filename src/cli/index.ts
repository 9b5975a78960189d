#!/usr/bin/env node
/**
 * Command-line Hohmann transfer calculator
 *
 * Usage: hohmann [initial_alt_km final_alt_km] [options]
 *
 * Examples:
 *   hohmann
 *   hohmann 400 35786
 *   hohmann 100 1000 --body Moon
 *   hohmann --from earth --to mars --json
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import {
  CircularOrbit,
  HohmannTransfer,
  commonTransfers,
  earth,
  formatCommonTransfers,
  formatTransferSummary,
  geostationaryOrbit,
  heliocentricOrbit,
  isPlanetName,
  lowOrbit,
  PLANETS,
  type PlanetName,
} from '../lib/orbital/index.js';
import { errorMessage } from '../lib/tool-types.js';
import { resolveBody } from '../lib/tools/shared.js';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export const USAGE = `
hohmann - Hohmann transfer calculator

Usage:
  hohmann                                   Common Earth transfers and LEO -> GEO summary
  hohmann <initial_km> <final_km> [--body]  Transfer between two altitudes
  hohmann --from <planet> --to <planet>     Transfer between planetary orbits around the Sun

Options:
  -b, --body <name>   Central body (default: Earth)
  --from <planet>     Departure planet (${PLANETS.join(', ')})
  --to <planet>       Arrival planet
  --json              Print JSON instead of the text summary
  -h, --help          Show this help

Examples:
  hohmann 400 35786                 # LEO to GEO
  hohmann 100 1000 --body Moon      # Low lunar orbit raise
  hohmann --from earth --to mars    # Earth to Mars
`;

// Blank strings would otherwise coerce to 0
const kilometresSchema = z.string().trim().min(1).pipe(z.coerce.number().finite());

const altitudesSchema = z.tuple([kilometresSchema, kilometresSchema]);

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function toPlanet(value: string): PlanetName {
  const normalized = value.trim().toLowerCase();
  if (!isPlanetName(normalized)) {
    throw new Error(`Unknown planet "${value}". Known planets: ${PLANETS.join(', ')}`);
  }
  return normalized;
}

function render(transfer: HohmannTransfer, json: boolean): string {
  return json ? JSON.stringify(transfer.toJSON(), null, 2) : formatTransferSummary(transfer);
}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        body: { type: 'string', short: 'b' },
        from: { type: 'string' },
        to: { type: 'string' },
        json: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

function execute(argv: string[], io: CliIO): void {
  const { values, positionals } = parseCommandLine(argv);

  if (values.help) {
    io.out(USAGE);
    return;
  }

  if (values.from !== undefined || values.to !== undefined) {
    if (values.from === undefined || values.to === undefined || positionals.length > 0) {
      throw new UsageError('--from and --to must be given together, without altitudes');
    }
    const transfer = new HohmannTransfer(
      heliocentricOrbit(toPlanet(values.from)),
      heliocentricOrbit(toPlanet(values.to))
    );
    io.out(render(transfer, values.json));
    return;
  }

  if (positionals.length === 0) {
    if (values.body !== undefined) {
      throw new UsageError('--body needs two altitudes');
    }
    const rows = commonTransfers();
    if (values.json) {
      io.out(JSON.stringify(rows.map(({ label, transfer }) => ({ label, ...transfer.toJSON() })), null, 2));
      return;
    }
    const body = earth();
    io.out(formatCommonTransfers(rows));
    io.out('');
    io.out(formatTransferSummary(new HohmannTransfer(lowOrbit(body), geostationaryOrbit(body))));
    return;
  }

  if (positionals.length !== 2) {
    throw new UsageError(`Expected 2 altitudes, got ${positionals.length}`);
  }

  const altitudes = altitudesSchema.safeParse(positionals);
  if (!altitudes.success) {
    throw new Error(`Altitudes must be numbers in km (got ${positionals.join(', ')})`);
  }
  const [initialKm, finalKm] = altitudes.data;

  const body = resolveBody(values.body);
  const transfer = new HohmannTransfer(
    CircularOrbit.fromAltitude(body, initialKm * 1000),
    CircularOrbit.fromAltitude(body, finalKm * 1000)
  );
  io.out(render(transfer, values.json));
}

/**
 * Run the calculator and return the process exit code.
 */
export function run(argv: string[], io: CliIO = consoleIO): number {
  try {
    execute(argv, io);
    return 0;
  } catch (error) {
    io.err(`Error: ${errorMessage(error)}`);
    if (error instanceof UsageError) {
      io.err(USAGE);
    }
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
