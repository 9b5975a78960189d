/**
 * MCP Resource content for transfer planning documentation
 */

export const HOHMANN_GUIDE = `# Hohmann Transfer Guide

## Quick Start

Every tool is a pure calculation. No state is kept between calls.

\`\`\`
hohmann_transfer({ initialAltitude: "400km", finalAltitude: "35786km" })
interplanetary_transfer({ from: "earth", to: "mars" })
\`\`\`

## Model

Two coplanar circular orbits around one body, joined by an ellipse that
touches both. Two impulsive burns: one at departure, one at arrival.

| Quantity | Formula |
|----------|---------|
| Circular velocity | \`v = sqrt(GM / r)\` |
| Escape velocity | \`v = sqrt(2 GM / r)\` |
| Period | \`T = 2 pi sqrt(r^3 / GM)\` |
| Transfer semi-major axis | \`a = (r1 + r2) / 2\` |
| Velocity on the ellipse | \`v = sqrt(GM (2/r - 1/a))\` |
| Transfer time | \`t = pi sqrt(a^3 / GM)\` |
| Phase angle | \`pi (1 - ((r1/r2 + 1)^1.5) / (2 sqrt 2))\` |

Burn magnitudes are always non-negative. A raising transfer speeds up at both
burns, a lowering transfer slows down at both.

The phase angle is how far the target must lead the chaser at departure. It is
negative for lowering transfers: the target trails.

## Tools

### hohmann_transfer
Transfer between two circular orbits around one body.

**Parameters:**
- \`body\` (optional): Central body name. Aliases and small misspellings are accepted ("terra", "jupitr").
- \`initialAltitude\` / \`initialRadius\`: Departure orbit. Give one, not both. Default: 400 km altitude.
- \`finalAltitude\` / \`finalRadius\`: Arrival orbit. Default: 35,786 km altitude.
- \`format\` (optional): \`text\` (default) or \`json\`.

Distances are numbers in meters or strings with units: \`"400km"\`, \`"0.4Mm"\`, \`"1.52 AU"\`.

### interplanetary_transfer
Heliocentric transfer between the mean orbits of two planets. Departure and
capture burns around the planets themselves are not included.

### orbit_info
Velocity, escape velocity and period of one circular orbit.

### list_bodies
Preset bodies with GM and mean radius.

### common_transfers
LEO to GEO, GPS and lunar distance, plus ISS to GEO.

## Errors

| Error | Cause |
|-------|-------|
| must be a positive finite number | Zero, negative or non-finite GM, radius or distance |
| has no defined radius | Altitude given for a body without a surface (Jupiter, Saturn, ...) |
| different bodies | Orbits around bodies whose GM differs by more than 1 m^3/s^2 |
| Unknown body | Name not recognised |

Gas giants have no radius preset: use \`initialRadius\`/\`finalRadius\` instead
of altitudes.
`;
