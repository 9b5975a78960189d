/**
 * Configuration loading tests
 */

import { loadConfig } from '../../../src/config/index.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      server: { transport: 'stdio', host: '127.0.0.1', port: 3000 },
      defaults: { body: 'Earth', initialAltitudeKm: 400, finalAltitudeKm: 35786 },
      debug: false,
      trace: { enabled: false, dir: 'logs' },
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      HOHMANN_TRANSPORT: 'http',
      HOHMANN_HOST: '0.0.0.0',
      HOHMANN_PORT: '8080',
      HOHMANN_DEFAULT_BODY: 'Mars',
      HOHMANN_INITIAL_ALT_KM: '200',
      HOHMANN_FINAL_ALT_KM: '17000',
      HOHMANN_DEBUG: '1',
      HOHMANN_TRACE: '1',
      HOHMANN_TRACE_DIR: 'trace-out',
    });

    expect(config.server).toEqual({ transport: 'http', host: '0.0.0.0', port: 8080 });
    expect(config.defaults).toEqual({ body: 'Mars', initialAltitudeKm: 200, finalAltitudeKm: 17000 });
    expect(config.debug).toBe(true);
    expect(config.trace).toEqual({ enabled: true, dir: 'trace-out' });
  });

  it('falls back on unusable values', () => {
    const config = loadConfig({
      HOHMANN_TRANSPORT: 'websocket',
      HOHMANN_PORT: 'abc',
      HOHMANN_INITIAL_ALT_KM: 'low',
      HOHMANN_DEBUG: 'yes',
    });

    expect(config.server.transport).toBe('stdio');
    expect(config.server.port).toBe(3000);
    expect(config.defaults.initialAltitudeKm).toBe(400);
    expect(config.debug).toBe(false);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
