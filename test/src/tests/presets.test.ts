/**
 * Unit tests for preset bodies and name lookup
 */

import {
  BODY_PRESETS,
  GM,
  findBody,
  isPlanetName,
  listBodies,
  matchBodyName,
} from '../../../src/lib/orbital/index.js';

describe('presets', () => {
  describe('listBodies', () => {
    it('lists bodies in order of distance from the Sun', () => {
      expect(listBodies().map((body) => body.name)).toEqual([
        'Sun', 'Mercury', 'Venus', 'Earth', 'Moon', 'Mars', 'Jupiter', 'Saturn', 'Uranus', 'Neptune',
      ]);
    });

    it('gives only bodies with a surface a radius', () => {
      const withRadius = listBodies().filter((body) => body.radius !== undefined).map((body) => body.name);
      expect(withRadius).toEqual(['Sun', 'Earth', 'Moon', 'Mars']);
    });

    it('returns a fresh body each call', () => {
      expect(BODY_PRESETS.Earth()).not.toBe(BODY_PRESETS.Earth());
      expect(BODY_PRESETS.Earth().gm).toBe(GM.earth);
    });
  });

  describe('matchBodyName', () => {
    it('matches canonical names case-insensitively', () => {
      expect(matchBodyName('earth')).toBe('Earth');
      expect(matchBodyName('  MARS ')).toBe('Mars');
    });

    it('matches aliases', () => {
      expect(matchBodyName('terra')).toBe('Earth');
      expect(matchBodyName('The Moon')).toBe('Moon');
      expect(matchBodyName('sol')).toBe('Sun');
    });

    it('matches small misspellings', () => {
      expect(matchBodyName('jupitr')).toBe('Jupiter');
      expect(matchBodyName('marz')).toBe('Mars');
    });

    it('does not guess across first letters or beyond one edit for short names', () => {
      expect(matchBodyName('mun')).toBeUndefined();
      expect(matchBodyName('sat')).toBeUndefined();
      expect(matchBodyName('moom')).toBe('Moon');
      expect(matchBodyName('venis')).toBe('Venus');
    });

    it('rejects unknown names', () => {
      expect(matchBodyName('Pluto')).toBeUndefined();
      expect(matchBodyName('xyz')).toBeUndefined();
      expect(matchBodyName('   ')).toBeUndefined();
    });
  });

  describe('findBody', () => {
    it('returns the preset body', () => {
      expect(findBody('luna')?.name).toBe('Moon');
      expect(findBody('Pluto')).toBeUndefined();
    });
  });

  describe('isPlanetName', () => {
    it('accepts lower-case planet names only', () => {
      expect(isPlanetName('mars')).toBe(true);
      expect(isPlanetName('moon')).toBe(false);
      expect(isPlanetName('Mars')).toBe(false);
    });
  });
});
