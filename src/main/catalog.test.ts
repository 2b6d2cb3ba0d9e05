import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StaticCatalog } from './catalog';
import { defaultConfig } from './config';

describe('StaticCatalog', () => {
  let catalog: StaticCatalog;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    catalog = await StaticCatalog.load(defaultConfig.catalogPath);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads the bundled tables', () => {
    expect(catalog.size()).toBe(29);
  });

  it('finds objects by any alias, ignoring case', () => {
    expect(catalog.findObject('vega')?.name).toBe('Vega;Alpha Lyr;HR 7001');
    expect(catalog.findObject('Alpha Ori')?.name).toBe('Betelgeuse;Alpha Ori;HR 2061');
    expect(catalog.findObject('NGC 224')?.name).toBe('M 31;Andromeda Galaxy;NGC 224');
    expect(catalog.findObject('Andromeda')?.name).toBe('M 31;Andromeda Galaxy;NGC 224');
  });

  it('inserts the missing space in designations such as M51', () => {
    expect(catalog.findObject('M51')).toEqual({
      catalog: 'deep-sky',
      name: 'M 51;Whirlpool Galaxy;NGC 5194',
      ra: 202.4696,
      dec: 47.1952,
      magnitude: 8.4,
      type: 'galaxy',
      distance: 8580000
    });
    expect(catalog.findObject('M1')?.name).toBe('M 1;Crab Nebula;NGC 1952');
  });

  it('returns undefined for unknown names', () => {
    expect(catalog.findObject('Xyzzy')).toBeUndefined();
    expect(catalog.findObject('   ')).toBeUndefined();
  });

  it('logs the lookup result', () => {
    catalog.findObject('Sirius');
    catalog.findObject('Nowhere');

    const events = vi.mocked(console.log).mock.calls.map(([line]) => JSON.parse(String(line)));
    expect(events.map((event) => event.event).slice(-2)).toEqual(['catalog_object_found', 'catalog_object_missing']);
    expect(events[events.length - 2].distanceLy).toBeCloseTo(8.61168, 5);
  });

  it('searches tables in order', () => {
    const custom = new StaticCatalog([
      { name: 'first', objects: [{ names: 'Alpha;Twin', ra: 15, dec: 1, magnitude: 1, type: 'star', distance: 0 }] },
      { name: 'second', objects: [{ names: 'Twin', ra: 30, dec: 2, magnitude: 2, type: 'star', distance: 0 }] }
    ]);
    expect(custom.findObject('Twin')?.catalog).toBe('first');
  });
});
