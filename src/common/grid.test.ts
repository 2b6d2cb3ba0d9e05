import { describe, expect, it } from 'vitest';
import { buildGrid } from './grid';

describe('buildGrid', () => {
  it('builds a 3x3 grid around the centre, declination first', () => {
    const grid = buildGrid({ ra: 10, dec: 20 });

    expect(grid).toHaveLength(9);
    expect(grid.map((entry) => entry.name).slice(0, 3)).toEqual([
      'RA=9.95 DEC=19.25',
      'RA=10.00 DEC=19.25',
      'RA=10.05 DEC=19.25'
    ]);
    expect(grid[4]).toEqual({
      catalog: 'grid',
      name: 'RA=10.00 DEC=20.00',
      ra: 150,
      dec: 20,
      magnitude: 0,
      type: 'grid',
      distance: 0
    });
    expect(grid[8].dec).toBe(20.75);
    expect(grid[8].ra).toBeCloseTo(150.75, 9);
  });

  it('accepts separate declination and right ascension counts and steps', () => {
    const grid = buildGrid({ ra: 6, dec: -10 }, [1, 2], [1, 1.5]);

    expect(grid.map((entry) => entry.name)).toEqual(['RA=5.95 DEC=-10.00', 'RA=6.05 DEC=-10.00']);
  });

  it('returns nothing for non-finite input', () => {
    expect(buildGrid({ ra: Number.NaN, dec: 0 })).toEqual([]);
    expect(buildGrid({ ra: 1, dec: 0 }, 3, Number.POSITIVE_INFINITY)).toEqual([]);
  });
});
