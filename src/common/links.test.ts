import { describe, expect, it } from 'vitest';
import { locationUrl, siteLatitude, siteLongitude, skyMapUrl } from './links';
import type { SitePlacement } from './types';

const place: SitePlacement = {
  longitudeHemisphere: 'W',
  longitudeDegrees: 70,
  longitudeMinutes: 30,
  latitudeHemisphere: 'S',
  latitudeDegrees: 30,
  latitudeMinutes: 15,
  utcOffset: -4
};

describe('links', () => {
  it('points the sky map at the mount position, zoomed by speed', () => {
    const url = skyMapUrl({ hours: 12, minutes: 30 }, { degrees: -5, minutes: 15, negative: true }, 6);

    expect(url).toBe(
      'http://www.sky-map.org/?ra=12.500000&de=-5.250000&zoom=3' +
        '&show_grid=1&show_constellation_lines=1&show_constellation_boundaries=1&show_const_names=0&show_galaxies=1'
    );
  });

  it('signs western longitudes and southern latitudes', () => {
    expect(siteLatitude(place)).toBe(-30.25);
    expect(siteLongitude(place)).toBe(-70.5);
    expect(locationUrl(place)).toBe('https://maps.google.fr/?q=-30.250000,-70.500000');
  });
});
