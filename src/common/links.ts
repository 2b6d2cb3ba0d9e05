import { toDecimalDegrees, toDecimalHours } from './coordinates';
import type { Declination, RightAscension, SitePlacement } from './types';

const SKY_MAP_OPTIONS =
  'show_grid=1&show_constellation_lines=1&show_constellation_boundaries=1&show_const_names=0&show_galaxies=1';

/** sky-map.org view centred on the given position; a faster mount speed zooms out. */
export function skyMapUrl(ra: RightAscension, dec: Declination, speed: number): string {
  const raHours = toDecimalHours(ra).toFixed(6);
  const decDegrees = toDecimalDegrees(dec).toFixed(6);
  return `http://www.sky-map.org/?ra=${raHours}&de=${decDegrees}&zoom=${9 - speed}&${SKY_MAP_OPTIONS}`;
}

export function siteLatitude(place: SitePlacement): number {
  const value = place.latitudeDegrees + place.latitudeMinutes / 60;
  return place.latitudeHemisphere === 'S' ? -value : value;
}

export function siteLongitude(place: SitePlacement): number {
  const value = place.longitudeDegrees + place.longitudeMinutes / 60;
  return place.longitudeHemisphere === 'W' ? -value : value;
}

export function locationUrl(place: SitePlacement): string {
  return `https://maps.google.fr/?q=${siteLatitude(place).toFixed(6)},${siteLongitude(place).toFixed(6)}`;
}
