import { parseDec, parseRa, toDecimalDegrees, toDecimalHours, wrapHours } from '../common/coordinates';
import type { Declination, MoveDirections, RightAscension, SitePlacement } from '../common/types';

/** Largest RA step per tick, in hours. */
export const MAX_RA_STEP = 1;
/** Largest DEC step per tick, in degrees. */
export const MAX_DEC_STEP = 4;
const GOTO_TOLERANCE = 0.01;

export const SIMULATED_ADDRESS = 'simulate';
export const SIMULATED_VERSION = '2.7 (simulate)';
export const SIMULATED_ROUND = 8640000;
export const SIMULATED_PLACE: SitePlacement = {
  longitudeHemisphere: 'E',
  longitudeDegrees: 5,
  longitudeMinutes: 2,
  latitudeHemisphere: 'N',
  latitudeDegrees: 45,
  latitudeMinutes: 2,
  utcOffset: 0
};

export interface SimulatedPosition {
  ra: RightAscension;
  dec: Declination;
}

export interface SimulatedStatus extends SimulatedPosition {
  goto: boolean;
  state: 'SCOP';
}

export function isSimulatedAddress(address: string): boolean {
  return address.trim().toLowerCase().startsWith('sim');
}

function clamp(value: number, limit: number): number {
  return Math.min(limit, Math.max(-limit, value));
}

function clampDegrees(degrees: number): number {
  return Math.min(90, Math.max(-90, degrees));
}

/** Moves one bounded step from `current` toward `target`. */
export function stepTowardTarget(current: SimulatedPosition, target: SimulatedPosition): SimulatedStatus {
  const raNow = toDecimalHours(current.ra);
  const decNow = toDecimalDegrees(current.dec);
  const raTarget = toDecimalHours(target.ra);
  const decTarget = toDecimalDegrees(target.dec);

  const raNext = raNow + clamp(raTarget - raNow, MAX_RA_STEP);
  const decNext = decNow + clamp(decTarget - decNow, MAX_DEC_STEP);
  const goto = Math.abs(raTarget - raNext) > GOTO_TOLERANCE || Math.abs(decTarget - decNext) > GOTO_TOLERANCE;

  return {
    ra: parseRa(raNext),
    dec: parseDec(decNext),
    goto,
    state: 'SCOP'
  };
}

/** Shifts the target by one hour east/west and one degree north/south per active direction. */
export function nudgeTarget(target: SimulatedPosition, directions: MoveDirections): SimulatedPosition {
  const ra = toDecimalHours(target.ra) + Number(directions.east) - Number(directions.west);
  const dec = toDecimalDegrees(target.dec) + Number(directions.north) - Number(directions.south);
  return {
    ra: parseRa(wrapHours(ra)),
    dec: parseDec(clampDegrees(dec))
  };
}
