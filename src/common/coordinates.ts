import { InvalidCoordinateError } from './errors';
import type { Declination, RightAscension } from './types';

export type CoordinateInput =
  | { kind: 'scalar'; value: number }
  | { kind: 'pair'; unit: number; minutes: number }
  | { kind: 'triple'; unit: number; minutes: number; seconds: number }
  | { kind: 'text'; text: string };

export type RaValue = number | readonly number[] | string | RightAscension;

export type DecValue = number | readonly number[] | string | Declination;

type Axis = 'RA' | 'DEC';

const UNIT_MARKERS = ['h', 'm', 's', ':', '°', 'deg', 'd', "'", '"'];

/** Unit value, minutes and sign of a coordinate after normalisation. */
interface Sexagesimal {
  unit: number;
  minutes: number;
  negative: boolean;
}

export function classifyCoordinate(axis: Axis, value: number | readonly number[] | string): CoordinateInput {
  if (typeof value === 'string') {
    return { kind: 'text', text: value };
  }
  if (typeof value === 'number') {
    return { kind: 'scalar', value };
  }
  if (value.length === 2) {
    return { kind: 'pair', unit: value[0], minutes: value[1] };
  }
  if (value.length === 3) {
    return { kind: 'triple', unit: value[0], minutes: value[1], seconds: value[2] };
  }
  throw new InvalidCoordinateError(axis, value);
}

function isNegative(value: number): boolean {
  return value < 0 || Object.is(value, -0);
}

/** A zero unit has no sign of its own, so `[0, -30]` takes it from the first non-zero part. */
function signOf(unit: number, ...rest: number[]): boolean {
  if (isNegative(unit) || unit !== 0) {
    return isNegative(unit);
  }
  const lead = rest.find((part) => part !== 0);
  return lead !== undefined && lead < 0;
}

export function wrapHours(hours: number): number {
  return ((hours % 24) + 24) % 24;
}

function tokenize(axis: Axis, text: string): number[] {
  let cleaned = text.toLowerCase();
  for (const marker of UNIT_MARKERS) {
    cleaned = cleaned.split(marker).join(' ');
  }
  const tokens = cleaned.split(/[\s,]+/).filter((token) => token.length > 0);
  const numbers = tokens.map(Number);
  if (!numbers.length || numbers.some((n) => !Number.isFinite(n))) {
    throw new InvalidCoordinateError(axis, text);
  }
  return numbers;
}

function normalize(axis: Axis, input: CoordinateInput): Sexagesimal {
  switch (input.kind) {
    case 'scalar': {
      const unit = Math.trunc(input.value);
      return {
        unit,
        minutes: Math.abs(input.value - unit) * 60,
        negative: isNegative(input.value)
      };
    }
    case 'pair':
      return {
        unit: Math.trunc(input.unit),
        minutes: Math.abs(input.minutes),
        negative: signOf(input.unit, input.minutes)
      };
    case 'triple':
      return {
        unit: Math.trunc(input.unit),
        minutes: Math.abs(input.minutes) + Math.abs(input.seconds) / 60,
        negative: signOf(input.unit, input.minutes, input.seconds)
      };
    case 'text': {
      const numbers = tokenize(axis, input.text);
      const nested = numbers.length === 1 ? numbers[0] : numbers;
      return normalize(axis, classifyCoordinate(axis, nested));
    }
    default: {
      const unreachable: never = input;
      return unreachable;
    }
  }
}

function toSexagesimal(axis: Axis, value: number | readonly number[] | string): Sexagesimal {
  const result = normalize(axis, classifyCoordinate(axis, value));
  if (!Number.isFinite(result.unit) || !Number.isFinite(result.minutes)) {
    throw new InvalidCoordinateError(axis, value);
  }
  return result;
}

function isRightAscension(value: RaValue): value is RightAscension {
  return typeof value === 'object' && 'hours' in value;
}

function isDeclination(value: DecValue): value is Declination {
  return typeof value === 'object' && 'degrees' in value;
}

/**
 * Parses a Right Ascension given as decimal hours, `[h, m]`, `[h, m, s]` or a
 * string such as `12h34m56s`, `12:34:56` or `12.5`. Values outside [0, 24)
 * wrap around.
 */
export function parseRa(value: RaValue): RightAscension {
  if (isRightAscension(value)) {
    return { hours: value.hours, minutes: value.minutes };
  }
  const { unit, minutes, negative } = toSexagesimal('RA', value);
  if (!negative && unit < 24) {
    return { hours: unit, minutes };
  }
  const magnitude = Math.abs(unit) + minutes / 60;
  const hours = wrapHours(negative ? -magnitude : magnitude);
  const whole = Math.trunc(hours);
  return { hours: whole, minutes: (hours - whole) * 60 };
}

/**
 * Parses a Declination given as decimal degrees, `[d, m]`, `[d, m, s]` or a
 * string such as `+47°11'40"`, `47d11m40s` or `-0:30`.
 */
export function parseDec(value: DecValue): Declination {
  if (isDeclination(value)) {
    return { degrees: value.degrees, minutes: value.minutes, negative: value.negative };
  }
  const { unit, minutes, negative } = toSexagesimal('DEC', value);
  return { degrees: unit, minutes, negative };
}

export function raFromDegrees(degrees: number): RightAscension {
  return parseRa(degrees / 15);
}

/** Builds a Declination from the device's `<deg>+<min>` fields; `-0` keeps the southern sign. */
export function decFromWire(degrees: number, minutes: number): Declination {
  return { degrees, minutes: Math.abs(minutes), negative: isNegative(degrees) };
}

export function toDecimalHours(ra: RightAscension): number {
  return ra.hours + ra.minutes / 60;
}

export function toDecimalDegrees(dec: Declination): number {
  const magnitude = Math.abs(dec.degrees) + dec.minutes / 60;
  return dec.negative ? -magnitude : magnitude;
}

function formatUnit(coordinate: RightAscension | Declination): string {
  if ('degrees' in coordinate) {
    return coordinate.negative && coordinate.degrees === 0 ? '-0' : String(coordinate.degrees);
  }
  return String(coordinate.hours);
}

export function formatWire(coordinate: RightAscension | Declination): string {
  return `${formatUnit(coordinate)}+${coordinate.minutes.toFixed(6)}`;
}

export function formatCoordinate(coordinate: RightAscension | Declination): string {
  return `${formatUnit(coordinate)}+${coordinate.minutes.toFixed(2)}`;
}
