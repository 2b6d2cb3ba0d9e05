import { describe, expect, it } from 'vitest';
import {
  classifyCoordinate,
  decFromWire,
  formatCoordinate,
  formatWire,
  parseDec,
  parseRa,
  raFromDegrees,
  toDecimalDegrees,
  toDecimalHours
} from './coordinates';
import { InvalidCoordinateError } from './errors';

describe('parseRa', () => {
  it('reads decimal hours', () => {
    expect(parseRa(12.5)).toEqual({ hours: 12, minutes: 30 });
  });

  it('reads hour/minute pairs and triples', () => {
    expect(parseRa([5, 15])).toEqual({ hours: 5, minutes: 15 });
    expect(parseRa([5, 15, 30])).toEqual({ hours: 5, minutes: 15.5 });
  });

  it('reads sexagesimal text', () => {
    expect(formatWire(parseRa('12h34m56s'))).toBe('12+34.933333');
    expect(formatWire(parseRa('12:34:56'))).toBe('12+34.933333');
    expect(parseRa('6.25')).toEqual({ hours: 6, minutes: 15 });
  });

  it('wraps hours into a single day', () => {
    expect(parseRa(25)).toEqual({ hours: 1, minutes: 0 });
    expect(parseRa(-3)).toEqual({ hours: 21, minutes: 0 });
    expect(parseRa(-0.5)).toEqual({ hours: 23, minutes: 30 });
  });

  it('converts back to the same decimal hours', () => {
    for (let hours = 0; hours < 24; hours += 0.37) {
      expect(toDecimalHours(parseRa(hours))).toBeCloseTo(hours, 9);
    }
  });

  it('copies an already parsed value', () => {
    const ra = { hours: 3, minutes: 7 };
    const parsed = parseRa(ra);
    expect(parsed).toEqual(ra);
    expect(parsed).not.toBe(ra);
  });

  it('rejects unreadable input', () => {
    expect(() => parseRa('abc')).toThrow(InvalidCoordinateError);
    expect(() => parseRa('')).toThrow(InvalidCoordinateError);
    expect(() => parseRa(Number.NaN)).toThrow(InvalidCoordinateError);
    expect(() => parseRa([1, 2, 3, 4])).toThrow(InvalidCoordinateError);
  });
});

describe('parseDec', () => {
  it('keeps the sign apart from the degrees', () => {
    expect(parseDec(-12.5)).toEqual({ degrees: -12, minutes: 30, negative: true });
    expect(parseDec([47, 11])).toEqual({ degrees: 47, minutes: 11, negative: false });
  });

  it('keeps the southern sign of declinations between 0 and -1 degree', () => {
    const dec = parseDec('-0:30');
    expect(dec.negative).toBe(true);
    expect(Object.is(dec.degrees, -0)).toBe(true);
    expect(toDecimalDegrees(dec)).toBe(-0.5);
    expect(formatWire(dec)).toBe('-0+30.000000');
  });

  it('takes the sign from the minutes when the degrees are zero', () => {
    expect(parseDec([0, -30])).toEqual({ degrees: 0, minutes: 30, negative: true });
    expect(parseDec('0 -30')).toEqual({ degrees: 0, minutes: 30, negative: true });
    expect(parseDec([0, -15, 30])).toEqual({ degrees: 0, minutes: 15.5, negative: true });
    expect(parseDec([0, 0, -30])).toEqual({ degrees: 0, minutes: 0.5, negative: true });
    expect(parseDec([0, 30])).toEqual({ degrees: 0, minutes: 30, negative: false });
    expect(formatWire(parseDec([0, -30]))).toBe('-0+30.000000');
  });

  it('converts back to the same decimal degrees', () => {
    const samples = [-89.5, -45.7, -12.25, -1, -0.75, -0.25, 0.1, 0.5, 12.3, 47.2, 89.9];
    for (const degrees of samples) {
      expect(toDecimalDegrees(parseDec(degrees))).toBeCloseTo(degrees, 9);
    }
  });

  it('reads degree markers', () => {
    expect(parseDec('47d30m')).toEqual({ degrees: 47, minutes: 30, negative: false });
    expect(parseDec('47deg 30')).toEqual({ degrees: 47, minutes: 30, negative: false });
  });

  it('names the axis in errors', () => {
    try {
      parseDec('north');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidCoordinateError);
      expect(err instanceof InvalidCoordinateError && err.axis).toBe('DEC');
    }
  });
});

describe('classifyCoordinate', () => {
  it('tags each input shape', () => {
    expect(classifyCoordinate('RA', 1)).toEqual({ kind: 'scalar', value: 1 });
    expect(classifyCoordinate('RA', [1, 2])).toEqual({ kind: 'pair', unit: 1, minutes: 2 });
    expect(classifyCoordinate('RA', [1, 2, 3])).toEqual({ kind: 'triple', unit: 1, minutes: 2, seconds: 3 });
    expect(classifyCoordinate('DEC', '1 2')).toEqual({ kind: 'text', text: '1 2' });
  });
});

describe('conversions', () => {
  it('goes from catalog degrees to hours', () => {
    expect(raFromDegrees(202.5)).toEqual({ hours: 13, minutes: 30 });
    expect(toDecimalHours({ hours: 13, minutes: 30 })).toBe(13.5);
  });

  it('reads wire declinations with a negative zero', () => {
    expect(decFromWire(-0, 15)).toEqual({ degrees: -0, minutes: 15, negative: true });
    expect(decFromWire(-5, -15)).toEqual({ degrees: -5, minutes: 15, negative: true });
  });

  it('formats with two decimals for display', () => {
    expect(formatCoordinate({ hours: 1, minutes: 2.5 })).toBe('1+2.50');
    expect(formatCoordinate({ degrees: -3, minutes: 0, negative: true })).toBe('-3+0.00');
  });
});
