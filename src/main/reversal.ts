import type { EncoderSample } from '../common/types';

/** RA axis warning threshold, in percent of a revolution past the quarter turn. */
export const RA_WARNING_PERCENT = -0.2;
/** RA axis auto-reversal threshold, past the warning one. */
export const RA_REVERSAL_PERCENT = -0.3;
export const DEC_WARNING_FRACTION = 0.1;
export const DEC_REVERSAL_FRACTION = 0.01;

export interface ReversalAssessment {
  /** `(round/4 - |X|) / round`, in percent. Negative once X passed the meridian limit. */
  deltaRaPercent: number;
  /** Signed distance to the RA limit in minutes; negative after the meridian. */
  meridianMinutes: number;
  /** `||Y| - round| / round`. */
  deltaDec: number;
  raWarning: boolean;
  decWarning: boolean;
  reversal: boolean;
}

/**
 * X ranges over about +/- round/4 (east negative), Y over +/- round.
 * Products are taken before dividing by `round` so that exact thresholds
 * compare exactly.
 */
export function assessReversal(sample: EncoderSample): ReversalAssessment {
  const margin = sample.round / 4 - Math.abs(sample.x);
  const deltaRaPercent = (margin * 100) / sample.round;
  const meridianMinutes = (margin * 1800) / sample.round;
  const deltaDec = Math.abs(Math.abs(sample.y) - sample.round) / sample.round;

  return {
    deltaRaPercent,
    meridianMinutes,
    deltaDec,
    raWarning: deltaRaPercent <= RA_WARNING_PERCENT,
    decWarning: deltaDec < DEC_WARNING_FRACTION,
    reversal: deltaRaPercent <= RA_REVERSAL_PERCENT || deltaDec < DEC_REVERSAL_FRACTION
  };
}
