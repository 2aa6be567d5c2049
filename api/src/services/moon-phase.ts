/**
 * Moon Phase Calculator
 *
 * Approximate lunar phase from elapsed time since a reference new moon.
 * Mean synodic month only, no orbital perturbations: good to within a day.
 */

import {
  LUNAR_EPOCH_MS,
  MOON_PHASE_NAMES,
  MS_PER_DAY,
  SYNODIC_PERIOD_DAYS,
} from '../../../shared/constants.js';
import type { MoonPhaseSample } from '../../../shared/types.js';
import { formatUtcMinute } from '../utils/time.js';

/**
 * Position within the current synodic month, in [0, 1)
 */
export function cycleFraction(instant: Date): number {
  const elapsedDays = (instant.getTime() - LUNAR_EPOCH_MS) / MS_PER_DAY;
  const position = ((elapsedDays % SYNODIC_PERIOD_DAYS) + SYNODIC_PERIOD_DAYS) % SYNODIC_PERIOD_DAYS;
  const cycle = position / SYNODIC_PERIOD_DAYS;
  // Tiny negative remainders can round up to a full period
  return cycle >= 1 ? 0 : cycle;
}

export function illuminationFraction(cycle: number): number {
  return 0.5 * (1 - Math.cos(2 * Math.PI * cycle));
}

/**
 * One of eight equal buckets, centred on the principal phases
 */
export function phaseIndex(cycle: number): number {
  return Math.floor(cycle * 8 + 0.5) % 8;
}

export function phaseAt(instant: Date = new Date()): MoonPhaseSample {
  const cycle = cycleFraction(instant);
  const illumination = illuminationFraction(cycle);

  return {
    phaseName: MOON_PHASE_NAMES[phaseIndex(cycle)],
    illuminationPercent: Math.round(illumination * 1000) / 10,
    illuminationFraction: illumination,
    cycleFraction: cycle,
    computedAtUtc: formatUtcMinute(instant),
  };
}
