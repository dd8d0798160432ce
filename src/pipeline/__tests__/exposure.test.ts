/**
 * Unit tests for exposure aggregation
 *
 * Tests verify:
 * - Weekly timeline construction and averaging
 * - Supraphysiologic weeks and recovery ratio
 * - Oral tracking separate from the injectable timeline
 * - HDL nadir estimation and lab flags
 */

import { describe, it, expect } from 'vitest';
import { aggregateExposure, estimateHdlNadir } from '../exposure.js';
import { normalizeRegimen } from '../potency.js';
import { dose, highRiskStack, physiologicTrt } from './fixtures.js';
import type { CompoundDose, Labs } from '../../domain/types.js';

function exposureOf(doses: CompoundDose[], labs: Labs = {}) {
  return aggregateExposure(normalizeRegimen(doses), labs);
}

// ============================================================================
// Timeline
// ============================================================================

describe('aggregateExposure', () => {
  it('returns a fully recovered profile for an empty regimen', () => {
    const profile = exposureOf([]);
    expect(profile.weeklyEquivalentTotal).toBe(0);
    expect(profile.peakWeeklyEquivalent).toBe(0);
    expect(profile.supraphysiologicWeeks).toBe(0);
    expect(profile.exposedWeeks).toBe(0);
    expect(profile.recoveryRatio).toBe(1);
    expect(profile.estimatedHdlNadir).toBe(50);
    expect(profile.flags).toEqual({
      hematocritHigh: false,
      hdlLow: false,
      hasHeavyCompounds: false,
      hasDhtCompounds: false,
    });
  });

  it('keeps a physiologic regimen below the threshold', () => {
    const profile = exposureOf(physiologicTrt());
    expect(profile.weeklyEquivalentTotal).toBe(140);
    expect(profile.exposedWeeks).toBe(52);
    expect(profile.supraphysiologicWeeks).toBe(0);
    expect(profile.recoveryRatio).toBe(1);
  });

  it('aggregates a multi-compound stack', () => {
    const profile = exposureOf(highRiskStack());
    expect(profile.weeklyEquivalentTotal).toBe(980);
    expect(profile.peakWeeklyEquivalent).toBe(1100);
    expect(profile.supraphysiologicWeeks).toBe(20);
    expect(profile.longestSupraphysiologicStreak).toBe(20);
    expect(profile.exposedWeeks).toBe(20);
    expect(profile.recoveryRatio).toBe(32 / 52);
    expect(profile.flags.hasHeavyCompounds).toBe(true);
  });

  it('sums overlapping doses week by week', () => {
    const profile = exposureOf([
      dose('testosterone', 100, 10),
      dose('testosterone_propionate', 100, 10),
    ]);
    expect(profile.weeklyEquivalentTotal).toBe(200);
    expect(profile.supraphysiologicWeeks).toBe(10);
  });

  it('clips doses that run past the observation window', () => {
    const profile = exposureOf([dose('testosterone', 200, 10, { startWeek: 48 })]);
    expect(profile.exposedWeeks).toBe(5);
    expect(profile.supraphysiologicWeeks).toBe(5);
    expect(profile.weeklyEquivalentTotal).toBe(200);
  });

  it('counts a week at exactly the threshold as physiologic', () => {
    const profile = exposureOf([dose('testosterone', 150, 52)]);
    expect(profile.supraphysiologicWeeks).toBe(0);
    expect(profile.recoveryRatio).toBe(1);
  });

  it('does not depend on the order compounds are listed in', () => {
    const forward = exposureOf(highRiskStack());
    const reversed = exposureOf([...highRiskStack()].reverse());
    expect(reversed).toEqual(forward);
  });

  it('is monotonic in dose', () => {
    const low = exposureOf([dose('testosterone', 200, 30)]);
    const high = exposureOf([dose('testosterone', 400, 30)]);
    expect(high.weeklyEquivalentTotal).toBeGreaterThan(low.weeklyEquivalentTotal);
    expect(high.supraphysiologicWeeks).toBeGreaterThanOrEqual(low.supraphysiologicWeeks);
  });
});

// ============================================================================
// Orals
// ============================================================================

describe('oral tracking', () => {
  it('keeps orals off the injectable timeline', () => {
    const profile = exposureOf([dose('anadrol', 350, 6, { oral: true })]);
    expect(profile.weeklyEquivalentTotal).toBe(0);
    expect(profile.oralWeeks).toBe(6);
    expect(profile.oral17aaWeeks).toBe(6);
  });

  it('counts high-dose weeks only above 350 mg/week', () => {
    expect(exposureOf([dose('anadrol', 350, 6, { oral: true })]).oral17aaHighDoseWeeks).toBe(0);
    expect(exposureOf([dose('anadrol', 700, 6, { oral: true })]).oral17aaHighDoseWeeks).toBe(6);
  });

  it('does not count non-17aa orals as 17aa weeks', () => {
    const profile = exposureOf([dose('testosterone_undecanoate', 280, 12, { oral: true })]);
    expect(profile.oralWeeks).toBe(12);
    expect(profile.oral17aaWeeks).toBe(0);
  });
});

// ============================================================================
// Labs
// ============================================================================

describe('lab-derived flags', () => {
  it('flags hematocrit above 54%', () => {
    expect(exposureOf([], { hematocrit: 54 }).flags.hematocritHigh).toBe(false);
    expect(exposureOf([], { hematocrit: 55 }).flags.hematocritHigh).toBe(true);
  });

  it('estimates an HDL nadir below 25 for the stack', () => {
    const profile = exposureOf(highRiskStack());
    expect(profile.estimatedHdlNadir).toBe(20);
    expect(profile.flags.hdlLow).toBe(true);
  });

  it('uses reported HDL as the starting point', () => {
    const profile = exposureOf(highRiskStack(), { hdl: 70 });
    // 70 - 70 * 0.5 * 1.2 = 28
    expect(profile.estimatedHdlNadir).toBeCloseTo(28, 10);
    expect(profile.flags.hdlLow).toBe(false);
  });
});

describe('estimateHdlNadir', () => {
  it('returns baseline HDL at or below the threshold', () => {
    expect(estimateHdlNadir(50, 150, 0, 0)).toBe(50);
  });

  it('caps the proportional drop at 50%', () => {
    expect(estimateHdlNadir(50, 450, 0, 0)).toBe(25);
    expect(estimateHdlNadir(50, 1200, 0, 0)).toBe(25);
  });

  it('floors the nadir at 15 mg/dL', () => {
    expect(estimateHdlNadir(50, 980, 10, 10)).toBe(15);
  });
});
