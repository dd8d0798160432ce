/**
 * Exposure aggregation: normalized regimen + labs -> ExposureProfile (deterministic)
 */

import { createLogger } from '../utils/log.js';
import { max, sum } from '../utils/math.js';
import { CLINICAL_THRESHOLDS, ENGINE_DEFAULTS, EXPOSURE_RULES } from '../config/defaults.js';
import { getCompoundTable, type CompoundTable } from './potency.js';
import type { ExposureProfile, Labs, NormalizedDose } from '../domain/types.js';

const logger = createLogger('exposure');

export interface ExposureOptions {
  observationWeeks?: number;
  table?: CompoundTable;
}

/**
 * Canonical dose order so that summation never depends on how the caller listed compounds
 */
export function sortDoses(doses: NormalizedDose[]): NormalizedDose[] {
  return [...doses].sort(
    (a, b) =>
      a.compound_key.localeCompare(b.compound_key) ||
      a.startWeek - b.startWeek ||
      a.durationWeeks - b.durationWeeks ||
      a.weeklyMg - b.weeklyMg ||
      Number(a.oral) - Number(b.oral) ||
      a.potency - b.potency
  );
}

export function aggregateExposure(
  doses: NormalizedDose[],
  labs: Labs,
  options: ExposureOptions = {}
): ExposureProfile {
  const observation_weeks = options.observationWeeks ?? ENGINE_DEFAULTS.OBSERVATION_WEEKS;
  const threshold = ENGINE_DEFAULTS.PHYSIOLOGIC_THRESHOLD_MG;
  const table = options.table ?? getCompoundTable();

  const weekly_te = new Array<number>(observation_weeks).fill(0);
  const scheduled = new Array<boolean>(observation_weeks).fill(false);

  let oral_weeks = 0;
  let oral_17aa_weeks = 0;
  let oral_17aa_high_dose_weeks = 0;
  let has_heavy = false;
  let has_dht = false;

  for (const dose of sortDoses(doses)) {
    if (table.heavy.has(dose.compound_key)) has_heavy = true;
    if (table.dhtDerived.has(dose.compound_key)) has_dht = true;

    if (dose.oral) {
      // Orals are tracked by weeks of use, not on the injectable WTE timeline
      oral_weeks += dose.durationWeeks;
      if (table.oral17aa.has(dose.compound_key)) {
        oral_17aa_weeks += dose.durationWeeks;
        if (dose.weeklyMg > EXPOSURE_RULES.ORAL_HIGH_DOSE_WEEKLY_MG) {
          oral_17aa_high_dose_weeks += dose.durationWeeks;
        }
      }
      continue;
    }

    const start = dose.startWeek - 1;
    const end = Math.min(start + dose.durationWeeks, observation_weeks);
    for (let week = start; week < end; week++) {
      weekly_te[week] += dose.weekly_equivalent_mg;
      scheduled[week] = true;
    }
  }

  const exposed_weeks = scheduled.filter(Boolean).length;
  const weekly_equivalent_total = exposed_weeks > 0 ? sum(weekly_te) / exposed_weeks : 0;
  const supra_weeks = weekly_te.filter((te) => te > threshold).length;

  let streak = 0;
  let longest_streak = 0;
  for (const te of weekly_te) {
    streak = te > threshold ? streak + 1 : 0;
    longest_streak = Math.max(longest_streak, streak);
  }

  const hematocrit = labs.hematocrit ?? CLINICAL_THRESHOLDS.DEFAULT_HEMATOCRIT;
  const estimated_hdl_nadir = estimateHdlNadir(
    labs.hdl ?? CLINICAL_THRESHOLDS.DEFAULT_HDL,
    weekly_equivalent_total,
    oral_17aa_weeks,
    oral_17aa_high_dose_weeks,
    threshold
  );

  const profile: ExposureProfile = {
    weeklyEquivalentTotal: weekly_equivalent_total,
    peakWeeklyEquivalent: max(weekly_te),
    supraphysiologicWeeks: supra_weeks,
    longestSupraphysiologicStreak: longest_streak,
    recoveryRatio: (observation_weeks - supra_weeks) / observation_weeks,
    oralWeeks: oral_weeks,
    oral17aaWeeks: oral_17aa_weeks,
    oral17aaHighDoseWeeks: oral_17aa_high_dose_weeks,
    exposedWeeks: exposed_weeks,
    observationWeeks: observation_weeks,
    estimatedHdlNadir: estimated_hdl_nadir,
    hematocrit,
    flags: {
      hematocritHigh: hematocrit > CLINICAL_THRESHOLDS.HEMATOCRIT_HIGH_PCT,
      hdlLow: estimated_hdl_nadir < CLINICAL_THRESHOLDS.HDL_NADIR_LOW,
      hasHeavyCompounds: has_heavy,
      hasDhtCompounds: has_dht,
    },
  };

  logger.debug(
    {
      weekly_equivalent_total: profile.weeklyEquivalentTotal,
      supraphysiologic_weeks: profile.supraphysiologicWeeks,
      recovery_ratio: profile.recoveryRatio,
      oral_weeks: profile.oralWeeks,
    },
    'Exposure aggregated'
  );

  return profile;
}

/**
 * HDL nadir under exposure: proportional drop up to 50% at +300 mg over threshold,
 * worsened by 17α-alkylated orals, floored at 15 mg/dL.
 */
export function estimateHdlNadir(
  baseline_hdl: number,
  weekly_equivalent_total: number,
  oral_17aa_weeks: number,
  oral_17aa_high_dose_weeks: number,
  threshold: number = ENGINE_DEFAULTS.PHYSIOLOGIC_THRESHOLD_MG
): number {
  const excess = Math.max(0, weekly_equivalent_total - threshold);
  const drop_fraction = Math.min(
    CLINICAL_THRESHOLDS.HDL_MAX_DROP_FRACTION,
    excess / CLINICAL_THRESHOLDS.HDL_MAX_DROP_EXCESS_MG
  );

  let oral_factor = 1.0;
  if (oral_17aa_weeks > 0) {
    oral_factor = oral_17aa_high_dose_weeks > 4 ? 1.5 : 1.2;
  }

  let hdl_drop = baseline_hdl * drop_fraction * oral_factor;
  if (oral_17aa_high_dose_weeks > 8) {
    hdl_drop += 10;
  }

  return Math.max(CLINICAL_THRESHOLDS.HDL_NADIR_FLOOR, baseline_hdl - hdl_drop);
}
