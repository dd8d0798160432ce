/**
 * Default configuration values
 */

import { join } from 'path';

export const MODEL_VERSION = '1.0.0';

export const ENGINE_DEFAULTS = {
  /** Weekly testosterone-equivalent dose at or below which exposure counts as physiologic */
  PHYSIOLOGIC_THRESHOLD_MG: 150,
  OBSERVATION_WEEKS: 52,
  /** Ten years */
  MAX_OBSERVATION_WEEKS: 520,
  DEFAULT_PRESET: 'moderate',
  /** Population reference for relative risk, fixed regardless of the active preset */
  POPULATION_REFERENCE_PRESET: 'moderate',
  HORIZON_AGE: 80,
  DEFAULT_AGE: 30,
  DEFAULT_EVENT_AGE: 65,
};

export const EXPOSURE_RULES = {
  SCALABLE_UNIT_MG: 100,
  SCALABLE_MIN_SUPRA_WEEKS: 26,
  STACK_THRESHOLD_MG: 300,
  STACK_MIN_SUPRA_WEEKS: 20,
  /** 50 mg/day */
  ORAL_HIGH_DOSE_WEEKLY_MG: 350,
  ORAL_HIGH_DOSE_MIN_WEEKS: 5,
  RECOVERY_RATIO_LOW: 0.5,
};

export const CLINICAL_THRESHOLDS = {
  HEMATOCRIT_HIGH_PCT: 54,
  HDL_NADIR_LOW: 25,
  HDL_NADIR_FLOOR: 15,
  DEFAULT_HDL: 50,
  DEFAULT_HEMATOCRIT: 45,
  /** Exposure over threshold at which the HDL drop reaches its maximum */
  HDL_MAX_DROP_EXCESS_MG: 300,
  HDL_MAX_DROP_FRACTION: 0.5,
};

export const CATEGORY_THRESHOLDS = {
  HIGH_RISK_WTE_MG: 300,
  HIGH_RISK_ORAL_WEEKS: 8,
  HIGH_RISK_RECOVERY_RATIO: 0.75,
};

export const INTERVENTION_THRESHOLDS = {
  VO2_IMPROVEMENT: 5,
  VO2_ADDITIONAL_IMPROVEMENT: 10,
  BODYFAT_REDUCTION_PTS: 5,
  MEDITERRANEAN_HIGH: 8,
};

export const PROTECTIVE_THRESHOLDS = {
  LDL_OPTIMAL: 70,
  VO2MAX_EXCELLENT: 50,
  BODYFAT_OPTIMAL_PCT: 15,
  MEDITERRANEAN_EXCELLENT: 8,
};

// Baseline adjustments for protective factors the person already has
export const PROTECTIVE_FACTORS: Record<string, Record<string, number>> = {
  ldl_optimal: { ascvd: 0.75, ischemic_stroke: 0.8 },
  vo2max_excellent: { ascvd: 0.8, hf: 0.75, diabetes: 0.7 },
  bodyfat_optimal: { ascvd: 0.85, diabetes: 0.65, hf: 0.85 },
  diet_excellent: { ascvd: 0.85, cancer_colorectal: 0.8, dementia: 0.85 },
  non_smoker: { ascvd: 0.9, cancer_colorectal: 0.9, dementia: 0.95 },
  osa_treated: { ascvd: 0.9, hf: 0.85, diabetes: 0.9 },
};

// Average age of first event, used by the event-free-years window
export const AVERAGE_EVENT_AGE: Record<string, number> = {
  ascvd: 65,
  hf: 70,
  thrombosis: 60,
  ischemic_stroke: 70,
  hemorrhagic_stroke: 65,
  hepatic: 55,
  renal: 60,
  neuro: 45,
  diabetes: 55,
  dementia: 75,
  cancer_colorectal: 65,
  cancer_prostate: 65,
  endocrine: 35,
  dermatologic: 30,
};

export const DOMAIN_DISPLAY_NAMES: Record<string, string> = {
  ascvd: 'ASCVD',
  hf: 'Heart Failure',
  thrombosis: 'Thrombosis',
  ischemic_stroke: 'Ischemic Stroke',
  hemorrhagic_stroke: 'Hemorrhagic Stroke',
  hepatic: 'Hepatic Injury',
  renal: 'Renal Injury',
  neuro: 'Neuro/Psychiatric',
  diabetes: 'Type 2 Diabetes',
  dementia: 'Dementia',
  cancer_colorectal: 'Colorectal Cancer',
  cancer_prostate: 'Prostate Cancer',
  endocrine: 'Endocrine Suppression',
  dermatologic: 'Dermatologic',
};

export function getPresetsDir(): string {
  return process.env.RISK_PRESETS_DIR || join(process.cwd(), 'presets');
}

export function getDataDir(): string {
  return process.env.RISK_DATA_DIR || join(process.cwd(), 'data');
}

export function getScenariosDir(): string {
  return join(process.cwd(), 'scenarios');
}

export const API_CONFIG = {
  DEFAULT_PORT: 3001,
  JSON_LIMIT: '256kb',
};
