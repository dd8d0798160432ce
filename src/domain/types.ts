/**
 * Core domain types for the risk calculation engine
 */

import type { CompoundDose } from './schemas.js';

export type {
  CompoundDose,
  Regimen,
  Labs,
  Interventions,
  RiskInput,
  RiskInputDraft,
} from './schemas.js';

/** Health domain key, e.g. "ascvd" or "hepatic" */
export type Domain = string;

export type DomainValues = Readonly<Record<Domain, number>>;

export interface NormalizedDose extends CompoundDose {
  /** Canonical compound key */
  compound_key: string;
  potency: number;
  weekly_equivalent_mg: number;
}

export interface ExposureFlags {
  hematocritHigh: boolean;
  hdlLow: boolean;
  hasHeavyCompounds: boolean;
  hasDhtCompounds: boolean;
}

export interface ExposureProfile {
  /** Mean concurrent injectable weekly-equivalent while on cycle */
  weeklyEquivalentTotal: number;
  peakWeeklyEquivalent: number;
  supraphysiologicWeeks: number;
  longestSupraphysiologicStreak: number;
  /** Fraction of the observation window at or below the physiologic threshold */
  recoveryRatio: number;
  oralWeeks: number;
  oral17aaWeeks: number;
  oral17aaHighDoseWeeks: number;
  exposedWeeks: number;
  observationWeeks: number;
  estimatedHdlNadir: number;
  hematocrit: number;
  flags: ExposureFlags;
}

export interface Preset {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly baseline: DomainValues;
  readonly multipliers: Readonly<Record<string, DomainValues>>;
}

export type MultiplierSource = 'categorical' | 'scalable' | 'intervention' | 'plugin';

export interface ResolvedMultiplier {
  /** Preset key, or the plugin name for plugin values */
  key: string;
  source: MultiplierSource;
  value: number;
  /** Exponent applied to the preset value (scalable entries only) */
  units?: number;
}

export type ResolvedMultipliers = Record<Domain, ResolvedMultiplier[]>;

export interface PluginContribution {
  plugin: string;
  multipliers: Record<Domain, unknown[]>;
}

export interface PluginWarning {
  plugin: string;
  reason: string;
}

export type RiskCategory = 'physiologic' | 'moderate' | 'high-risk';

export interface DomainRisk {
  domain: Domain;
  /** Active preset's baseline absolute risk */
  baseline: number;
  /** Baseline after the person's protective factors */
  adjustedBaseline: number;
  /** Moderate-preset baseline used as the relative-risk denominator */
  populationBaseline: number;
  absoluteRisk: number;
  relativeRisk: number;
  category: RiskCategory;
  /** Unclamped product fell outside [0, 1] */
  saturated: boolean;
  multipliers: ResolvedMultiplier[];
  eventFreeYearsVsPopulation: number;
}

export interface RiskRecord {
  preset: string;
  presetVersion: string;
  category: RiskCategory;
  domains: Record<Domain, DomainRisk>;
}

export interface RiskCalculation {
  record: RiskRecord;
  exposure: ExposureProfile;
  warnings: PluginWarning[];
  saturatedDomains: Domain[];
}

export interface DomainImpact {
  domain: Domain;
  baseRisk: number;
  alternativeRisk: number;
  absoluteRiskReduction: number;
  relativeRiskReduction: number;
  riskRatio: number;
  eventFreeYearsGained: number;
}

export interface ScenarioComparison {
  base: RiskCalculation;
  alternative: RiskCalculation;
  impacts: DomainImpact[];
  totalEventFreeYearsGained: number;
}
