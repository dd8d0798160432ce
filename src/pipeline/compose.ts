/**
 * Risk Compositor: baseline x protective factors x resolved multipliers, per domain
 */

import { createLogger } from '../utils/log.js';
import { clamp, product } from '../utils/math.js';
import {
  CATEGORY_THRESHOLDS,
  ENGINE_DEFAULTS,
  PROTECTIVE_FACTORS,
  PROTECTIVE_THRESHOLDS,
} from '../config/defaults.js';
import { eventFreeYearsFromDelta } from './eventFreeYears.js';
import type {
  Domain,
  DomainRisk,
  DomainValues,
  ExposureProfile,
  Preset,
  ResolvedMultipliers,
  RiskCategory,
  RiskInput,
} from '../domain/types.js';

const logger = createLogger('compose');

/**
 * Protective factors the person already has. Unreported inputs apply nothing.
 */
export function activeProtectiveFactors(input: RiskInput): string[] {
  const active: string[] = [];
  const { labs, performance, anthropometrics, lifestyle } = input;

  if (labs.ldl !== undefined && labs.ldl <= PROTECTIVE_THRESHOLDS.LDL_OPTIMAL) {
    active.push('ldl_optimal');
  }
  if (performance.vo2max !== undefined && performance.vo2max > PROTECTIVE_THRESHOLDS.VO2MAX_EXCELLENT) {
    active.push('vo2max_excellent');
  }
  if (
    anthropometrics.bodyFatPct !== undefined &&
    anthropometrics.bodyFatPct <= PROTECTIVE_THRESHOLDS.BODYFAT_OPTIMAL_PCT
  ) {
    active.push('bodyfat_optimal');
  }
  if (
    lifestyle.mediterraneanAdherence !== undefined &&
    lifestyle.mediterraneanAdherence >= PROTECTIVE_THRESHOLDS.MEDITERRANEAN_EXCELLENT
  ) {
    active.push('diet_excellent');
  }
  if (lifestyle.smoking === false) {
    active.push('non_smoker');
  }
  if (lifestyle.osaStatus === 'treated') {
    active.push('osa_treated');
  }

  return active;
}

export function protectiveMultiplier(domain: Domain, factors: string[]): number {
  return product(factors.map((factor) => PROTECTIVE_FACTORS[factor]?.[domain] ?? 1));
}

/**
 * Categorical label, a pure function of exposure. Most severe match wins.
 */
export function categorize(profile: ExposureProfile): RiskCategory {
  if (
    profile.weeklyEquivalentTotal > CATEGORY_THRESHOLDS.HIGH_RISK_WTE_MG ||
    profile.oralWeeks > CATEGORY_THRESHOLDS.HIGH_RISK_ORAL_WEEKS ||
    profile.recoveryRatio < CATEGORY_THRESHOLDS.HIGH_RISK_RECOVERY_RATIO ||
    profile.flags.hematocritHigh
  ) {
    return 'high-risk';
  }

  if (
    profile.weeklyEquivalentTotal <= ENGINE_DEFAULTS.PHYSIOLOGIC_THRESHOLD_MG &&
    profile.oralWeeks === 0
  ) {
    return 'physiologic';
  }

  return 'moderate';
}

export interface CompositionInput {
  preset: Preset;
  populationBaseline: DomainValues;
  resolved: ResolvedMultipliers;
  profile: ExposureProfile;
  input: RiskInput;
}

export interface Composition {
  category: RiskCategory;
  domains: Record<Domain, DomainRisk>;
  saturatedDomains: Domain[];
}

export function composeRisk({
  preset,
  populationBaseline,
  resolved,
  profile,
  input,
}: CompositionInput): Composition {
  const category = categorize(profile);
  const factors = activeProtectiveFactors(input);
  const age = input.demographics.age;

  const domains: Record<Domain, DomainRisk> = {};
  const saturatedDomains: Domain[] = [];

  for (const [domain, baseline] of Object.entries(preset.baseline)) {
    const multipliers = resolved[domain] ?? [];
    const adjusted_baseline = baseline * protectiveMultiplier(domain, factors);
    const raw_risk = adjusted_baseline * product(multipliers.map((m) => m.value));
    const absolute_risk = clamp(raw_risk, 0, 1);
    const saturated = raw_risk !== absolute_risk;

    const population_baseline = populationBaseline[domain];

    domains[domain] = {
      domain,
      baseline,
      adjustedBaseline: adjusted_baseline,
      populationBaseline: population_baseline,
      absoluteRisk: absolute_risk,
      relativeRisk: absolute_risk / population_baseline,
      category,
      saturated,
      multipliers,
      eventFreeYearsVsPopulation: eventFreeYearsFromDelta(
        domain,
        population_baseline - absolute_risk,
        age
      ),
    };

    if (saturated) {
      saturatedDomains.push(domain);
    }
  }

  if (saturatedDomains.length > 0) {
    logger.debug({ saturated: saturatedDomains }, 'Risk clamped to [0, 1]');
  }

  return { category, domains, saturatedDomains };
}
