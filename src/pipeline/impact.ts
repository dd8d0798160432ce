/**
 * Scenario impact: per-domain effect of moving from a base scenario to an alternative
 */

import { ENGINE_DEFAULTS } from '../config/defaults.js';
import { DomainMismatchError } from '../domain/errors.js';
import { sum } from '../utils/math.js';
import { estimateEventFreeYears } from './eventFreeYears.js';
import type { DomainImpact, RiskCalculation, ScenarioComparison } from '../domain/types.js';

export function compareScenarios(
  base: RiskCalculation,
  alternative: RiskCalculation,
  age: number = ENGINE_DEFAULTS.DEFAULT_AGE
): ScenarioComparison {
  const impacts: DomainImpact[] = [];

  for (const [domain, base_risk] of Object.entries(base.record.domains)) {
    const alt_risk = alternative.record.domains[domain];
    if (!alt_risk) {
      throw new DomainMismatchError(domain, 'none');
    }

    const arr = base_risk.absoluteRisk - alt_risk.absoluteRisk;
    impacts.push({
      domain,
      baseRisk: base_risk.absoluteRisk,
      alternativeRisk: alt_risk.absoluteRisk,
      absoluteRiskReduction: arr,
      relativeRiskReduction: base_risk.absoluteRisk > 0 ? arr / base_risk.absoluteRisk : 0,
      riskRatio: base_risk.absoluteRisk > 0 ? alt_risk.absoluteRisk / base_risk.absoluteRisk : 1,
      eventFreeYearsGained: estimateEventFreeYears(base_risk, alt_risk, age),
    });
  }

  return {
    base,
    alternative,
    impacts,
    totalEventFreeYearsGained: sum(impacts.map((impact) => impact.eventFreeYearsGained)),
  };
}
