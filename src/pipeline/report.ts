/**
 * Console reports for the calculate and compare commands
 */

import { DOMAIN_DISPLAY_NAMES } from '../config/defaults.js';
import type { ExposureFlags, RiskCalculation, ScenarioComparison } from '../domain/types.js';

export function formatPercent(probability: number, digits: number = 1): string {
  return `${(probability * 100).toFixed(digits)}%`;
}

export function formatSigned(value: number, digits: number = 2): string {
  const fixed = value.toFixed(digits);
  return value > 0 ? `+${fixed}` : fixed;
}

export function displayName(domain: string): string {
  return DOMAIN_DISPLAY_NAMES[domain] ?? domain;
}

export function compoundClasses(flags: ExposureFlags): string {
  const classes: string[] = [];
  if (flags.hasHeavyCompounds) classes.push('heavy');
  if (flags.hasDhtCompounds) classes.push('DHT-derived');
  return classes.length > 0 ? classes.join(', ') : 'none';
}

export function formatRiskReport(calculation: RiskCalculation, record_hash: string): string[] {
  const { record, exposure } = calculation;
  const lines: string[] = [];

  lines.push('='.repeat(80));
  lines.push('LIFETIME RISK REPORT');
  lines.push('='.repeat(80));
  lines.push(`Preset: ${record.preset} (v${record.presetVersion})`);
  lines.push(`Category: ${record.category}`);
  lines.push(`Record hash: ${record_hash}`);
  lines.push('');

  lines.push('EXPOSURE:');
  lines.push(`  Weekly testosterone-equivalent: ${exposure.weeklyEquivalentTotal.toFixed(0)} mg`);
  lines.push(`  Peak weekly equivalent: ${exposure.peakWeeklyEquivalent.toFixed(0)} mg`);
  lines.push(
    `  Supraphysiologic weeks: ${exposure.supraphysiologicWeeks} / ${exposure.observationWeeks}`
  );
  lines.push(`  Recovery ratio: ${exposure.recoveryRatio.toFixed(2)}`);
  lines.push(`  Oral weeks: ${exposure.oralWeeks}`);
  lines.push(`  Compound classes: ${compoundClasses(exposure.flags)}`);
  lines.push(`  Estimated HDL nadir: ${exposure.estimatedHdlNadir.toFixed(0)} mg/dL`);
  lines.push('');

  lines.push('DOMAIN RISKS:');
  lines.push(
    `  ${'Domain'.padEnd(24)}${'Absolute'.padStart(10)}${'RR'.padStart(8)}${'EFY vs pop'.padStart(12)}`
  );
  for (const risk of Object.values(calculation.record.domains)) {
    const flag = risk.saturated ? ' (saturated)' : '';
    lines.push(
      `  ${displayName(risk.domain).padEnd(24)}` +
        `${formatPercent(risk.absoluteRisk).padStart(10)}` +
        `${risk.relativeRisk.toFixed(2).padStart(8)}` +
        `${formatSigned(risk.eventFreeYearsVsPopulation).padStart(12)}${flag}`
    );
  }

  if (calculation.warnings.length > 0) {
    lines.push('');
    lines.push('WARNINGS:');
    for (const warning of calculation.warnings) {
      lines.push(`  ⚠ ${warning.plugin}: ${warning.reason}`);
    }
  }

  lines.push('='.repeat(80));
  return lines;
}

export function formatComparisonReport(comparison: ScenarioComparison): string[] {
  const lines: string[] = [];

  lines.push('='.repeat(80));
  lines.push('SCENARIO COMPARISON');
  lines.push('='.repeat(80));
  lines.push(
    `Base: ${comparison.base.record.category}  ->  Alternative: ${comparison.alternative.record.category}`
  );
  lines.push('');
  lines.push(
    `  ${'Domain'.padEnd(24)}${'Base'.padStart(9)}${'Alt'.padStart(9)}${'ARR'.padStart(9)}${'EFY'.padStart(9)}`
  );
  for (const impact of comparison.impacts) {
    lines.push(
      `  ${displayName(impact.domain).padEnd(24)}` +
        `${formatPercent(impact.baseRisk).padStart(9)}` +
        `${formatPercent(impact.alternativeRisk).padStart(9)}` +
        `${formatPercent(impact.absoluteRiskReduction).padStart(9)}` +
        `${formatSigned(impact.eventFreeYearsGained).padStart(9)}`
    );
  }
  lines.push('');
  lines.push(`Total event-free years gained: ${formatSigned(comparison.totalEventFreeYearsGained)}`);
  lines.push('='.repeat(80));
  return lines;
}

export function printLines(lines: string[]): void {
  console.log('\n' + lines.join('\n') + '\n');
}
