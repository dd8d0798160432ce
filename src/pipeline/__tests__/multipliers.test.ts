/**
 * Unit tests for the multiplier resolver
 */

import { describe, it, expect } from 'vitest';
import { resolveMultipliers } from '../multipliers.js';
import { aggregateExposure } from '../exposure.js';
import { normalizeRegimen } from '../potency.js';
import { CoefficientStore, parsePreset } from '../coefficients.js';
import { createMockInput, createMockProfile, dose, highRiskStack, minimalPreset } from './fixtures.js';
import type { RiskInput } from '../../domain/types.js';

const moderate = new CoefficientStore().load('moderate');

function resolveFor(input: RiskInput) {
  const profile = aggregateExposure(normalizeRegimen(input.regimen.compounds), input.labs);
  return resolveMultipliers(profile, input, moderate);
}

function keysOf(input: RiskInput, domain: string): string[] {
  return resolveFor(input).byDomain[domain].map((m) => m.key);
}

// ============================================================================
// Built-in rules
// ============================================================================

describe('resolveMultipliers', () => {
  it('initializes every preset domain', () => {
    const { byDomain } = resolveFor(createMockInput());
    expect(Object.keys(byDomain)).toEqual(Object.keys(moderate.baseline));
    expect(byDomain.ischemic_stroke).toEqual([]);
  });

  it('applies only the physiologic base for an empty regimen', () => {
    const { byDomain } = resolveFor(createMockInput());
    expect(byDomain.ascvd).toEqual([{ key: 'physiologic_t_base', source: 'categorical', value: 1 }]);
  });

  it('resolves the stack rules in order', () => {
    const input = createMockInput({ regimen: { compounds: highRiskStack() } });
    expect(keysOf(input, 'ascvd')).toEqual([
      'physiologic_t_base',
      'stack_300mg_20wks',
      'oral_17aa_10wks_moderate',
      'hdl_nadir_lt25',
    ]);
    expect(keysOf(input, 'hepatic')).toEqual(['physiologic_t_base', 'oral_17aa_10wks_moderate']);
  });

  it('places interventions after exposure rules', () => {
    const input = createMockInput({
      regimen: { compounds: highRiskStack() },
      interventions: { statinIntensity: 'high' },
    });
    const ascvd = resolveFor(input).byDomain.ascvd;
    expect(ascvd[ascvd.length - 1]).toEqual({ key: 'statin_high', source: 'intervention', value: 0.7 });
  });

  it('uses the high-dose oral entry above 350 mg/week for more than 5 weeks', () => {
    const input = createMockInput({
      regimen: { compounds: [dose('anadrol', 700, 6, { oral: true })] },
    });
    const keys = keysOf(input, 'hepatic');
    expect(keys).toContain('oral_17aa_10wks_high');
    expect(keys).not.toContain('oral_17aa_10wks_moderate');
  });

  it('raises scalable entries to the number of units over threshold', () => {
    // 350 mg/week for 30 weeks: 2 units over 150 mg, 22 of 52 weeks recovered
    const input = createMockInput({ regimen: { compounds: [dose('testosterone', 350, 30)] } });
    const ascvd = resolveFor(input).byDomain.ascvd;

    expect(ascvd.map((m) => m.key)).toEqual([
      'physiologic_t_base',
      'stack_300mg_20wks',
      'recovery_ratio_lt_0_5',
      'per_100mg_wte_over_150mg_26wks',
    ]);
    const scalable = ascvd[3];
    expect(scalable.source).toBe('scalable');
    expect(scalable.units).toBe(2);
    expect(scalable.value).toBeCloseTo(1.08 * 1.08, 12);
  });

  it('skips the scalable entry below 26 supraphysiologic weeks', () => {
    const input = createMockInput({ regimen: { compounds: [dose('testosterone', 350, 25)] } });
    expect(keysOf(input, 'ascvd')).not.toContain('per_100mg_wte_over_150mg_26wks');
  });

  it('applies hematocrit management only while hematocrit is high', () => {
    const interventions = { doseReductionForHct: true, bloodDonationOnly: true };

    const high = createMockInput({ labs: { hematocrit: 56 }, interventions });
    expect(keysOf(high, 'thrombosis')).toEqual([
      'physiologic_t_base',
      'hematocrit_gt54',
      'dose_reduction_for_hct',
    ]);

    const normal = createMockInput({ labs: { hematocrit: 48 }, interventions });
    expect(keysOf(normal, 'thrombosis')).toEqual(['physiologic_t_base']);
  });

  it('applies blood donation when it is the only hematocrit measure', () => {
    const input = createMockInput({
      labs: { hematocrit: 56 },
      interventions: { bloodDonationOnly: true },
    });
    expect(keysOf(input, 'thrombosis')).toContain('blood_donation_only_without_dose_reduction');
  });

  it('stacks the additional VO2 entry on top of the first', () => {
    const input = createMockInput({ interventions: { vo2maxImprovement: 10 } });
    expect(keysOf(input, 'ascvd')).toEqual(['physiologic_t_base', 'vo2_plus5', 'additional_vo2_plus5']);
  });

  it('skips rules the preset does not define', () => {
    const sparse = parsePreset('sparse', minimalPreset('sparse', { ascvd: 0.4 }, {
      statin_high: { ascvd: 0.8 },
    }));
    const input = createMockInput({
      regimen: { compounds: highRiskStack() },
      interventions: { statinIntensity: 'high' },
    });
    const profile = aggregateExposure(normalizeRegimen(input.regimen.compounds), input.labs);
    const { byDomain } = resolveMultipliers(profile, input, sparse);
    expect(byDomain).toEqual({
      ascvd: [{ key: 'statin_high', source: 'intervention', value: 0.8 }],
    });
  });
});

// ============================================================================
// Plugin contributions
// ============================================================================

describe('plugin contributions', () => {
  const preset = parsePreset('tiny', minimalPreset('tiny', { ascvd: 0.4, hepatic: 0.03 }));
  const input = createMockInput();
  const profile = createMockProfile();

  it('appends plugin values by plugin name after built-in rules', () => {
    const { byDomain, warnings } = resolveMultipliers(profile, input, preset, [
      { plugin: 'zeta', multipliers: { ascvd: [1.2] } },
      { plugin: 'alpha', multipliers: { ascvd: [0.9] } },
    ]);
    expect(byDomain.ascvd).toEqual([
      { key: 'alpha', source: 'plugin', value: 0.9 },
      { key: 'zeta', source: 'plugin', value: 1.2 },
    ]);
    expect(warnings).toEqual([]);
  });

  it('drops invalid values and unknown domains with warnings', () => {
    const { byDomain, warnings } = resolveMultipliers(profile, input, preset, [
      { plugin: 'alpha', multipliers: { ascvd: [1.1, 'x', -1, 0], pancreas: [1.1] } },
    ]);
    expect(byDomain.ascvd).toEqual([{ key: 'alpha', source: 'plugin', value: 1.1 }]);
    expect(byDomain.pancreas).toBeUndefined();
    expect(warnings).toEqual([
      { plugin: 'alpha', reason: 'invalid multiplier "x" for domain "ascvd"' },
      { plugin: 'alpha', reason: 'invalid multiplier -1 for domain "ascvd"' },
      { plugin: 'alpha', reason: 'invalid multiplier 0 for domain "ascvd"' },
      { plugin: 'alpha', reason: 'unknown domain "pancreas"' },
    ]);
  });
});
