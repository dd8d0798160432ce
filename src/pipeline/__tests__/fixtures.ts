/**
 * Shared test fixtures
 */

import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseRiskInput } from '../run.js';
import type { CompoundDose, ExposureProfile, RiskInput, RiskInputDraft } from '../../domain/types.js';

export function dose(
  compound: string,
  weeklyMg: number,
  durationWeeks: number,
  overrides: Partial<CompoundDose> = {}
): CompoundDose {
  return { compound, weeklyMg, durationWeeks, oral: false, startWeek: 1, ...overrides };
}

/** Testosterone 500 mg x 20 wks + trenbolone 300 mg x 16 wks + oral anadrol 350 mg x 6 wks */
export function highRiskStack(): CompoundDose[] {
  return [
    dose('testosterone_enanthate', 500, 20),
    dose('trenbolone_acetate', 300, 16),
    dose('anadrol', 350, 6, { oral: true }),
  ];
}

export function physiologicTrt(): CompoundDose[] {
  return [dose('testosterone_cypionate', 140, 52)];
}

export function createMockInput(draft: RiskInputDraft = {}): RiskInput {
  return parseRiskInput({ activePlugins: [], ...draft });
}

export function createMockProfile(overrides: Partial<ExposureProfile> = {}): ExposureProfile {
  return {
    weeklyEquivalentTotal: 0,
    peakWeeklyEquivalent: 0,
    supraphysiologicWeeks: 0,
    longestSupraphysiologicStreak: 0,
    recoveryRatio: 1,
    oralWeeks: 0,
    oral17aaWeeks: 0,
    oral17aaHighDoseWeeks: 0,
    exposedWeeks: 0,
    observationWeeks: 52,
    estimatedHdlNadir: 50,
    hematocrit: 45,
    flags: {
      hematocritHigh: false,
      hdlLow: false,
      hasHeavyCompounds: false,
      hasDhtCompounds: false,
    },
    ...overrides,
  };
}

/**
 * Temporary presets directory holding the given preset files, keyed by preset name
 */
export function createPresetDir(files: Record<string, unknown>): string {
  const dir = mkdtempSync(join(tmpdir(), 'risk-presets-'));
  for (const [name, content] of Object.entries(files)) {
    const body = typeof content === 'string' ? content : JSON.stringify(content);
    writeFileSync(join(dir, `coefficients_${name}.json`), body, 'utf-8');
  }
  return dir;
}

export function minimalPreset(
  name: string,
  baseline: Record<string, number> = { ascvd: 0.4, hepatic: 0.03 },
  multipliers: Record<string, Record<string, number>> = {}
): Record<string, unknown> {
  return { name, version: '1.0.0', description: `${name} test preset`, baseline, multipliers };
}
