/**
 * Multiplier Resolver
 *
 * Decides which preset entries apply to a scenario and at what magnitude. Produces, per
 * domain, the ordered list of factors the compositor multiplies. Order is fixed:
 *   1. categorical exposure / lab rules
 *   2. scalable rules (value ^ units over threshold)
 *   3. protective and intervention rules
 *   4. plugin values, by plugin name
 * The resolver performs no multiplication itself.
 */

import { createLogger } from '../utils/log.js';
import { isPositiveFinite } from '../utils/math.js';
import {
  ENGINE_DEFAULTS,
  EXPOSURE_RULES,
  INTERVENTION_THRESHOLDS,
} from '../config/defaults.js';
import type {
  ExposureProfile,
  PluginContribution,
  PluginWarning,
  Preset,
  ResolvedMultipliers,
  RiskInput,
} from '../domain/types.js';

const logger = createLogger('multipliers');

// ============================================================================
// Rule table
// ============================================================================

export interface RuleContext {
  profile: ExposureProfile;
  input: RiskInput;
}

interface FlatRule {
  kind: 'categorical' | 'intervention';
  key: string;
  applies: (ctx: RuleContext) => boolean;
}

interface ScalableRule {
  kind: 'scalable';
  key: string;
  /** Count of threshold-exceeding units; 0 means the rule contributes nothing */
  units: (ctx: RuleContext) => number;
}

export type MultiplierRule = FlatRule | ScalableRule;

const oralHighDose = ({ profile }: RuleContext) =>
  profile.oral17aaWeeks > 0 && profile.oral17aaHighDoseWeeks > EXPOSURE_RULES.ORAL_HIGH_DOSE_MIN_WEEKS;

export const CATEGORICAL_RULES: MultiplierRule[] = [
  { kind: 'categorical', key: 'physiologic_t_base', applies: () => true },
  {
    kind: 'categorical',
    key: 'stack_300mg_20wks',
    applies: ({ profile }) =>
      profile.weeklyEquivalentTotal >= EXPOSURE_RULES.STACK_THRESHOLD_MG &&
      profile.supraphysiologicWeeks >= EXPOSURE_RULES.STACK_MIN_SUPRA_WEEKS,
  },
  { kind: 'categorical', key: 'oral_17aa_10wks_high', applies: oralHighDose },
  {
    kind: 'categorical',
    key: 'oral_17aa_10wks_moderate',
    applies: (ctx) => ctx.profile.oral17aaWeeks > 0 && !oralHighDose(ctx),
  },
  { kind: 'categorical', key: 'hdl_nadir_lt25', applies: ({ profile }) => profile.flags.hdlLow },
  { kind: 'categorical', key: 'hematocrit_gt54', applies: ({ profile }) => profile.flags.hematocritHigh },
  {
    kind: 'categorical',
    key: 'recovery_ratio_lt_0_5',
    applies: ({ profile }) => profile.recoveryRatio < EXPOSURE_RULES.RECOVERY_RATIO_LOW,
  },
];

export const SCALABLE_RULES: MultiplierRule[] = [
  {
    kind: 'scalable',
    key: 'per_100mg_wte_over_150mg_26wks',
    units: ({ profile }) => {
      const excess = profile.weeklyEquivalentTotal - ENGINE_DEFAULTS.PHYSIOLOGIC_THRESHOLD_MG;
      if (excess <= 0 || profile.supraphysiologicWeeks < EXPOSURE_RULES.SCALABLE_MIN_SUPRA_WEEKS) {
        return 0;
      }
      return excess / EXPOSURE_RULES.SCALABLE_UNIT_MG;
    },
  },
];

const intervention = (key: string, applies: (ctx: RuleContext) => boolean): MultiplierRule => ({
  kind: 'intervention',
  key,
  applies,
});

export const INTERVENTION_RULES: MultiplierRule[] = [
  intervention(
    'vo2_plus5',
    ({ input }) => input.interventions.vo2maxImprovement >= INTERVENTION_THRESHOLDS.VO2_IMPROVEMENT
  ),
  intervention(
    'additional_vo2_plus5',
    ({ input }) =>
      input.interventions.vo2maxImprovement >= INTERVENTION_THRESHOLDS.VO2_ADDITIONAL_IMPROVEMENT
  ),
  intervention(
    'bodyfat_minus5pts',
    ({ input }) => input.interventions.bodyfatReduction >= INTERVENTION_THRESHOLDS.BODYFAT_REDUCTION_PTS
  ),
  intervention(
    'med_diet_high',
    ({ input }) =>
      (input.lifestyle.mediterraneanAdherence ?? 0) >= INTERVENTION_THRESHOLDS.MEDITERRANEAN_HIGH
  ),
  intervention('osa_treated', ({ input }) => input.lifestyle.osaStatus === 'treated'),
  intervention('replace_heavy_with_mild', ({ input }) => input.interventions.replaceHeavyWithMild),
  intervention('statin_low_intensity', ({ input }) => input.interventions.statinIntensity === 'low'),
  intervention('statin_moderate', ({ input }) => input.interventions.statinIntensity === 'moderate'),
  intervention('statin_high', ({ input }) => input.interventions.statinIntensity === 'high'),
  intervention('ezetimibe_addon', ({ input }) => input.interventions.ezetimibe),
  intervention('pcsk9_inhibitor', ({ input }) => input.interventions.pcsk9),
  intervention('omega3_high_purity', ({ input }) => input.interventions.omega3),
  intervention('glp1_gip', ({ input }) => input.interventions.glp1Agonist),
  intervention('metformin', ({ input }) => input.interventions.metformin),
  intervention('pde5_daily', ({ input }) => input.interventions.pde5Daily),
  intervention('finasteride_dutasteride', ({ input }) => input.interventions.finasteride),
  intervention('ai_excess_use', ({ input }) => input.interventions.aiExcess),
  intervention('serm_post_cycle', ({ input }) => input.interventions.sermPct),
  intervention('hcg_support', ({ input }) => input.interventions.hcg),
  // Hematocrit management only matters while hematocrit is high; dose reduction wins
  intervention(
    'dose_reduction_for_hct',
    ({ profile, input }) => profile.flags.hematocritHigh && input.interventions.doseReductionForHct
  ),
  intervention(
    'blood_donation_only_without_dose_reduction',
    ({ profile, input }) =>
      profile.flags.hematocritHigh &&
      !input.interventions.doseReductionForHct &&
      input.interventions.bloodDonationOnly
  ),
];

export const MULTIPLIER_RULES: readonly MultiplierRule[] = [
  ...CATEGORICAL_RULES,
  ...SCALABLE_RULES,
  ...INTERVENTION_RULES,
];

// ============================================================================
// Resolution
// ============================================================================

export interface MultiplierResolution {
  byDomain: ResolvedMultipliers;
  warnings: PluginWarning[];
}

export function resolveMultipliers(
  profile: ExposureProfile,
  input: RiskInput,
  preset: Preset,
  contributions: PluginContribution[] = []
): MultiplierResolution {
  const byDomain: ResolvedMultipliers = {};
  for (const domain of Object.keys(preset.baseline)) {
    byDomain[domain] = [];
  }

  const ctx: RuleContext = { profile, input };
  const applied: string[] = [];

  for (const rule of MULTIPLIER_RULES) {
    const values = preset.multipliers[rule.key];
    if (!values) continue;

    if (rule.kind === 'scalable') {
      const units = rule.units(ctx);
      if (units <= 0) continue;
      for (const [domain, value] of Object.entries(values)) {
        byDomain[domain].push({ key: rule.key, source: 'scalable', value: Math.pow(value, units), units });
      }
      applied.push(rule.key);
      continue;
    }

    if (!rule.applies(ctx)) continue;
    for (const [domain, value] of Object.entries(values)) {
      byDomain[domain].push({ key: rule.key, source: rule.kind, value });
    }
    applied.push(rule.key);
  }

  const warnings = appendPluginMultipliers(byDomain, contributions);

  logger.debug({ preset: preset.name, applied, plugin_warnings: warnings.length }, 'Multipliers resolved');

  return { byDomain, warnings };
}

function describeValue(value: unknown): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

/**
 * Append plugin values after the built-in rules. Unknown domains and values that are not
 * positive finite numbers are dropped with a warning.
 */
function appendPluginMultipliers(
  byDomain: ResolvedMultipliers,
  contributions: PluginContribution[]
): PluginWarning[] {
  const warnings: PluginWarning[] = [];
  const ordered = [...contributions].sort((a, b) => a.plugin.localeCompare(b.plugin));

  for (const contribution of ordered) {
    const domains = Object.keys(contribution.multipliers).sort();
    for (const domain of domains) {
      const target = byDomain[domain];
      if (!target) {
        warnings.push({ plugin: contribution.plugin, reason: `unknown domain "${domain}"` });
        continue;
      }
      for (const value of contribution.multipliers[domain]) {
        if (!isPositiveFinite(value)) {
          warnings.push({
            plugin: contribution.plugin,
            reason: `invalid multiplier ${describeValue(value)} for domain "${domain}"`,
          });
          continue;
        }
        target.push({ key: contribution.plugin, source: 'plugin', value });
      }
    }
  }

  for (const warning of warnings) {
    logger.warn(warning, 'Plugin multiplier dropped');
  }

  return warnings;
}
