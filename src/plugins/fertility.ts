/**
 * Built-in fertility plugin: endocrine suppression and recovery adjustments
 */

import { z } from 'zod';
import { sanitizeKey } from '../domain/ids.js';
import { definePlugin, type PluginMultipliers } from '../pipeline/plugins.js';
import type { CompoundDose, RiskInput } from '../domain/types.js';

export const FERTILITY_PLUGIN_NAME = 'fertility';

// Axis suppression relative to testosterone; first substring match wins
const SUPPRESSION_FACTORS: ReadonlyArray<readonly [string, number]> = [
  ['testosterone', 1.0],
  ['nandrolone', 1.3],
  ['trenbolone', 2.0],
  ['anadrol', 1.8],
  ['dianabol', 1.5],
  ['winstrol', 1.2],
  ['anavar', 0.8],
  ['primobolan', 0.9],
];

const REFERENCE_WEEKLY_MG = 200;
const REFERENCE_DURATION_WEEKS = 12;
const SCORE_WEIGHT = 0.15;
const AGE_PENALTY_START = 25;
const AGE_PENALTY_PER_YEAR = 0.02;

export const FertilityInputsSchema = z.object({
  baselineFertilityIssues: z.boolean().default(false),
  fertilityProtocol: z.boolean().default(false),
  timeOffBetweenCyclesMonths: z.number().min(0).max(60).default(0),
  stressManagement: z.boolean().default(false),
});

export type FertilityInputs = z.infer<typeof FertilityInputsSchema>;

function suppressionFactor(compound: string): number {
  const key = sanitizeKey(compound);
  const match = SUPPRESSION_FACTORS.find(([name]) => key.includes(name));
  return match ? match[1] : 1.0;
}

/**
 * Cumulative suppression: 200 mg/week for 12 weeks of testosterone scores 1
 */
export function suppressionScore(doses: readonly CompoundDose[]): number {
  let score = 0;
  for (const dose of doses) {
    score +=
      (dose.weeklyMg / REFERENCE_WEEKLY_MG) *
      (dose.durationWeeks / REFERENCE_DURATION_WEEKS) *
      suppressionFactor(dose.compound);
  }
  return score;
}

export function fertilityMultipliers(input: Readonly<RiskInput>): PluginMultipliers {
  const options = FertilityInputsSchema.parse(input.pluginInputs[FERTILITY_PLUGIN_NAME] ?? {});
  const endocrine: number[] = [];

  if (options.baselineFertilityIssues) {
    endocrine.push(1.3);
  }

  const score = suppressionScore(input.regimen.compounds);
  if (score > 0) {
    const age_penalty =
      1 + Math.max(0, (input.demographics.age - AGE_PENALTY_START) * AGE_PENALTY_PER_YEAR);
    endocrine.push((1 + score * SCORE_WEIGHT) * age_penalty);
  }

  if (input.interventions.hcg) endocrine.push(0.7);
  if (input.interventions.sermPct) endocrine.push(0.75);
  if (options.fertilityProtocol) endocrine.push(0.6);

  const time_off = options.timeOffBetweenCyclesMonths;
  if (time_off >= 3) {
    endocrine.push(Math.max(0.85, 0.95 - time_off * 0.02));
  }

  const { lifestyle } = input;
  if (lifestyle.smoking === true) endocrine.push(1.25);
  if ((lifestyle.alcoholOccasionsPerMonth ?? 0) > 8) endocrine.push(1.15);

  const sleep_hours = lifestyle.sleepHours ?? 7;
  if (sleep_hours < 6) {
    endocrine.push(1.2);
  } else if (sleep_hours >= 8) {
    endocrine.push(0.95);
  }

  if (options.stressManagement) endocrine.push(0.9);

  return { endocrine };
}

export const fertilityPlugin = definePlugin({
  name: FERTILITY_PLUGIN_NAME,
  version: '1.0.0',
  description: 'Endocrine suppression and fertility recovery modeling',
  multipliers: fertilityMultipliers,
  inputs: () => ({
    baselineFertilityIssues: {
      type: 'boolean',
      label: 'Pre-existing fertility concerns',
      default: false,
    },
    fertilityProtocol: {
      type: 'boolean',
      label: 'Following a comprehensive fertility protocol',
      description: 'hCG, SERMs, monitoring and lifestyle optimization',
      default: false,
    },
    timeOffBetweenCyclesMonths: {
      type: 'number',
      label: 'Average time off between cycles (months)',
      default: 0,
      min: 0,
      max: 60,
    },
    stressManagement: {
      type: 'boolean',
      label: 'Active stress management',
      default: false,
    },
  }),
});
