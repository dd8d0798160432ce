/**
 * Zod schemas for the input record, coefficient presets and the compound table
 */

import { z } from 'zod';
import { ENGINE_DEFAULTS } from '../config/defaults.js';

// ============================================================================
// Input record
// ============================================================================

export const CompoundDoseSchema = z.object({
  compound: z.string().min(1),
  weeklyMg: z.number().nonnegative(),
  durationWeeks: z.number().int().positive(),
  oral: z.boolean().default(false),
  startWeek: z.number().int().min(1).default(1),
  /** Potency relative to testosterone for compounds missing from the table */
  potencyOverride: z.number().positive().optional(),
});

export type CompoundDose = z.infer<typeof CompoundDoseSchema>;

export const RegimenSchema = z.object({
  compounds: z.array(CompoundDoseSchema).default([]),
  observationWeeks: z
    .number()
    .int()
    .positive()
    .max(ENGINE_DEFAULTS.MAX_OBSERVATION_WEEKS)
    .default(ENGINE_DEFAULTS.OBSERVATION_WEEKS),
});

export type Regimen = z.infer<typeof RegimenSchema>;

export const DemographicsSchema = z.object({
  age: z.number().int().min(0).max(120).default(ENGINE_DEFAULTS.DEFAULT_AGE),
  sex: z.enum(['male', 'female']).optional(),
});

export const LabsSchema = z.object({
  hdl: z.number().positive().optional(),
  ldl: z.number().positive().optional(),
  hematocrit: z.number().positive().max(100).optional(),
});

export type Labs = z.infer<typeof LabsSchema>;

export const AnthropometricsSchema = z.object({
  bodyFatPct: z.number().min(0).max(100).optional(),
});

export const PerformanceSchema = z.object({
  vo2max: z.number().positive().optional(),
});

export const LifestyleSchema = z.object({
  mediterraneanAdherence: z.number().min(0).max(10).optional(),
  osaStatus: z.enum(['none', 'untreated', 'treated']).optional(),
  smoking: z.boolean().optional(),
  alcoholOccasionsPerMonth: z.number().nonnegative().optional(),
  sleepHours: z.number().min(0).max(24).optional(),
});

export const InterventionsSchema = z.object({
  vo2maxImprovement: z.number().min(0).default(0),
  bodyfatReduction: z.number().min(0).default(0),
  eliminateOrals: z.boolean().default(false),
  replaceHeavyWithMild: z.boolean().default(false),
  statinIntensity: z.enum(['none', 'low', 'moderate', 'high']).default('none'),
  ezetimibe: z.boolean().default(false),
  pcsk9: z.boolean().default(false),
  omega3: z.boolean().default(false),
  glp1Agonist: z.boolean().default(false),
  metformin: z.boolean().default(false),
  pde5Daily: z.boolean().default(false),
  finasteride: z.boolean().default(false),
  aiExcess: z.boolean().default(false),
  sermPct: z.boolean().default(false),
  hcg: z.boolean().default(false),
  doseReductionForHct: z.boolean().default(false),
  bloodDonationOnly: z.boolean().default(false),
});

export type Interventions = z.infer<typeof InterventionsSchema>;

export const RiskInputSchema = z.object({
  demographics: DemographicsSchema.default({}),
  regimen: RegimenSchema.default({}),
  labs: LabsSchema.default({}),
  anthropometrics: AnthropometricsSchema.default({}),
  performance: PerformanceSchema.default({}),
  lifestyle: LifestyleSchema.default({}),
  interventions: InterventionsSchema.default({}),
  preset: z.string().min(1).default(ENGINE_DEFAULTS.DEFAULT_PRESET),
  /** Plugin names to run; every registered plugin when omitted */
  activePlugins: z.array(z.string()).optional(),
  /** Extra inputs keyed by plugin name */
  pluginInputs: z.record(z.record(z.unknown())).default({}),
});

/** Input record after defaults are applied */
export type RiskInput = z.infer<typeof RiskInputSchema>;
/** Input record as supplied by a caller */
export type RiskInputDraft = z.input<typeof RiskInputSchema>;

// ============================================================================
// Coefficient presets
// ============================================================================

const DomainValuesSchema = z.record(z.number());

export const PresetFileSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string().default(''),
  baseline: DomainValuesSchema,
  multipliers: z.record(DomainValuesSchema),
});

export type PresetFile = z.infer<typeof PresetFileSchema>;

// ============================================================================
// Compound potency table
// ============================================================================

export const CompoundTableSchema = z.object({
  reference: z.string().min(1),
  potency: z.record(z.number().positive()),
  classes: z.object({
    oral_17aa: z.array(z.string()),
    dht_derived: z.array(z.string()),
    heavy: z.array(z.string()),
  }),
});

export type CompoundTableFile = z.infer<typeof CompoundTableSchema>;

// ============================================================================
// Plugin output (checked at runtime; plugins may be plain JavaScript)
// ============================================================================

export const PluginContributionSchema = z.record(z.array(z.unknown()));
