/**
 * Calculation orchestrator
 *
 * input -> potency normalization -> exposure profile -> plugin contributions ->
 * multiplier resolution -> composition -> RiskCalculation
 *
 * Everything a calculation reads (preset, population baseline, plugins, compound table)
 * arrives through the CalculationContext, so two calculations never share hidden state.
 */

import { createLogger } from '../utils/log.js';
import { hashObject } from '../utils/hash.js';
import { ENGINE_DEFAULTS } from '../config/defaults.js';
import { RiskInputSchema } from '../domain/schemas.js';
import { InvalidCoefficientError, InvalidInputError } from '../domain/errors.js';
import { formatZodIssues } from './validation.js';
import { getCompoundTable, normalizeRegimen, type CompoundTable } from './potency.js';
import { aggregateExposure } from './exposure.js';
import { getStore, type CoefficientStore } from './coefficients.js';
import { PluginRegistry } from './plugins.js';
import { resolveMultipliers } from './multipliers.js';
import { composeRisk } from './compose.js';
import type {
  CompoundDose,
  DomainValues,
  Preset,
  RiskCalculation,
  RiskInput,
  RiskRecord,
} from '../domain/types.js';

const logger = createLogger('run');

export interface CalculationContext {
  preset: Preset;
  /** Relative-risk denominator, always the population reference preset's baseline */
  populationBaseline: DomainValues;
  plugins: PluginRegistry;
  compounds: CompoundTable;
}

export interface ContextOptions {
  store?: CoefficientStore;
  plugins?: PluginRegistry;
  compounds?: CompoundTable;
}

/**
 * Validate a raw input record and apply defaults
 */
export function parseRiskInput(raw: unknown): RiskInput {
  const parsed = RiskInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(formatZodIssues(parsed.error));
  }
  return parsed.data;
}

export function createCalculationContext(
  preset_name: string,
  options: ContextOptions = {}
): CalculationContext {
  const store = options.store ?? getStore();
  const preset = store.load(preset_name);
  const population = store.load(ENGINE_DEFAULTS.POPULATION_REFERENCE_PRESET);

  const uncovered = Object.keys(preset.baseline).filter(
    (domain) => population.baseline[domain] === undefined
  );
  if (uncovered.length > 0) {
    throw new InvalidCoefficientError(
      preset.name,
      uncovered.map(
        (domain) => `domain "${domain}" has no population baseline in preset "${population.name}"`
      )
    );
  }

  const plugins = options.plugins ?? new PluginRegistry();
  plugins.seal();

  return {
    preset,
    populationBaseline: population.baseline,
    plugins,
    compounds: options.compounds ?? getCompoundTable(),
  };
}

function dosesInScope(input: RiskInput): CompoundDose[] {
  const doses = input.regimen.compounds;
  return input.interventions.eliminateOrals ? doses.filter((dose) => !dose.oral) : doses;
}

/**
 * Compute the risk record for one validated input. The context's preset governs;
 * input.preset only selects the context in calculate().
 */
export function calculateRisk(input: RiskInput, context: CalculationContext): RiskCalculation {
  const normalized = normalizeRegimen(dosesInScope(input), context.compounds);
  logger.debug({ doses: normalized.length }, 'Stage 1: Regimen normalized');

  const exposure = aggregateExposure(normalized, input.labs, {
    observationWeeks: input.regimen.observationWeeks,
    table: context.compounds,
  });

  const collected = context.plugins.collect(input);
  logger.debug(
    { contributions: collected.contributions.length, warnings: collected.warnings.length },
    'Stage 2: Plugin contributions collected'
  );

  const resolution = resolveMultipliers(exposure, input, context.preset, collected.contributions);

  const composition = composeRisk({
    preset: context.preset,
    populationBaseline: context.populationBaseline,
    resolved: resolution.byDomain,
    profile: exposure,
    input,
  });
  logger.debug(
    { preset: context.preset.name, category: composition.category },
    'Stage 3: Risk composed'
  );

  const record: RiskRecord = {
    preset: context.preset.name,
    presetVersion: context.preset.version,
    category: composition.category,
    domains: composition.domains,
  };

  return {
    record,
    exposure,
    warnings: [...collected.warnings, ...resolution.warnings],
    saturatedDomains: composition.saturatedDomains,
  };
}

/**
 * Parse, build a context from input.preset, and calculate
 */
export function calculate(raw: unknown, options: ContextOptions = {}): RiskCalculation {
  const input = parseRiskInput(raw);
  const context = createCalculationContext(input.preset, options);
  return calculateRisk(input, context);
}

/**
 * Fingerprint of a risk record; identical inputs give identical hashes
 */
export function recordHash(record: RiskRecord): string {
  return hashObject(record);
}
