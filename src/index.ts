/**
 * Public API of the lifetime risk engine
 */

export * from './domain/types.js';
export * from './domain/errors.js';
export {
  RiskInputSchema,
  CompoundDoseSchema,
  PresetFileSchema,
} from './domain/schemas.js';
export {
  buildCompoundTable,
  getCompoundTable,
  getPotencyFactor,
  normalizeDose,
  normalizeRegimen,
  type CompoundTable,
} from './pipeline/potency.js';
export { aggregateExposure, estimateHdlNadir } from './pipeline/exposure.js';
export { CoefficientStore, getStore, parsePreset } from './pipeline/coefficients.js';
export {
  PluginRegistry,
  definePlugin,
  type RiskPlugin,
  type PluginDefinition,
  type PluginInputSchema,
  type PluginMultipliers,
} from './pipeline/plugins.js';
export { resolveMultipliers, MULTIPLIER_RULES } from './pipeline/multipliers.js';
export { composeRisk, categorize, activeProtectiveFactors } from './pipeline/compose.js';
export { estimateEventFreeYears, eventFreeWindow } from './pipeline/eventFreeYears.js';
export {
  calculate,
  calculateRisk,
  createCalculationContext,
  parseRiskInput,
  recordHash,
  type CalculationContext,
  type ContextOptions,
} from './pipeline/run.js';
export { compareScenarios } from './pipeline/impact.js';
export { createPluginRegistry, fertilityPlugin, loadPluginModule } from './plugins/index.js';
