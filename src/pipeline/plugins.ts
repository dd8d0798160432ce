/**
 * Plugin Registry
 *
 * Plugins extend the multiplier chain without touching the resolver. Each plugin sees only
 * a frozen copy of the raw input record and returns plain data; it never sees the
 * coefficient store or another plugin's output. A plugin that throws or returns a
 * malformed value contributes nothing and is reported as a warning.
 */

import { createLogger } from '../utils/log.js';
import { PluginContributionSchema } from '../domain/schemas.js';
import { PluginRegistrationError } from '../domain/errors.js';
import type {
  Domain,
  PluginContribution,
  PluginWarning,
  RiskInput,
} from '../domain/types.js';

const logger = createLogger('plugins');

// ============================================================================
// Capability contract
// ============================================================================

export interface PluginInputField {
  type: 'boolean' | 'number' | 'string' | 'select';
  label: string;
  description?: string;
  default?: boolean | number | string;
  min?: number;
  max?: number;
  options?: string[];
}

export type PluginInputSchema = Record<string, PluginInputField>;

export type PluginMultipliers = Record<Domain, number[]>;

export interface RiskPlugin {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  contributeMultipliers(input: Readonly<RiskInput>): PluginMultipliers;
  declareInputs(): PluginInputSchema;
}

/** Function-based plugin shape, adapted to RiskPlugin at registration */
export interface PluginDefinition {
  name: string;
  version?: string;
  description?: string;
  multipliers: (input: Readonly<RiskInput>) => PluginMultipliers;
  inputs?: () => PluginInputSchema;
}

export interface PluginInfo {
  name: string;
  version: string;
  description: string;
}

export interface PluginCollection {
  contributions: PluginContribution[];
  warnings: PluginWarning[];
}

export function definePlugin(definition: PluginDefinition): RiskPlugin {
  const inputs = definition.inputs;
  return {
    name: definition.name,
    version: definition.version ?? '1.0.0',
    description: definition.description ?? '',
    contributeMultipliers: (input) => definition.multipliers(input),
    declareInputs: () => (inputs ? inputs() : {}),
  };
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    value !== null &&
    (typeof value === 'object' || typeof value === 'function') &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function isRiskPlugin(candidate: RiskPlugin | PluginDefinition): candidate is RiskPlugin {
  return 'contributeMultipliers' in candidate;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Registry
// ============================================================================

export class PluginRegistry {
  private readonly plugins = new Map<string, RiskPlugin>();
  private sealed = false;

  public register(candidate: RiskPlugin | PluginDefinition): this {
    if (this.sealed) {
      throw new PluginRegistrationError(
        `Cannot register plugin "${candidate.name}": registry is sealed`
      );
    }

    const plugin = isRiskPlugin(candidate) ? candidate : definePlugin(candidate);
    if (!plugin.name || plugin.name.trim() === '') {
      throw new PluginRegistrationError('Plugin name must be a non-empty string');
    }
    if (this.plugins.has(plugin.name)) {
      throw new PluginRegistrationError(`Plugin "${plugin.name}" is already registered`);
    }

    this.plugins.set(plugin.name, plugin);
    logger.info({ plugin: plugin.name, version: plugin.version }, 'Plugin registered');
    return this;
  }

  /**
   * Freeze the registry; calculations only ever read it afterwards
   */
  public seal(): this {
    this.sealed = true;
    return this;
  }

  public get isSealed(): boolean {
    return this.sealed;
  }

  public has(name: string): boolean {
    return this.plugins.has(name);
  }

  public get size(): number {
    return this.plugins.size;
  }

  public list(): PluginInfo[] {
    return [...this.plugins.values()]
      .map((p) => ({ name: p.name, version: p.version, description: p.description }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  public declaredInputs(): Record<string, PluginInputSchema> {
    const all: Record<string, PluginInputSchema> = {};
    for (const { name } of this.list()) {
      const plugin = this.plugins.get(name);
      if (!plugin) continue;
      try {
        const inputs = plugin.declareInputs();
        if (Object.keys(inputs).length > 0) {
          all[name] = inputs;
        }
      } catch (error) {
        logger.warn({ plugin: name, error: errorMessage(error) }, 'Plugin input declaration failed');
      }
    }
    return all;
  }

  /**
   * Invoke the active plugins for one calculation. Plugins run in name order so the
   * result never depends on registration order.
   */
  public collect(input: RiskInput): PluginCollection {
    const contributions: PluginContribution[] = [];
    const warnings: PluginWarning[] = [];

    const requested = input.activePlugins ?? [...this.plugins.keys()];
    const names = [...new Set(requested)].sort((a, b) => a.localeCompare(b));

    for (const name of names) {
      const plugin = this.plugins.get(name);
      if (!plugin) {
        warnings.push({ plugin: name, reason: 'plugin is not registered' });
        continue;
      }

      try {
        const frozen_input = deepFreeze(structuredClone(input));
        const raw: unknown = plugin.contributeMultipliers(frozen_input);
        if (isThenable(raw)) {
          // Collection is synchronous; a late rejection must not surface as unhandled
          raw.then(undefined, (error: unknown) => {
            logger.warn({ plugin: name, error: errorMessage(error) }, 'Async plugin rejected');
          });
          const reason = 'contributeMultipliers returned a promise';
          warnings.push({ plugin: name, reason });
          logger.warn({ plugin: name }, `Plugin contribution dropped: ${reason}`);
          continue;
        }
        const parsed = PluginContributionSchema.safeParse(raw);
        if (!parsed.success) {
          const reason = 'contribution must map domain names to arrays of multipliers';
          warnings.push({ plugin: name, reason });
          logger.warn({ plugin: name }, `Plugin contribution dropped: ${reason}`);
          continue;
        }
        contributions.push({ plugin: name, multipliers: parsed.data });
      } catch (error) {
        const reason = `contributeMultipliers threw: ${errorMessage(error)}`;
        warnings.push({ plugin: name, reason });
        logger.warn({ plugin: name, error: errorMessage(error) }, 'Plugin failed; contribution ignored');
      }
    }

    return { contributions, warnings };
  }
}
