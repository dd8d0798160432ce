/**
 * Dynamic plugin loading from module files
 *
 * A plugin module exposes its plugin as the default export, as a `plugin` export, or
 * through a `registerPlugin()` function returning one. Either a RiskPlugin object or a
 * function-based PluginDefinition is accepted.
 */

import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { createLogger } from '../utils/log.js';
import { PluginRegistrationError } from '../domain/errors.js';
import {
  definePlugin,
  type PluginRegistry,
  type RiskPlugin,
} from '../pipeline/plugins.js';

const logger = createLogger('plugin-loader');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Wrap an untyped module value as a RiskPlugin. Its output is validated by the registry
 * on every call, like any other plugin's.
 */
function toPlugin(candidate: unknown, source: string): RiskPlugin {
  if (!isRecord(candidate)) {
    throw new PluginRegistrationError(`${source} does not export a plugin object`);
  }

  const { name, version, description } = candidate;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new PluginRegistrationError(`${source}: plugin name must be a non-empty string`);
  }

  const contribute = candidate.contributeMultipliers ?? candidate.multipliers;
  if (typeof contribute !== 'function') {
    throw new PluginRegistrationError(
      `${source}: plugin "${name}" must define contributeMultipliers(input)`
    );
  }

  const declare = candidate.declareInputs ?? candidate.inputs;

  return definePlugin({
    name,
    version: typeof version === 'string' ? version : undefined,
    description: typeof description === 'string' ? description : undefined,
    multipliers: (input) => contribute.call(candidate, input),
    inputs: typeof declare === 'function' ? () => declare.call(candidate) : undefined,
  });
}

function pickExport(module_exports: unknown, source: string): unknown {
  if (!isRecord(module_exports)) {
    throw new PluginRegistrationError(`${source} did not load as a module`);
  }
  if (typeof module_exports.registerPlugin === 'function') {
    return module_exports.registerPlugin();
  }
  return module_exports.plugin ?? module_exports.default;
}

/**
 * Import a plugin module and register its plugin. Returns the registered name.
 */
export async function loadPluginModule(
  module_path: string,
  registry: PluginRegistry
): Promise<string> {
  const absolute_path = resolve(module_path);
  const module_exports: unknown = await import(pathToFileURL(absolute_path).href);

  const plugin = toPlugin(pickExport(module_exports, absolute_path), absolute_path);
  registry.register(plugin);

  logger.info({ plugin: plugin.name, path: absolute_path }, 'Plugin module loaded');
  return plugin.name;
}

export async function loadPluginModules(
  module_paths: string[],
  registry: PluginRegistry
): Promise<string[]> {
  const names: string[] = [];
  for (const module_path of module_paths) {
    names.push(await loadPluginModule(module_path, registry));
  }
  return names;
}
