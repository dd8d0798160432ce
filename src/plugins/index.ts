/**
 * Built-in plugins and registry construction for the CLI and API
 */

import { PluginRegistry } from '../pipeline/plugins.js';
import { fertilityPlugin } from './fertility.js';
import { loadPluginModules } from './loader.js';

export { fertilityPlugin, FERTILITY_PLUGIN_NAME } from './fertility.js';
export { loadPluginModule, loadPluginModules } from './loader.js';

export const BUILTIN_PLUGINS = [fertilityPlugin];

/**
 * Registry with the built-in plugins plus any plugin modules, sealed
 */
export async function createPluginRegistry(module_paths: string[] = []): Promise<PluginRegistry> {
  const registry = new PluginRegistry();
  for (const plugin of BUILTIN_PLUGINS) {
    registry.register(plugin);
  }
  await loadPluginModules(module_paths, registry);
  return registry.seal();
}
