#!/usr/bin/env node

/**
 * CLI entry point for the lifetime risk engine
 */

import { config } from 'dotenv';
import { Command } from 'commander';
import { parseRiskInput, createCalculationContext, calculateRisk, recordHash } from '../pipeline/run.js';
import { compareScenarios } from '../pipeline/impact.js';
import { getStore } from '../pipeline/coefficients.js';
import { loadReferenceScenarios, checkReferenceScenario } from '../pipeline/scenarios.js';
import { formatComparisonReport, formatRiskReport, printLines } from '../pipeline/report.js';
import { createPluginRegistry } from '../plugins/index.js';
import { readJson, writeJson } from '../utils/io.js';
import { createLogger } from '../utils/log.js';
import { MODEL_VERSION } from '../config/defaults.js';
import type { RiskInput } from '../domain/types.js';

config();

const logger = createLogger('cli');
const program = new Command();

interface CalculationOptions {
  preset?: string;
  plugin: string[];
  output?: string;
  json?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function fail(command: string, error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ command, error: message }, 'Command failed');
  console.error(`\n✗ ${message}\n`);
  process.exit(1);
}

async function readInput(file_path: string, preset?: string): Promise<RiskInput> {
  const input = parseRiskInput(await readJson(file_path));
  return preset ? { ...input, preset } : input;
}

program
  .name('risk-engine')
  .description('Lifetime health-risk estimation for exogenous hormone exposure')
  .version(MODEL_VERSION);

// Calculate command
program
  .command('calculate')
  .description('Calculate lifetime risk for one input record')
  .argument('<input>', 'Path to an input record (JSON)')
  .option('--preset <name>', 'Coefficient preset (overrides the input record)')
  .option('--plugin <path>', 'Plugin module to load (repeatable)', collect, [])
  .option('--output <file>', 'Write the calculation as JSON')
  .option('--json', 'Print JSON instead of the report')
  .action(async (input_path: string, options: CalculationOptions) => {
    try {
      const input = await readInput(input_path, options.preset);
      const plugins = await createPluginRegistry(options.plugin);
      const context = createCalculationContext(input.preset, { plugins });
      const calculation = calculateRisk(input, context);
      const hash = recordHash(calculation.record);

      if (options.output) {
        await writeJson(options.output, { hash, ...calculation });
        console.log(`\n✓ Calculation written to ${options.output}`);
      }

      if (options.json) {
        console.log(JSON.stringify({ hash, ...calculation }, null, 2));
      } else {
        printLines(formatRiskReport(calculation, hash));
      }
    } catch (error) {
      fail('calculate', error);
    }
  });

// Compare command
program
  .command('compare')
  .description('Compare a base scenario with an alternative (e.g. with interventions)')
  .argument('<base>', 'Path to the base input record (JSON)')
  .argument('<alternative>', 'Path to the alternative input record (JSON)')
  .option('--preset <name>', 'Coefficient preset for both scenarios')
  .option('--plugin <path>', 'Plugin module to load (repeatable)', collect, [])
  .option('--output <file>', 'Write the comparison as JSON')
  .option('--json', 'Print JSON instead of the report')
  .action(async (base_path: string, alternative_path: string, options: CalculationOptions) => {
    try {
      const base_input = await readInput(base_path, options.preset);
      const alternative_input = await readInput(alternative_path, options.preset);
      const plugins = await createPluginRegistry(options.plugin);

      const base = calculateRisk(base_input, createCalculationContext(base_input.preset, { plugins }));
      const alternative = calculateRisk(
        alternative_input,
        createCalculationContext(alternative_input.preset, { plugins })
      );
      const comparison = compareScenarios(base, alternative, base_input.demographics.age);

      if (options.output) {
        await writeJson(options.output, comparison);
        console.log(`\n✓ Comparison written to ${options.output}`);
      }

      if (options.json) {
        console.log(JSON.stringify(comparison, null, 2));
      } else {
        printLines(formatComparisonReport(comparison));
      }
    } catch (error) {
      fail('compare', error);
    }
  });

// Presets command
program
  .command('presets')
  .description('List and validate the available coefficient presets')
  .action(() => {
    try {
      const store = getStore();
      const presets = store.loadAll();

      console.log(`\nPresets in ${store.directory}:`);
      for (const preset of presets) {
        const domains = Object.keys(preset.baseline).length;
        const keys = Object.keys(preset.multipliers).length;
        console.log(`  ${preset.name} (v${preset.version}): ${domains} domains, ${keys} multiplier keys`);
        if (preset.description) {
          console.log(`    ${preset.description}`);
        }
      }
      console.log();
    } catch (error) {
      fail('presets', error);
    }
  });

// Reference command
program
  .command('reference')
  .description('Run the reference scenarios and check their expected values')
  .option('--dir <dir>', 'Directory of reference scenarios')
  .action((options: { dir?: string }) => {
    try {
      const scenarios = loadReferenceScenarios(options.dir);
      const results = scenarios.map((scenario) => checkReferenceScenario(scenario));

      console.log('\nREFERENCE SCENARIOS:');
      for (const result of results) {
        const symbol = result.status === 'PASS' ? '✓' : '✗';
        console.log(`  ${symbol} ${result.name}: ${result.status}${result.hash ? ` (${result.hash.slice(0, 12)})` : ''}`);
        for (const failure of result.failures) {
          console.log(`      ${failure}`);
        }
        if (result.error) {
          console.log(`      ${result.error}`);
        }
      }
      console.log();

      if (results.some((result) => result.status !== 'PASS')) {
        process.exit(1);
      }
    } catch (error) {
      fail('reference', error);
    }
  });

// Plugins command
program
  .command('plugins')
  .description('List registered plugins and their declared inputs')
  .option('--plugin <path>', 'Plugin module to load (repeatable)', collect, [])
  .action(async (options: { plugin: string[] }) => {
    try {
      const registry = await createPluginRegistry(options.plugin);
      const inputs = registry.declaredInputs();

      console.log('\nPlugins:');
      for (const plugin of registry.list()) {
        console.log(`  ${plugin.name} (v${plugin.version}): ${plugin.description}`);
        for (const [field, definition] of Object.entries(inputs[plugin.name] ?? {})) {
          console.log(`    pluginInputs.${plugin.name}.${field} [${definition.type}] ${definition.label}`);
        }
      }
      console.log();
    } catch (error) {
      fail('plugins', error);
    }
  });

program.parseAsync().catch((error: unknown) => fail('cli', error));
