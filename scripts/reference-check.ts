#!/usr/bin/env tsx
/**
 * Reference scenario check
 *
 * Runs every scenario under scenarios/ (or the directory given as the first argument)
 * against the presets on disk and compares category and absolute risks with the stored
 * expectations. Exits non-zero on any failure.
 *
 * Usage:
 *   npm run check:reference
 *   npm run check:reference -- path/to/scenarios
 */

import dotenv from 'dotenv';
dotenv.config();
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'warn';

import type { ReferenceResult } from '../src/pipeline/scenarios.js';

function printResults(results: ReferenceResult[]): void {
  console.log('\n' + '='.repeat(80));
  console.log('REFERENCE SCENARIO CHECK');
  console.log('='.repeat(80));

  for (const result of results) {
    const ascvd = result.calculation?.record.domains['ascvd'];
    const detail = ascvd ? `ascvd ${(ascvd.absoluteRisk * 100).toFixed(2)}%` : '';
    console.log(
      `${result.status.padEnd(6)} ${result.name.padEnd(32)} ${(result.calculation?.record.category ?? '-').padEnd(12)} ${detail}`
    );
    for (const failure of result.failures) {
      console.log(`         - ${failure}`);
    }
    if (result.error) {
      console.log(`         ! ${result.error}`);
    }
  }

  const passed = results.filter((r) => r.status === 'PASS').length;
  console.log('-'.repeat(80));
  console.log(`${passed}/${results.length} scenarios passed`);
  console.log('='.repeat(80) + '\n');
}

async function main(): Promise<void> {
  // Loaded after LOG_LEVEL is set so the engine's loggers pick it up
  const { loadReferenceScenarios, checkReferenceScenario } = await import('../src/pipeline/scenarios.js');

  const dir = process.argv[2];
  const scenarios = loadReferenceScenarios(dir);
  if (scenarios.length === 0) {
    console.error('No reference scenarios found');
    process.exit(1);
  }

  const results = scenarios.map((scenario) => checkReferenceScenario(scenario));
  printResults(results);

  process.exit(results.every((r) => r.status === 'PASS') ? 0 : 1);
}

main().catch((error: unknown) => {
  console.error('Reference check failed:', error);
  process.exit(1);
});
