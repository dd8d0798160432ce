/**
 * Reference scenarios: stored inputs with expected outputs, used for regression checks
 */

import { join } from 'path';
import { z } from 'zod';
import { getScenariosDir } from '../config/defaults.js';
import { RiskEngineError } from '../domain/errors.js';
import { listFilesSync, readJsonSync } from '../utils/io.js';
import { createLogger } from '../utils/log.js';
import { formatZodIssues } from './validation.js';
import { calculate, recordHash, type ContextOptions } from './run.js';
import type { RiskCalculation } from '../domain/types.js';

const logger = createLogger('scenarios');

export const ReferenceScenarioSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  input: z.record(z.unknown()),
  expected: z.object({
    category: z.enum(['physiologic', 'moderate', 'high-risk']).optional(),
    absoluteRisk: z.record(z.number()).default({}),
    tolerance: z.number().positive().default(1e-6),
  }),
});

export type ReferenceScenario = z.infer<typeof ReferenceScenarioSchema>;

export type ReferenceStatus = 'PASS' | 'FAIL' | 'ERROR';

export interface ReferenceResult {
  name: string;
  status: ReferenceStatus;
  failures: string[];
  hash?: string;
  calculation?: RiskCalculation;
  error?: string;
}

export function parseReferenceScenario(raw: unknown, source: string): ReferenceScenario {
  const parsed = ReferenceScenarioSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RiskEngineError(
      'INVALID_INPUT',
      `Invalid reference scenario ${source}:\n` +
        formatZodIssues(parsed.error).map((i) => `  - ${i}`).join('\n')
    );
  }
  return parsed.data;
}

export function loadReferenceScenarios(dir: string = getScenariosDir()): ReferenceScenario[] {
  const files = listFilesSync(dir)
    .filter((file) => file.endsWith('.json'))
    .sort();

  const scenarios = files.map((file) => {
    const file_path = join(dir, file);
    return parseReferenceScenario(readJsonSync(file_path), file_path);
  });

  logger.debug({ dir, count: scenarios.length }, 'Reference scenarios loaded');
  return scenarios;
}

/**
 * Compare a calculation against a scenario's expectations
 */
export function findDiscrepancies(
  scenario: ReferenceScenario,
  calculation: RiskCalculation
): string[] {
  const failures: string[] = [];
  const { expected } = scenario;

  if (expected.category && calculation.record.category !== expected.category) {
    failures.push(`category: expected ${expected.category}, got ${calculation.record.category}`);
  }

  for (const [domain, expected_risk] of Object.entries(expected.absoluteRisk)) {
    const actual = calculation.record.domains[domain];
    if (!actual) {
      failures.push(`${domain}: domain missing from record`);
      continue;
    }
    if (Math.abs(actual.absoluteRisk - expected_risk) > expected.tolerance) {
      failures.push(`${domain}: expected ${expected_risk}, got ${actual.absoluteRisk}`);
    }
  }

  return failures;
}

export function checkReferenceScenario(
  scenario: ReferenceScenario,
  options: ContextOptions = {}
): ReferenceResult {
  try {
    const calculation = calculate(scenario.input, options);
    const failures = findDiscrepancies(scenario, calculation);
    return {
      name: scenario.name,
      status: failures.length === 0 ? 'PASS' : 'FAIL',
      failures,
      hash: recordHash(calculation.record),
      calculation,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ scenario: scenario.name, error: message }, 'Reference scenario failed to run');
    return { name: scenario.name, status: 'ERROR', failures: [], error: message };
  }
}
