/**
 * Potency normalization: compound weekly mass -> weekly testosterone-equivalent (WTE)
 */

import { join } from 'path';
import { getDataDir } from '../config/defaults.js';
import { sanitizeKey } from '../domain/ids.js';
import { CompoundTableSchema } from '../domain/schemas.js';
import { UnknownCompoundError, RiskEngineError } from '../domain/errors.js';
import { readJsonSync } from '../utils/io.js';
import { createLogger } from '../utils/log.js';
import { formatZodIssues } from './validation.js';
import type { CompoundDose, NormalizedDose } from '../domain/types.js';

const logger = createLogger('potency');

export interface CompoundTable {
  reference: string;
  potency: ReadonlyMap<string, number>;
  oral17aa: ReadonlySet<string>;
  dhtDerived: ReadonlySet<string>;
  heavy: ReadonlySet<string>;
}

export function buildCompoundTable(raw: unknown): CompoundTable {
  const parsed = CompoundTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RiskEngineError(
      'INVALID_INPUT',
      `Invalid compound table:\n${formatZodIssues(parsed.error).map((i) => `  - ${i}`).join('\n')}`
    );
  }

  const data = parsed.data;
  const potency = new Map<string, number>();
  for (const [compound, factor] of Object.entries(data.potency)) {
    potency.set(sanitizeKey(compound), factor);
  }

  const reference = sanitizeKey(data.reference);
  if (potency.get(reference) !== 1) {
    throw new RiskEngineError(
      'INVALID_INPUT',
      `Reference compound "${reference}" must have a potency factor of exactly 1.0`
    );
  }

  const toSet = (names: string[]) => new Set(names.map(sanitizeKey));

  return {
    reference,
    potency,
    oral17aa: toSet(data.classes.oral_17aa),
    dhtDerived: toSet(data.classes.dht_derived),
    heavy: toSet(data.classes.heavy),
  };
}

let defaultTable: CompoundTable | null = null;

export function getCompoundTable(): CompoundTable {
  if (!defaultTable) {
    const file_path = join(getDataDir(), 'compounds.json');
    defaultTable = buildCompoundTable(readJsonSync(file_path));
    logger.debug({ file_path, compounds: defaultTable.potency.size }, 'Compound table loaded');
  }
  return defaultTable;
}

export function getPotencyFactor(compound: string, table: CompoundTable = getCompoundTable()): number {
  const factor = table.potency.get(sanitizeKey(compound));
  if (factor === undefined) {
    throw new UnknownCompoundError(compound);
  }
  return factor;
}

/**
 * Normalize one dose. An explicit potencyOverride wins over the table, which is how
 * custom compounds enter a regimen.
 */
export function normalizeDose(
  dose: CompoundDose,
  table: CompoundTable = getCompoundTable()
): NormalizedDose {
  const compound_key = sanitizeKey(dose.compound);
  const potency = dose.potencyOverride ?? getPotencyFactor(compound_key, table);

  return {
    ...dose,
    compound_key,
    potency,
    weekly_equivalent_mg: dose.weeklyMg * potency,
  };
}

export function normalizeRegimen(
  doses: CompoundDose[],
  table: CompoundTable = getCompoundTable()
): NormalizedDose[] {
  return doses.map((dose) => normalizeDose(dose, table));
}

export function isOral17aa(compound_key: string, table: CompoundTable = getCompoundTable()): boolean {
  return table.oral17aa.has(compound_key);
}
