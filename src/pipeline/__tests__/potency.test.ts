/**
 * Unit tests for potency normalization
 */

import { describe, it, expect } from 'vitest';
import {
  buildCompoundTable,
  getPotencyFactor,
  isOral17aa,
  normalizeDose,
  normalizeRegimen,
} from '../potency.js';
import { RiskEngineError, UnknownCompoundError } from '../../domain/errors.js';
import { dose, highRiskStack } from './fixtures.js';

describe('getPotencyFactor', () => {
  it('returns 1.0 for the reference compound', () => {
    expect(getPotencyFactor('testosterone')).toBe(1);
  });

  it('resolves display names to canonical keys', () => {
    expect(getPotencyFactor('Testosterone Enanthate')).toBe(1);
    expect(getPotencyFactor('Trenbolone Acetate')).toBe(2);
  });

  it('throws UnknownCompoundError naming the compound', () => {
    let caught: unknown;
    try {
      getPotencyFactor('mystery_compound');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(UnknownCompoundError);
    expect(caught).toBeInstanceOf(RiskEngineError);
    if (caught instanceof UnknownCompoundError) {
      expect(caught.code).toBe('UNKNOWN_COMPOUND');
      expect(caught.compound).toBe('mystery_compound');
      expect(caught.message).toContain('"mystery_compound"');
    }
  });
});

describe('normalizeDose', () => {
  it('multiplies weekly mass by the table potency', () => {
    const normalized = normalizeDose(dose('trenbolone', 300, 16));
    expect(normalized.compound_key).toBe('trenbolone');
    expect(normalized.potency).toBe(2);
    expect(normalized.weekly_equivalent_mg).toBe(600);
  });

  it('uses potencyOverride for compounds missing from the table', () => {
    const normalized = normalizeDose(dose('research_compound', 100, 8, { potencyOverride: 1.5 }));
    expect(normalized.potency).toBe(1.5);
    expect(normalized.weekly_equivalent_mg).toBe(150);
  });

  it('lets potencyOverride win over the table', () => {
    const normalized = normalizeDose(dose('trenbolone', 300, 16, { potencyOverride: 1.5 }));
    expect(normalized.weekly_equivalent_mg).toBe(450);
  });

  it('normalizes every dose of a regimen', () => {
    const normalized = normalizeRegimen(highRiskStack());
    expect(normalized.map((d) => d.weekly_equivalent_mg)).toEqual([500, 600, 525]);
  });
});

describe('buildCompoundTable', () => {
  const classes = { oral_17aa: [], dht_derived: [], heavy: [] };

  it('requires the reference compound to have potency 1.0', () => {
    const build = () =>
      buildCompoundTable({ reference: 'testosterone', potency: { testosterone: 2 }, classes });
    expect(build).toThrow(RiskEngineError);
    expect(build).toThrow('must have a potency factor of exactly 1.0');
  });

  it('rejects non-positive potency factors', () => {
    expect(() =>
      buildCompoundTable({
        reference: 'testosterone',
        potency: { testosterone: 1, inert: 0 },
        classes,
      })
    ).toThrow('potency.inert');
  });

  it('builds class sets from canonical keys', () => {
    const table = buildCompoundTable({
      reference: 'Testosterone',
      potency: { Testosterone: 1, 'Oral X': 1.2 },
      classes: { ...classes, oral_17aa: ['Oral X'] },
    });
    expect(table.reference).toBe('testosterone');
    expect(isOral17aa('oral_x', table)).toBe(true);
    expect(isOral17aa('testosterone', table)).toBe(false);
  });
});
