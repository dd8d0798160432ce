/**
 * Event-free-years estimation from an absolute-risk delta
 */

import { AVERAGE_EVENT_AGE, ENGINE_DEFAULTS } from '../config/defaults.js';
import { DomainMismatchError } from '../domain/errors.js';
import type { Domain, DomainRisk } from '../domain/types.js';

/**
 * Years over which an avoided event is counted as event-free: the time left to the
 * horizon, less the part of it before the domain's typical event age.
 */
export function eventFreeWindow(
  domain: Domain,
  age: number,
  horizon_age: number = ENGINE_DEFAULTS.HORIZON_AGE
): number {
  const avg_event_age = AVERAGE_EVENT_AGE[domain] ?? ENGINE_DEFAULTS.DEFAULT_EVENT_AGE;
  const horizon_remaining = Math.max(0, horizon_age - age);
  const event_age_offset = Math.max(0, avg_event_age - age);
  return Math.max(0, horizon_remaining - event_age_offset);
}

/**
 * Years gained for an absolute risk reduction (negative for a risk increase)
 */
export function eventFreeYearsFromDelta(
  domain: Domain,
  absolute_risk_reduction: number,
  age: number,
  horizon_age: number = ENGINE_DEFAULTS.HORIZON_AGE
): number {
  return absolute_risk_reduction * eventFreeWindow(domain, age, horizon_age);
}

/**
 * Expected event-free years gained by moving from `reference` to `scenario`.
 * estimate(a, b) === -estimate(b, a).
 */
export function estimateEventFreeYears(
  reference: DomainRisk,
  scenario: DomainRisk,
  age: number,
  horizon_age: number = ENGINE_DEFAULTS.HORIZON_AGE
): number {
  if (reference.domain !== scenario.domain) {
    throw new DomainMismatchError(reference.domain, scenario.domain);
  }
  return eventFreeYearsFromDelta(
    reference.domain,
    reference.absoluteRisk - scenario.absoluteRisk,
    age,
    horizon_age
  );
}
