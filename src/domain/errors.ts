/**
 * Error taxonomy for the risk engine
 *
 * Configuration errors (UnknownPreset, InvalidCoefficient) abort a calculation before any
 * domain is computed. Input errors (UnknownCompound, InvalidInput) abort only the scenario
 * that carried them. Plugin failures and risk saturation are reported as data, never thrown.
 */

export type RiskEngineErrorCode =
  | 'UNKNOWN_COMPOUND'
  | 'UNKNOWN_PRESET'
  | 'INVALID_COEFFICIENT'
  | 'INVALID_INPUT'
  | 'DOMAIN_MISMATCH'
  | 'PLUGIN_REGISTRATION';

export class RiskEngineError extends Error {
  readonly code: RiskEngineErrorCode;

  constructor(code: RiskEngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownCompoundError extends RiskEngineError {
  readonly compound: string;

  constructor(compound: string) {
    super(
      'UNKNOWN_COMPOUND',
      `Unknown compound "${compound}". Supply potencyOverride to use a custom compound.`
    );
    this.compound = compound;
  }
}

export class UnknownPresetError extends RiskEngineError {
  readonly preset: string;
  readonly available: string[];

  constructor(preset: string, available: string[]) {
    super(
      'UNKNOWN_PRESET',
      `Unknown preset "${preset}". Available presets: ${available.length > 0 ? available.join(', ') : 'none'}`
    );
    this.preset = preset;
    this.available = available;
  }
}

export class InvalidCoefficientError extends RiskEngineError {
  readonly preset: string;
  readonly problems: string[];

  constructor(preset: string, problems: string[]) {
    super(
      'INVALID_COEFFICIENT',
      `Invalid coefficients in preset "${preset}":\n` + problems.map((p) => `  - ${p}`).join('\n')
    );
    this.preset = preset;
    this.problems = problems;
  }
}

export class InvalidInputError extends RiskEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_INPUT', `Invalid input record:\n` + issues.map((i) => `  - ${i}`).join('\n'));
    this.issues = issues;
  }
}

export class DomainMismatchError extends RiskEngineError {
  constructor(expected: string, actual: string) {
    super('DOMAIN_MISMATCH', `Cannot compare domain "${expected}" with domain "${actual}"`);
  }
}

export class PluginRegistrationError extends RiskEngineError {
  constructor(message: string) {
    super('PLUGIN_REGISTRATION', message);
  }
}
