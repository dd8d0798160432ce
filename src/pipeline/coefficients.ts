/**
 * Coefficient Store: named, versioned presets loaded once and cached for the process lifetime
 */

import { join } from 'path';
import { getPresetsDir } from '../config/defaults.js';
import { isSafeIdentifier, presetFileName, presetNameFromFile } from '../domain/ids.js';
import { PresetFileSchema } from '../domain/schemas.js';
import { InvalidCoefficientError, UnknownPresetError } from '../domain/errors.js';
import { fileExistsSync, listFilesSync, readJsonSync } from '../utils/io.js';
import { createLogger } from '../utils/log.js';
import { formatZodIssues, throwIfInvalid, validatePreset } from './validation.js';
import type { DomainValues, Preset } from '../domain/types.js';

const logger = createLogger('coefficients');

function freezeValues(values: Record<string, number>): DomainValues {
  return Object.freeze({ ...values });
}

/**
 * Parse and validate raw preset data. Throws InvalidCoefficientError on any problem,
 * so a calculation never runs against a partially valid table.
 */
export function parsePreset(preset_name: string, raw: unknown): Preset {
  const parsed = PresetFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidCoefficientError(preset_name, formatZodIssues(parsed.error));
  }

  const validation = validatePreset(parsed.data);
  throwIfInvalid(validation, `preset:${preset_name}`, (errors) =>
    new InvalidCoefficientError(preset_name, errors)
  );

  const multipliers: Record<string, DomainValues> = {};
  for (const [key, values] of Object.entries(parsed.data.multipliers)) {
    multipliers[key] = freezeValues(values);
  }

  return Object.freeze({
    name: parsed.data.name,
    version: parsed.data.version,
    description: parsed.data.description,
    baseline: freezeValues(parsed.data.baseline),
    multipliers: Object.freeze(multipliers),
  });
}

export class CoefficientStore {
  private readonly presets_dir: string;
  private readonly cache = new Map<string, Preset>();

  constructor(presets_dir: string = getPresetsDir()) {
    this.presets_dir = presets_dir;
  }

  public get directory(): string {
    return this.presets_dir;
  }

  /**
   * Preset names available on disk, sorted
   */
  public list(): string[] {
    return listFilesSync(this.presets_dir)
      .map(presetNameFromFile)
      .filter((name): name is string => name !== null)
      .sort();
  }

  public load(preset_name: string): Preset {
    const name = preset_name.trim().toLowerCase();

    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    const file_path = join(this.presets_dir, presetFileName(name));
    if (!isSafeIdentifier(name) || !fileExistsSync(file_path)) {
      throw new UnknownPresetError(preset_name, this.list());
    }

    let raw: unknown;
    try {
      raw = readJsonSync(file_path);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidCoefficientError(name, [`could not parse ${file_path}: ${message}`]);
    }

    const preset = parsePreset(name, raw);
    if (preset.name !== name) {
      throw new InvalidCoefficientError(name, [
        `file declares name "${preset.name}" but is stored as "${presetFileName(name)}"`,
      ]);
    }

    this.cache.set(name, preset);
    logger.info(
      {
        preset: name,
        version: preset.version,
        domains: Object.keys(preset.baseline).length,
        keys: Object.keys(preset.multipliers).length,
      },
      'Preset loaded'
    );

    return preset;
  }

  /**
   * Load every available preset up front; surfaces configuration errors at startup
   */
  public loadAll(): Preset[] {
    return this.list().map((name) => this.load(name));
  }
}

// Global store instance
let globalStore: CoefficientStore | null = null;

export function getStore(): CoefficientStore {
  if (!globalStore) {
    globalStore = new CoefficientStore();
  }
  return globalStore;
}
