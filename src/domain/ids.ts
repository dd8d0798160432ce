/**
 * Utilities for stable, canonical identifiers
 */

/**
 * Canonical compound / preset / plugin key: "Testosterone Enanthate" -> "testosterone_enanthate"
 */
export function sanitizeKey(key: string): string {
  return key
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function isSafeIdentifier(name: string): boolean {
  return /^[a-z0-9][a-z0-9_-]*$/.test(name);
}

export function presetFileName(preset_name: string): string {
  return `coefficients_${preset_name}.json`;
}

export function presetNameFromFile(file_name: string): string | null {
  const match = /^coefficients_([a-z0-9][a-z0-9_-]*)\.json$/.exec(file_name);
  return match ? match[1] : null;
}
