import type { AnalysisSettings } from '../../shared/models';
import {
  analysisSettingsSchema,
  DEFAULT_SETTINGS,
  SETTINGS_KEYS,
  settingsOverrideSchema,
  type SettingsOverride
} from '../../shared/settings';
import { DatabaseService } from './DatabaseService';

/**
 * Overlays each layer's defined values onto the defaults, later layers winning, and validates
 * the result. Throws when the merged settings do not validate.
 */
export function resolveSettings(layers: readonly SettingsOverride[]): AnalysisSettings {
  const merged: Record<string, unknown> = { ...DEFAULT_SETTINGS };
  for (const layer of layers) {
    for (const key of SETTINGS_KEYS) {
      if (layer[key] !== undefined) {
        merged[key] = layer[key];
      }
    }
  }
  return analysisSettingsSchema.parse(merged);
}

/**
 * Layers defaults, persisted settings and command line overrides into the effective settings.
 */
export class SettingsService {
  public constructor(private readonly database: DatabaseService) {}

  /**
   * Reads the persisted overrides. Stored values that no longer validate are skipped with a warning.
   */
  public getStoredOverrides(): SettingsOverride {
    const stored = this.database.getSettings();
    const overrides: SettingsOverride = {};
    for (const key of SETTINGS_KEYS) {
      if (!stored.has(key)) {
        continue;
      }
      const candidate = settingsOverrideSchema.safeParse({ [key]: stored.get(key) });
      if (candidate.success) {
        Object.assign(overrides, candidate.data);
      } else {
        // eslint-disable-next-line no-console -- Invalid stored values fall back to the defaults.
        console.warn(`Ignoring invalid stored setting "${key}"`);
      }
    }
    return overrides;
  }

  /**
   * Effective settings for a run: defaults, then stored overrides, then `overrides`.
   * Throws when the merged result does not validate.
   */
  public resolve(overrides: SettingsOverride = {}): AnalysisSettings {
    return resolveSettings([this.getStoredOverrides(), overrides]);
  }

  /**
   * Persists the given overrides so later runs pick them up.
   */
  public save(overrides: SettingsOverride): AnalysisSettings {
    const validated = settingsOverrideSchema.parse(overrides);
    for (const key of SETTINGS_KEYS) {
      const value = validated[key];
      if (value !== undefined) {
        this.database.setSetting(key, value);
      }
    }
    return this.resolve();
  }

  /**
   * Removes every persisted override.
   */
  public reset(): number {
    return this.database.clearSettings();
  }
}
