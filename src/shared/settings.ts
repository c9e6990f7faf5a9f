import { z } from 'zod';
import type { AnalysisSettings } from './models';

/** Settings used when neither the database nor the command line override them. */
export const DEFAULT_SETTINGS: AnalysisSettings = {
  targetLufs: -14,
  toleranceLu: 1,
  truePeakCeilingDbtp: -1,
  loudnessRangeTarget: 8,
  allowedSampleRates: [44100, 48000],
  extensions: ['.wav', '.wave', '.flac', '.mp3', '.aif', '.aiff', '.m4a', '.aac', '.ogg', '.opus'],
  recursive: true,
  timeoutMs: 600_000,
  concurrency: 1,
  debugDumps: true
};

const extensionSchema = z
  .string()
  .trim()
  .min(1)
  .transform((value) => (value.startsWith('.') ? value : `.${value}`).toLowerCase());

/**
 * Full validation schema for a settings snapshot.
 */
export const analysisSettingsSchema = z.object({
  targetLufs: z.number().finite().max(0),
  toleranceLu: z.number().finite().nonnegative(),
  truePeakCeilingDbtp: z.number().finite().max(0),
  loudnessRangeTarget: z.number().finite().min(1).max(50),
  allowedSampleRates: z.array(z.number().int().positive()).min(1),
  extensions: z.array(extensionSchema).min(1),
  recursive: z.boolean(),
  timeoutMs: z.number().int().positive(),
  concurrency: z.number().int().min(1).max(64),
  debugDumps: z.boolean()
});

/** Schema for a partial overlay (persisted values or command line flags). */
export const settingsOverrideSchema = analysisSettingsSchema.partial();

export type SettingsOverride = z.infer<typeof settingsOverrideSchema>;

/** Keys that may be persisted and overridden. */
export const SETTINGS_KEYS = [
  'targetLufs',
  'toleranceLu',
  'truePeakCeilingDbtp',
  'loudnessRangeTarget',
  'allowedSampleRates',
  'extensions',
  'recursive',
  'timeoutMs',
  'concurrency',
  'debugDumps'
] as const satisfies ReadonlyArray<keyof AnalysisSettings>;

export type SettingsKey = (typeof SETTINGS_KEYS)[number];
