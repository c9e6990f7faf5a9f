/**
 * Per-file compliance classification.
 */
export type Verdict = 'READY' | 'ADJUST' | 'ERROR';

/**
 * Issue tags in the order they are reported.
 */
export const ISSUE_TAGS = ['ANALYSIS ERROR', 'LUFS HIGH', 'LUFS LOW', 'TRUE PEAK HOT', 'SAMPLE RATE CHECK'] as const;

export type IssueTag = (typeof ISSUE_TAGS)[number];

/**
 * Container and first-audio-stream facts reported by the prober. Every field is null when the
 * probe failed or the container does not expose it.
 */
export interface StreamFacts {
  /** Container duration in seconds. */
  durationSeconds: number | null;
  /** Sample rate in Hz. */
  sampleRate: number | null;
  /** Bits per sample (falls back to bits per raw sample). */
  bitDepth: number | null;
  /** Channel count. */
  channels: number | null;
  /** Codec identifier, e.g. `pcm_s24le` or `flac`. */
  codec: string | null;
  /** Stream bitrate in kbit/s, falling back to the container bitrate. */
  bitrateKbps: number | null;
}

/**
 * Values scraped from the loudnorm analysis pass.
 */
export interface LoudnessFacts {
  /** Integrated loudness in LUFS. */
  integratedLufs: number | null;
  /** True peak in dBTP. */
  truePeakDbtp: number | null;
  /** Loudness range in LU. */
  loudnessRangeLu: number | null;
}

/**
 * Result of classifying one file's measurements.
 */
export interface Classification {
  verdict: Verdict;
  issues: readonly IssueTag[];
  /** Gain (dB) that would bring the file onto the target, rounded to 2 decimals. */
  suggestedGainDb: number | null;
}

/**
 * One row of the report. Built once per file and never mutated afterwards.
 */
export interface MeasurementRecord {
  readonly fileName: string;
  readonly absolutePath: string;
  readonly stream: Readonly<StreamFacts>;
  readonly loudness: Readonly<LoudnessFacts>;
  /** Highest sample peak in dBFS. */
  readonly samplePeakDbfs: number | null;
  readonly suggestedGainDb: number | null;
  readonly verdict: Verdict;
  readonly issues: readonly IssueTag[];
}

/**
 * Thresholds and behaviour switches for a run.
 */
export interface AnalysisSettings {
  /** Integrated loudness target in LUFS. */
  targetLufs: number;
  /** Half-width of the accepted loudness window in LU. */
  toleranceLu: number;
  /** Highest accepted true peak in dBTP. */
  truePeakCeilingDbtp: number;
  /** LRA target handed to the loudnorm filter. */
  loudnessRangeTarget: number;
  /** Sample rates (Hz) that pass the sample-rate check. */
  allowedSampleRates: number[];
  /** Lower-case file extensions including the leading dot. */
  extensions: string[];
  /** Walk directories recursively. */
  recursive: boolean;
  /** Per-invocation timeout for the external tools, in milliseconds. */
  timeoutMs: number;
  /** Number of files analysed at the same time. */
  concurrency: number;
  /** Write debug dumps when loudness extraction fails. */
  debugDumps: boolean;
}

/**
 * Aggregate figures for a finished run.
 */
export interface RunSummary {
  fileCount: number;
  ready: number;
  adjust: number;
  error: number;
  /** Mean integrated loudness over the files where it is known. */
  averageIntegratedLufs: number | null;
  /** Mean loudness range over the files where it is known. */
  averageLoudnessRangeLu: number | null;
}

/**
 * Persisted record of a previous run.
 */
export interface RunHistoryEntry {
  id: number;
  /** Epoch milliseconds. */
  startedAt: number;
  /** Epoch milliseconds. */
  finishedAt: number;
  summary: RunSummary;
  csvPath: string;
  htmlPath: string;
  settings: AnalysisSettings;
}

/** Records an input path that could not be expanded into audio files. */
export interface DiscoveryFailureEntry {
  /** Absolute path of the problematic entry. */
  path: string;
  /** Human-readable message explaining the failure. */
  message: string;
}

/** Files found for a run, plus the inputs that could not be read. */
export interface DiscoveryResult {
  files: string[];
  failures: DiscoveryFailureEntry[];
}
