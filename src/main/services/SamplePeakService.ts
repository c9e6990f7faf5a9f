import path from 'node:path';
import { errorMessage, roundTo } from '../../shared/format';
import type { MediaToolRunner } from './MediaToolService';

/** Metadata key printed by `ametadata` for the running overall peak. */
export const OVERALL_PEAK_KEY = 'lavfi.astats.Overall.Peak_level';

const PEAK_LINE_PATTERN = /lavfi\.astats\.Overall\.Peak_level=(\S+)/;

/**
 * Builds the ffmpeg argument list for a non-resetting astats pass printing the overall peak.
 */
export function buildSamplePeakArgs(filePath: string): string[] {
  const filter = `astats=metadata=1:reset=0,ametadata=print:key=${OVERALL_PEAK_KEY}`;
  return ['-hide_banner', '-nostats', '-i', filePath, '-af', filter, '-f', 'null', '-'];
}

/**
 * Collects every finite overall peak value in the output, in order of appearance.
 * `-inf` (digital silence) is skipped.
 */
export function collectPeakLevels(lines: readonly string[]): number[] {
  const values: number[] = [];
  for (const line of lines) {
    const match = PEAK_LINE_PATTERN.exec(line);
    if (!match) {
      continue;
    }
    const value = Number(match[1]);
    if (Number.isFinite(value)) {
      values.push(value);
    }
  }
  return values;
}

/**
 * Highest observed peak rounded to 2 decimals, or null when nothing was observed.
 */
export function maxPeakLevel(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  // One value per audio frame; spreading a long file's values into Math.max overflows the stack.
  const highest = values.reduce((current, value) => (value > current ? value : current), -Infinity);
  return roundTo(highest, 2);
}

/**
 * Measures the sample peak (dBFS) with ffmpeg's astats filter.
 */
export class SamplePeakService {
  public constructor(private readonly tools: MediaToolRunner) {}

  /**
   * Never throws; returns null when no peak value could be scraped.
   */
  public async measure(filePath: string): Promise<number | null> {
    try {
      const result = await this.tools.run('ffmpeg', buildSamplePeakArgs(filePath));
      const peak = maxPeakLevel(collectPeakLevels(result.output));
      if (peak === null) {
        // eslint-disable-next-line no-console -- Surface extraction failures next to the progress output.
        console.warn(`Sample peak analysis found no values for ${path.basename(filePath)}`);
      }
      return peak;
    } catch (error) {
      // eslint-disable-next-line no-console -- Surface extraction failures next to the progress output.
      console.warn(`Sample peak analysis failed for ${filePath}:`, errorMessage(error));
      return null;
    }
  }
}
