import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { AnalysisSettings, LoudnessFacts } from '../../shared/models';
import { errorMessage, fileTimestamp, toFiniteNumber } from '../../shared/format';
import type { MediaToolRunner } from './MediaToolService';

/** Key that identifies the loudnorm JSON block in ffmpeg's log output. */
export const INTEGRATED_LOUDNESS_SIGNATURE = '"input_i"';

const measurementSchema = z.union([z.string(), z.number()]).transform(toFiniteNumber);

const loudnormPayloadSchema = z.object({
  input_i: measurementSchema,
  input_tp: measurementSchema,
  input_lra: measurementSchema
});

/**
 * Result of one extraction attempt. `span` holds the best-effort JSON text, when any was found.
 */
export interface LoudnessExtraction {
  facts: LoudnessFacts;
  ok: boolean;
  span: string | null;
}

export interface LoudnessServiceOptions {
  /** Directory receiving `debug/` dumps. */
  outputDir: string;
  /** Timestamp shared by every dump of the run. */
  runStartedAt: Date;
}

/**
 * Loudness facts with every field unknown.
 */
export function emptyLoudnessFacts(): LoudnessFacts {
  return { integratedLufs: null, truePeakDbtp: null, loudnessRangeLu: null };
}

/**
 * Builds the ffmpeg argument list for a loudnorm analysis pass that discards the decoded audio.
 */
export function buildLoudnormArgs(filePath: string, settings: AnalysisSettings): string[] {
  const filter =
    `loudnorm=I=${settings.targetLufs}:TP=${settings.truePeakCeilingDbtp}` +
    `:LRA=${settings.loudnessRangeTarget}:print_format=json`;
  return ['-hide_banner', '-nostats', '-i', filePath, '-af', filter, '-f', 'null', '-'];
}

/**
 * Locates the JSON object around the first line containing `signature`: the nearest line with
 * an opening brace at or above it, and the nearest line with a closing brace at or below it.
 * Returns the inclusive span, or null when any of the three lines is missing.
 */
export function extractJsonBlock(lines: readonly string[], signature: string): string | null {
  const anchor = lines.findIndex((line) => line.includes(signature));
  if (anchor === -1) {
    return null;
  }

  let start = -1;
  for (let index = anchor; index >= 0; index -= 1) {
    if (lines[index].includes('{')) {
      start = index;
      break;
    }
  }

  let end = -1;
  for (let index = anchor; index < lines.length; index += 1) {
    if (lines[index].includes('}')) {
      end = index;
      break;
    }
  }

  if (start === -1 || end === -1) {
    return null;
  }
  return lines.slice(start, end + 1).join('\n');
}

/**
 * Parses the loudnorm JSON span. Returns null on syntax errors or when a measurement key is
 * missing; values such as `-inf` become null facts.
 */
export function parseLoudnormPayload(span: string): LoudnessFacts | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(span);
  } catch {
    return null;
  }
  const result = loudnormPayloadSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  return {
    integratedLufs: result.data.input_i,
    truePeakDbtp: result.data.input_tp,
    loudnessRangeLu: result.data.input_lra
  };
}

/**
 * Scrapes the loudnorm measurement from a sequence of output lines.
 */
export function extractLoudness(lines: readonly string[]): LoudnessExtraction {
  const span = extractJsonBlock(lines, INTEGRATED_LOUDNESS_SIGNATURE);
  if (span === null) {
    return { facts: emptyLoudnessFacts(), ok: false, span: null };
  }
  const facts = parseLoudnormPayload(span);
  if (!facts) {
    return { facts: emptyLoudnessFacts(), ok: false, span };
  }
  return { facts, ok: true, span };
}

/**
 * Measures integrated loudness, true peak and loudness range with ffmpeg's loudnorm filter.
 */
export class LoudnessService {
  private dumpCount = 0;

  public constructor(
    private readonly tools: MediaToolRunner,
    private readonly settings: AnalysisSettings,
    private readonly options: LoudnessServiceOptions
  ) {}

  /**
   * Never throws. On failure all three facts are null and, when enabled, a debug dump is written.
   */
  public async measure(filePath: string): Promise<LoudnessFacts> {
    let lines: string[] = [];
    try {
      const result = await this.tools.run('ffmpeg', buildLoudnormArgs(filePath, this.settings));
      lines = result.output;
      if (result.timedOut) {
        lines = [...lines, `[loudness-qc] ffmpeg killed after ${this.settings.timeoutMs} ms`];
      }
    } catch (error) {
      lines = [`[loudness-qc] ffmpeg could not be started: ${errorMessage(error)}`];
    }

    const extraction = extractLoudness(lines);
    if (!extraction.ok) {
      // eslint-disable-next-line no-console -- Surface extraction failures next to the progress output.
      console.warn(`Loudness analysis failed for ${path.basename(filePath)}`);
      if (this.settings.debugDumps) {
        await this.writeDebugDump(filePath, lines, extraction.span);
      }
    }
    return extraction.facts;
  }

  /**
   * Persists the raw output and the extracted span for troubleshooting. Write errors are logged.
   * Each dump gets its own sequence number so files sharing a base name do not collide.
   */
  public async writeDebugDump(filePath: string, lines: readonly string[], span: string | null): Promise<string[]> {
    const debugDir = path.join(this.options.outputDir, 'debug');
    const baseName = path.parse(filePath).name;
    this.dumpCount += 1;
    const sequence = String(this.dumpCount).padStart(3, '0');
    const prefix = `${baseName}_${fileTimestamp(this.options.runStartedAt)}_${sequence}_loudnorm`;
    const written: string[] = [];
    try {
      await fs.mkdir(debugDir, { recursive: true });
      const rawPath = path.join(debugDir, `${prefix}_raw.txt`);
      await fs.writeFile(rawPath, `${lines.join('\n')}\n`, 'utf-8');
      written.push(rawPath);
      if (span !== null) {
        const spanPath = path.join(debugDir, `${prefix}_span.txt`);
        await fs.writeFile(spanPath, `${span}\n`, 'utf-8');
        written.push(spanPath);
      }
    } catch (error) {
      // eslint-disable-next-line no-console -- Dumps are diagnostic only; report and carry on.
      console.warn(`Failed to write debug dump for ${filePath}:`, errorMessage(error));
    }
    return written;
  }
}
