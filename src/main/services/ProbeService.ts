import type { StreamFacts } from '../../shared/models';
import { errorMessage, toFiniteNumber } from '../../shared/format';
import type { MediaToolRunner } from './MediaToolService';

type JsonObject = Record<string, unknown>;

const PROBE_ENTRIES =
  'format=duration,bit_rate:stream=sample_rate,bits_per_sample,bits_per_raw_sample,channels,codec_name,bit_rate';

/**
 * Stream facts with every field unknown.
 */
export function emptyStreamFacts(): StreamFacts {
  return {
    durationSeconds: null,
    sampleRate: null,
    bitDepth: null,
    channels: null,
    codec: null,
    bitrateKbps: null
  };
}

/**
 * Builds the ffprobe argument list for a file.
 */
export function buildProbeArgs(filePath: string): string[] {
  return ['-v', 'error', '-select_streams', 'a:0', '-show_entries', PROBE_ENTRIES, '-of', 'json', filePath];
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveNumber(value: unknown): number | null {
  const parsed = toFiniteNumber(value);
  return parsed !== null && parsed > 0 ? parsed : null;
}

function positiveInteger(value: unknown): number | null {
  const parsed = positiveNumber(value);
  return parsed === null ? null : Math.round(parsed);
}

/**
 * Maps an ffprobe JSON document onto stream facts. Each field is resolved on its own, so a
 * missing or malformed value only nulls that field.
 */
export function parseProbeOutput(text: string): StreamFacts {
  const facts = emptyStreamFacts();
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch {
    return facts;
  }
  if (!isJsonObject(document)) {
    return facts;
  }

  const format: JsonObject = isJsonObject(document.format) ? document.format : {};
  const streams: unknown[] = Array.isArray(document.streams) ? document.streams : [];
  const firstStream = streams[0];
  const stream: JsonObject = isJsonObject(firstStream) ? firstStream : {};

  facts.durationSeconds = positiveNumber(format.duration);
  facts.sampleRate = positiveInteger(stream.sample_rate);
  // Lossy codecs report 0 bits per sample, which counts as absent.
  facts.bitDepth = positiveInteger(stream.bits_per_sample) ?? positiveInteger(stream.bits_per_raw_sample);
  facts.channels = positiveInteger(stream.channels);
  facts.codec = typeof stream.codec_name === 'string' && stream.codec_name.length > 0 ? stream.codec_name : null;

  const bitsPerSecond = positiveNumber(stream.bit_rate) ?? positiveNumber(format.bit_rate);
  facts.bitrateKbps = bitsPerSecond === null ? null : Math.round(bitsPerSecond / 1000);
  return facts;
}

/**
 * Reads container and first-audio-stream metadata through ffprobe.
 */
export class ProbeService {
  private readonly probeFailures = new Set<string>();

  public constructor(private readonly tools: MediaToolRunner) {}

  /**
   * Never throws; a failed probe yields all-null facts.
   */
  public async probe(filePath: string): Promise<StreamFacts> {
    try {
      const result = await this.tools.run('ffprobe', buildProbeArgs(filePath));
      if (result.timedOut) {
        this.warnOnce(filePath, 'ffprobe timed out');
        return emptyStreamFacts();
      }
      if (result.exitCode !== 0) {
        this.warnOnce(filePath, `ffprobe exited with code ${String(result.exitCode)}`);
      }
      return parseProbeOutput(result.stdout.join('\n'));
    } catch (error) {
      this.warnOnce(filePath, errorMessage(error));
      return emptyStreamFacts();
    }
  }

  private warnOnce(filePath: string, message: string): void {
    if (this.probeFailures.has(filePath)) {
      return;
    }
    this.probeFailures.add(filePath);
    // eslint-disable-next-line no-console -- Provide visibility once per file for probe issues.
    console.warn(`Failed to probe ${filePath}: ${message}`);
  }
}
