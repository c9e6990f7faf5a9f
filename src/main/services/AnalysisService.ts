import path from 'node:path';
import type { MeasurementRecord } from '../../shared/models';
import { errorMessage } from '../../shared/format';
import { ClassificationService } from './ClassificationService';
import { emptyLoudnessFacts, LoudnessService } from './LoudnessService';
import { emptyStreamFacts, ProbeService } from './ProbeService';
import { SamplePeakService } from './SamplePeakService';

/**
 * Called after each file finishes; `completed` counts from 1.
 */
export type AnalysisProgressListener = (record: MeasurementRecord, completed: number, total: number) => void;

/**
 * Orders records by file name, then by path for files sharing a name.
 */
export function compareRecords(a: MeasurementRecord, b: MeasurementRecord): number {
  return (
    a.fileName.localeCompare(b.fileName, undefined, { sensitivity: 'base' }) ||
    a.absolutePath.localeCompare(b.absolutePath)
  );
}

/**
 * Runs probe, loudness, sample peak and classification for each file.
 */
export class AnalysisService {
  public constructor(
    private readonly prober: ProbeService,
    private readonly loudness: LoudnessService,
    private readonly samplePeak: SamplePeakService,
    private readonly classifier: ClassificationService,
    private readonly concurrency = 1
  ) {}

  /**
   * Produces the record for one file. Never rejects: unexpected failures become an ERROR record.
   */
  public async analyzeFile(filePath: string): Promise<MeasurementRecord> {
    const absolutePath = path.resolve(filePath);
    const fileName = path.basename(absolutePath);
    try {
      const stream = await this.prober.probe(absolutePath);
      const loudness = await this.loudness.measure(absolutePath);
      const samplePeakDbfs = await this.samplePeak.measure(absolutePath);
      const classification = this.classifier.classify({ ...loudness, sampleRate: stream.sampleRate });
      return {
        fileName,
        absolutePath,
        stream,
        loudness,
        samplePeakDbfs,
        suggestedGainDb: classification.suggestedGainDb,
        verdict: classification.verdict,
        issues: classification.issues
      };
    } catch (error) {
      // eslint-disable-next-line no-console -- A single file must not abort the batch.
      console.error(`Unexpected failure while analysing ${absolutePath}:`, errorMessage(error));
      const loudness = emptyLoudnessFacts();
      const classification = this.classifier.classify({ ...loudness, sampleRate: null });
      return {
        fileName,
        absolutePath,
        stream: emptyStreamFacts(),
        loudness,
        samplePeakDbfs: null,
        suggestedGainDb: classification.suggestedGainDb,
        verdict: classification.verdict,
        issues: classification.issues
      };
    }
  }

  /**
   * Analyses every file with at most `concurrency` files in flight and returns the records
   * sorted by file name.
   */
  public async analyzeAll(filePaths: readonly string[], onProgress?: AnalysisProgressListener): Promise<MeasurementRecord[]> {
    const records: MeasurementRecord[] = [];
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < filePaths.length) {
        const filePath = filePaths[nextIndex];
        nextIndex += 1;
        const record = await this.analyzeFile(filePath);
        records.push(record);
        onProgress?.(record, records.length, filePaths.length);
      }
    };

    const workerCount = Math.max(1, Math.min(this.concurrency, filePaths.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return records.sort(compareRecords);
  }
}
