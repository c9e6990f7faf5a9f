import fs from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import type { AnalysisSettings, MeasurementRecord, RunSummary } from '../../shared/models';
import { fileTimestamp, formatDecibels, formatDuration, roundTo } from '../../shared/format';
import { ReportDocument } from '../report/ReportDocument';
import { ClassificationService } from './ClassificationService';

/** Column order of the CSV report. */
export const CSV_COLUMNS = [
  'File',
  'Duration',
  'SampleRate_Hz',
  'Bitrate_kbps',
  'BitDepth',
  'Channels',
  'Codec',
  'IntegratedLUFS',
  'SuggestedGain_dB',
  'TruePeak_dBTP',
  'SamplePeak_dBFS',
  'LRA',
  'Status',
  'Issues',
  'Path'
] as const;

export interface WrittenReports {
  csvPath: string;
  htmlPath: string;
}

function optionalInteger(value: number | null): string {
  return value === null ? '' : String(value);
}

function average(values: Array<number | null>): number | null {
  const known = values.filter((value): value is number => value !== null);
  if (known.length === 0) {
    return null;
  }
  return roundTo(known.reduce((sum, value) => sum + value, 0) / known.length, 2);
}

/**
 * Aggregates verdict counts and averages for the run summary.
 */
export function summarize(records: readonly MeasurementRecord[]): RunSummary {
  return {
    fileCount: records.length,
    ready: records.filter((record) => record.verdict === 'READY').length,
    adjust: records.filter((record) => record.verdict === 'ADJUST').length,
    error: records.filter((record) => record.verdict === 'ERROR').length,
    averageIntegratedLufs: average(records.map((record) => record.loudness.integratedLufs)),
    averageLoudnessRangeLu: average(records.map((record) => record.loudness.loudnessRangeLu))
  };
}

/**
 * Maps a record onto the CSV columns.
 */
export function toCsvRow(record: MeasurementRecord): string[] {
  const { stream, loudness } = record;
  return [
    record.fileName,
    formatDuration(stream.durationSeconds),
    optionalInteger(stream.sampleRate),
    optionalInteger(stream.bitrateKbps),
    optionalInteger(stream.bitDepth),
    optionalInteger(stream.channels),
    stream.codec ?? '',
    formatDecibels(loudness.integratedLufs),
    formatDecibels(record.suggestedGainDb),
    formatDecibels(loudness.truePeakDbtp),
    formatDecibels(record.samplePeakDbfs),
    formatDecibels(loudness.loudnessRangeLu),
    record.verdict,
    ClassificationService.formatIssues(record.issues),
    record.absolutePath
  ];
}

/**
 * Renders and writes the CSV and HTML reports.
 */
export class ReportService {
  public constructor(private readonly settings: AnalysisSettings) {}

  public renderCsv(records: readonly MeasurementRecord[]): string {
    return stringify([[...CSV_COLUMNS], ...records.map(toCsvRow)]);
  }

  public renderHtml(records: readonly MeasurementRecord[], summary: RunSummary, generatedAt: Date): string {
    const markup = renderToStaticMarkup(
      createElement(ReportDocument, { records, summary, settings: this.settings, generatedAt })
    );
    return `<!DOCTYPE html>\n${markup}\n`;
  }

  /**
   * Writes `loudness_report_<timestamp>.csv` and `.html` into `outputDir`.
   */
  public async write(
    records: readonly MeasurementRecord[],
    summary: RunSummary,
    outputDir: string,
    generatedAt: Date
  ): Promise<WrittenReports> {
    await fs.mkdir(outputDir, { recursive: true });
    const baseName = `loudness_report_${fileTimestamp(generatedAt)}`;
    const csvPath = path.join(outputDir, `${baseName}.csv`);
    const htmlPath = path.join(outputDir, `${baseName}.html`);
    await fs.writeFile(csvPath, this.renderCsv(records), 'utf-8');
    await fs.writeFile(htmlPath, this.renderHtml(records, summary, generatedAt), 'utf-8');
    return { csvPath, htmlPath };
  }
}
