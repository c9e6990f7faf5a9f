import type { AnalysisSettings, MeasurementRecord, RunSummary } from '../../shared/models';
import { formatDecibels, formatDuration } from '../../shared/format';
import { ClassificationService } from '../services/ClassificationService';
import { statusCellStyle } from './statusColors';

const REPORT_CSS = `
body { font-family: system-ui, sans-serif; background: #111518; color: #e4e8eb; margin: 24px; }
h1 { font-size: 20px; margin: 0 0 4px; }
.meta { color: #9aa4ab; margin: 0 0 16px; }
.summary { display: flex; gap: 12px; flex-wrap: wrap; margin-bottom: 20px; }
.summary div { background: #1b2126; border-radius: 6px; padding: 8px 12px; min-width: 110px; }
.summary dt { font-size: 11px; text-transform: uppercase; color: #9aa4ab; }
.summary dd { margin: 2px 0 0; font-size: 18px; }
table { border-collapse: collapse; width: 100%; font-size: 13px; }
th, td { border: 1px solid #2a3238; padding: 4px 8px; }
th { background: #1b2126; text-align: left; position: sticky; top: 0; }
td.num { text-align: right; font-variant-numeric: tabular-nums; }
td.path { color: #9aa4ab; font-size: 11px; }
.legend { margin-top: 24px; font-size: 13px; color: #c3cace; }
.legend dt { font-weight: 600; margin-top: 6px; }
`;

/**
 * Static descriptions of each reported metric.
 */
export const METRIC_LEGEND: ReadonlyArray<{ term: string; description: string }> = [
  { term: 'Integrated LUFS', description: 'Perceived loudness over the whole file (EBU R128 / ITU-R BS.1770).' },
  { term: 'Gain (dB)', description: 'Gain that would bring the file onto the loudness target.' },
  { term: 'True Peak (dBTP)', description: 'Peak level including inter-sample peaks after reconstruction.' },
  { term: 'Sample Peak (dBFS)', description: 'Highest raw sample value relative to digital full scale.' },
  { term: 'LRA (LU)', description: 'Loudness range: statistical spread of short-term loudness.' },
  { term: 'READY', description: 'Loudness in window, true peak under the ceiling, sample rate allowed.' },
  { term: 'ADJUST', description: 'Measured successfully but at least one check failed; see Issues.' },
  { term: 'ERROR', description: 'Loudness analysis did not produce all measurements.' }
];

export interface ReportDocumentProps {
  records: readonly MeasurementRecord[];
  summary: RunSummary;
  settings: AnalysisSettings;
  generatedAt: Date;
}

function SummaryItem({ label, value }: { label: string; value: string | number }): JSX.Element {
  return (
    <div>
      <dt>{label}</dt>
      <dd>{value}</dd>
    </div>
  );
}

function RecordRow({ record }: { record: MeasurementRecord }): JSX.Element {
  const { stream, loudness } = record;
  return (
    <tr>
      <td>{record.fileName}</td>
      <td className="num">{formatDuration(stream.durationSeconds)}</td>
      <td className="num">{stream.sampleRate ?? ''}</td>
      <td className="num">{stream.bitrateKbps ?? ''}</td>
      <td className="num">{stream.bitDepth ?? ''}</td>
      <td className="num">{stream.channels ?? ''}</td>
      <td>{stream.codec ?? ''}</td>
      <td className="num">{formatDecibels(loudness.integratedLufs)}</td>
      <td className="num">{formatDecibels(record.suggestedGainDb)}</td>
      <td className="num">{formatDecibels(loudness.truePeakDbtp)}</td>
      <td className="num">{formatDecibels(record.samplePeakDbfs)}</td>
      <td className="num">{formatDecibels(loudness.loudnessRangeLu)}</td>
      <td style={statusCellStyle(record.verdict)}>{record.verdict}</td>
      <td>{ClassificationService.formatIssues(record.issues)}</td>
      <td className="path">{record.absolutePath}</td>
    </tr>
  );
}

/**
 * Full HTML report page: run summary, per-file table and metric legend.
 */
export function ReportDocument({ records, summary, settings, generatedAt }: ReportDocumentProps): JSX.Element {
  const loudnessWindow = `${settings.targetLufs} ± ${settings.toleranceLu} LUFS`;
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>Loudness Report</title>
        <style dangerouslySetInnerHTML={{ __html: REPORT_CSS }} />
      </head>
      <body>
        <h1>Loudness Report</h1>
        <p className="meta">
          Generated {generatedAt.toISOString()} · target {loudnessWindow} · true peak ceiling {settings.truePeakCeilingDbtp} dBTP ·
          sample rates {settings.allowedSampleRates.join(', ')} Hz
        </p>
        <dl className="summary">
          <SummaryItem label="Files" value={summary.fileCount} />
          <SummaryItem label="Ready" value={summary.ready} />
          <SummaryItem label="Adjust" value={summary.adjust} />
          <SummaryItem label="Error" value={summary.error} />
          <SummaryItem label="Avg LUFS" value={summary.averageIntegratedLufs === null ? 'n/a' : summary.averageIntegratedLufs.toFixed(2)} />
          <SummaryItem label="Avg LRA" value={summary.averageLoudnessRangeLu === null ? 'n/a' : summary.averageLoudnessRangeLu.toFixed(2)} />
        </dl>
        <table>
          <thead>
            <tr>
              <th>File</th>
              <th>Duration</th>
              <th>Sample Rate (Hz)</th>
              <th>Bitrate (kbps)</th>
              <th>Bit Depth</th>
              <th>Channels</th>
              <th>Codec</th>
              <th>Integrated LUFS</th>
              <th>Gain (dB)</th>
              <th>True Peak (dBTP)</th>
              <th>Sample Peak (dBFS)</th>
              <th>LRA (LU)</th>
              <th>Status</th>
              <th>Issues</th>
              <th>Path</th>
            </tr>
          </thead>
          <tbody>
            {records.map((record) => (
              <RecordRow key={record.absolutePath} record={record} />
            ))}
          </tbody>
        </table>
        <dl className="legend">
          {METRIC_LEGEND.map((entry) => (
            <div key={entry.term}>
              <dt>{entry.term}</dt>
              <dd>{entry.description}</dd>
            </div>
          ))}
        </dl>
      </body>
    </html>
  );
}
