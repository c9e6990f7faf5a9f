import type { AnalysisSettings, Classification, IssueTag, LoudnessFacts } from '../../shared/models';
import { roundTo } from '../../shared/format';

/**
 * Measurements that feed a classification.
 */
export interface ClassificationInput extends LoudnessFacts {
  sampleRate: number | null;
}

type ClassificationThresholds = Pick<
  AnalysisSettings,
  'targetLufs' | 'toleranceLu' | 'truePeakCeilingDbtp' | 'allowedSampleRates'
>;

// Computed bounds such as -16 + 0.1 can land one ulp inside the intended value.
const WINDOW_EPSILON = 1e-9;

/**
 * Derives READY / ADJUST / ERROR and the issue tags from measured values and thresholds.
 * Pure: no I/O and no state beyond the thresholds it was built with.
 */
export class ClassificationService {
  private readonly allowedRates: ReadonlySet<number>;

  public constructor(private readonly thresholds: ClassificationThresholds) {
    this.allowedRates = new Set(thresholds.allowedSampleRates);
  }

  public classify(input: ClassificationInput): Classification {
    const { integratedLufs, truePeakDbtp, loudnessRangeLu, sampleRate } = input;
    const { targetLufs, toleranceLu, truePeakCeilingDbtp } = this.thresholds;
    const issues: IssueTag[] = [];

    const analysisOk = integratedLufs !== null && truePeakDbtp !== null && loudnessRangeLu !== null;
    if (!analysisOk) {
      issues.push('ANALYSIS ERROR');
    }

    let withinWindow = false;
    if (integratedLufs !== null) {
      const upper = targetLufs + toleranceLu + WINDOW_EPSILON;
      const lower = targetLufs - toleranceLu - WINDOW_EPSILON;
      if (integratedLufs > upper) {
        issues.push('LUFS HIGH');
      } else if (integratedLufs < lower) {
        issues.push('LUFS LOW');
      } else {
        withinWindow = true;
      }
    }

    const peakSafe = truePeakDbtp !== null && truePeakDbtp <= truePeakCeilingDbtp;
    if (truePeakDbtp !== null && !peakSafe) {
      issues.push('TRUE PEAK HOT');
    }

    const rateAllowed = sampleRate === null || this.allowedRates.has(sampleRate);
    if (!rateAllowed) {
      issues.push('SAMPLE RATE CHECK');
    }

    let verdict: Classification['verdict'];
    if (!analysisOk) {
      verdict = 'ERROR';
    } else if (withinWindow && peakSafe && rateAllowed) {
      verdict = 'READY';
    } else {
      verdict = 'ADJUST';
    }

    return {
      verdict,
      issues,
      suggestedGainDb: integratedLufs === null ? null : roundTo(targetLufs - integratedLufs, 2)
    };
  }

  /**
   * Pipe-joined issue list as used in the reports.
   */
  public static formatIssues(issues: readonly IssueTag[]): string {
    return issues.length === 0 ? 'NONE' : issues.join('|');
  }
}
