/**
 * Run with: node --import tsx --test src/test/ClassificationService.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ClassificationService } from '../main/services/ClassificationService';
import { testSettings } from './testHelpers';

describe('ClassificationService', () => {
  const classifier = new ClassificationService(testSettings());

  describe('verdict', () => {
    it('should mark a compliant file READY with no issues', () => {
      const result = classifier.classify({
        integratedLufs: -14,
        truePeakDbtp: -1,
        loudnessRangeLu: 6,
        sampleRate: 48000
      });

      assert.strictEqual(result.verdict, 'READY');
      assert.deepStrictEqual(result.issues, []);
      assert.strictEqual(ClassificationService.formatIssues(result.issues), 'NONE');
      assert.strictEqual(result.suggestedGainDb, 0);
    });

    it('should list every failing check in order and return ADJUST', () => {
      const result = classifier.classify({
        integratedLufs: -9,
        truePeakDbtp: -0.3,
        loudnessRangeLu: 5,
        sampleRate: 96000
      });

      assert.strictEqual(result.verdict, 'ADJUST');
      assert.deepStrictEqual(result.issues, ['LUFS HIGH', 'TRUE PEAK HOT', 'SAMPLE RATE CHECK']);
      assert.strictEqual(ClassificationService.formatIssues(result.issues), 'LUFS HIGH|TRUE PEAK HOT|SAMPLE RATE CHECK');
      assert.strictEqual(result.suggestedGainDb, -5);
    });

    it('should flag quiet files as LUFS LOW', () => {
      const result = classifier.classify({
        integratedLufs: -18.3,
        truePeakDbtp: -3,
        loudnessRangeLu: 7,
        sampleRate: 44100
      });

      assert.strictEqual(result.verdict, 'ADJUST');
      assert.deepStrictEqual(result.issues, ['LUFS LOW']);
      assert.strictEqual(result.suggestedGainDb, 4.3);
    });

    it('should return ERROR when loudness range is missing even with a hot true peak', () => {
      const result = classifier.classify({
        integratedLufs: -14,
        truePeakDbtp: 0.5,
        loudnessRangeLu: null,
        sampleRate: 48000
      });

      assert.strictEqual(result.verdict, 'ERROR');
      assert.deepStrictEqual(result.issues, ['ANALYSIS ERROR', 'TRUE PEAK HOT']);
    });

    it('should return ERROR when every loudness fact is missing', () => {
      const result = classifier.classify({
        integratedLufs: null,
        truePeakDbtp: null,
        loudnessRangeLu: null,
        sampleRate: 22050
      });

      assert.strictEqual(result.verdict, 'ERROR');
      assert.deepStrictEqual(result.issues, ['ANALYSIS ERROR', 'SAMPLE RATE CHECK']);
      assert.strictEqual(result.suggestedGainDb, null);
    });

    it('should return ERROR for each single missing loudness fact', () => {
      const complete = { integratedLufs: -14, truePeakDbtp: -2, loudnessRangeLu: 5, sampleRate: 48000 };
      for (const key of ['integratedLufs', 'truePeakDbtp', 'loudnessRangeLu'] as const) {
        const result = classifier.classify({ ...complete, [key]: null });
        assert.strictEqual(result.verdict, 'ERROR', `missing ${key}`);
        assert.strictEqual(result.issues[0], 'ANALYSIS ERROR');
      }
    });
  });

  describe('loudness window', () => {
    it('should accept both exact window boundaries', () => {
      for (const integratedLufs of [-13.5, -14.5]) {
        const result = classifier.classify({ integratedLufs, truePeakDbtp: -2, loudnessRangeLu: 5, sampleRate: 48000 });
        assert.strictEqual(result.verdict, 'READY', `at ${integratedLufs}`);
        assert.deepStrictEqual(result.issues, []);
      }
    });

    it('should accept boundaries that are not exact in binary floating point', () => {
      const tight = new ClassificationService(testSettings({ targetLufs: -16, toleranceLu: 0.1 }));
      const high = tight.classify({ integratedLufs: -15.9, truePeakDbtp: -2, loudnessRangeLu: 5, sampleRate: 48000 });
      const low = tight.classify({ integratedLufs: -16.1, truePeakDbtp: -2, loudnessRangeLu: 5, sampleRate: 48000 });

      assert.deepStrictEqual(high.issues, []);
      assert.deepStrictEqual(low.issues, []);
    });

    it('should never be READY outside the window', () => {
      for (const integratedLufs of [-13.49, -14.51, -8, -30]) {
        const result = classifier.classify({ integratedLufs, truePeakDbtp: -2, loudnessRangeLu: 5, sampleRate: 48000 });
        assert.notStrictEqual(result.verdict, 'READY', `at ${integratedLufs}`);
      }
    });
  });

  describe('true peak', () => {
    it('should treat a true peak equal to the ceiling as safe', () => {
      const result = classifier.classify({ integratedLufs: -14, truePeakDbtp: -1, loudnessRangeLu: 5, sampleRate: 48000 });

      assert.strictEqual(result.verdict, 'READY');
      assert.ok(!result.issues.includes('TRUE PEAK HOT'));
    });

    it('should flag a true peak just above the ceiling', () => {
      const result = classifier.classify({ integratedLufs: -14, truePeakDbtp: -0.99, loudnessRangeLu: 5, sampleRate: 48000 });

      assert.strictEqual(result.verdict, 'ADJUST');
      assert.deepStrictEqual(result.issues, ['TRUE PEAK HOT']);
    });

    it('should flag a true peak a fraction of a micro-dB above the ceiling', () => {
      const result = classifier.classify({ integratedLufs: -14, truePeakDbtp: -0.9999996, loudnessRangeLu: 5, sampleRate: 48000 });

      assert.strictEqual(result.verdict, 'ADJUST');
      assert.deepStrictEqual(result.issues, ['TRUE PEAK HOT']);
    });
  });

  describe('sample rate', () => {
    it('should not penalise an unknown sample rate', () => {
      const result = classifier.classify({ integratedLufs: -14.2, truePeakDbtp: -1.5, loudnessRangeLu: 4, sampleRate: null });

      assert.strictEqual(result.verdict, 'READY');
      assert.deepStrictEqual(result.issues, []);
    });

    it('should use the configured allow-list', () => {
      const hiRes = new ClassificationService(testSettings({ allowedSampleRates: [96000] }));
      const result = hiRes.classify({ integratedLufs: -14, truePeakDbtp: -2, loudnessRangeLu: 4, sampleRate: 48000 });

      assert.deepStrictEqual(result.issues, ['SAMPLE RATE CHECK']);
      assert.strictEqual(result.verdict, 'ADJUST');
    });
  });

  describe('suggested gain', () => {
    it('should round target minus integrated loudness to two decimals', () => {
      const result = classifier.classify({ integratedLufs: -20.456, truePeakDbtp: -6, loudnessRangeLu: 9, sampleRate: 44100 });

      assert.strictEqual(result.suggestedGainDb, 6.46);
    });

    it('should be computed even when other facts are missing', () => {
      const result = classifier.classify({ integratedLufs: -18.3, truePeakDbtp: null, loudnessRangeLu: null, sampleRate: null });

      assert.strictEqual(result.verdict, 'ERROR');
      assert.deepStrictEqual(result.issues, ['ANALYSIS ERROR', 'LUFS LOW']);
      assert.strictEqual(result.suggestedGainDb, 4.3);
    });
  });
});
