/**
 * End-to-end runs of the command line against the in-process media toolchain.
 * Run with: node --import tsx --test src/test/LoudnessApp.test.ts
 */
import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import fs from 'node:fs/promises';
import path from 'node:path';
import Database from 'better-sqlite3';
import { parse } from 'csv-parse/sync';
import { EXIT_CODES, LoudnessApp } from '../main/LoudnessApp';
import { DatabaseService } from '../main/services/DatabaseService';
import type { MediaToolOptions } from '../main/services/MediaToolService';
import {
  astatsOutput,
  FakeMediaToolchain,
  getTempDirPath,
  loudnormOutput,
  probeJson,
  TestWavGenerator,
  type FakeFileScenario
} from './testHelpers';

const RUN_STARTED_AT = new Date(2024, 0, 31, 15, 45, 2);

const scenarios: Record<string, FakeFileScenario> = {
  'a.wav': {
    probe: probeJson({ codec_name: 'pcm_s16le', sample_rate: '44100', channels: 2, bits_per_sample: 16 }, { duration: '65' }),
    loudnorm: loudnormOutput({ i: '-14.20', tp: '-1.50', lra: '7.00' }),
    astats: astatsOutput(['-3.000000', '-2.100000'])
  },
  'b.wav': {
    probe: probeJson({ codec_name: 'pcm_s24le', sample_rate: '48000', channels: 2, bits_per_sample: 24 }, { duration: '30' }),
    loudnorm: loudnormOutput({ i: '-18.00', tp: '-4.00', lra: '5.00' }),
    astats: astatsOutput(['-5.000000'])
  },
  'broken.wav': {
    probe: probeJson({ codec_name: 'pcm_s16le', sample_rate: '44100', channels: 1 }),
    loudnorm: ['[Parsed_loudnorm_0 @ 0x1] ', '{', '\t"input_i" : "-14.00",', '\t"input_tp" : "-1.00"', '}']
  }
};

describe('LoudnessApp', () => {
  let workDir: string;
  let libraryDir: string;
  let outputDir: string;
  let dbPath: string;
  let toolchain: FakeMediaToolchain;
  let toolOptions: MediaToolOptions[];
  let logLines: string[];

  function createApp(env: NodeJS.ProcessEnv = {}): LoudnessApp {
    return new LoudnessApp({
      cwd: workDir,
      env,
      now: () => RUN_STARTED_AT,
      createToolchain: (options) => {
        toolOptions.push(options);
        return toolchain;
      }
    });
  }

  function baseArgs(...extra: string[]): string[] {
    return ['--db', dbPath, '--out', outputDir, ...extra];
  }

  beforeEach(async () => {
    workDir = getTempDirPath('app');
    libraryDir = path.join(workDir, 'masters');
    outputDir = path.join(workDir, 'reports');
    dbPath = path.join(workDir, 'qc.db');
    await TestWavGenerator.createTestLibrary(libraryDir, ['b.wav', 'a.wav', 'notes.txt']);
    toolchain = new FakeMediaToolchain(scenarios);
    toolOptions = [];
    logLines = [];
    mock.method(console, 'log', (...args: unknown[]) => {
      logLines.push(args.map(String).join(' '));
    });
    mock.method(console, 'warn', () => undefined);
    mock.method(console, 'error', () => undefined);
  });

  afterEach(async () => {
    mock.restoreAll();
    await TestWavGenerator.cleanupTestLibrary(workDir);
  });

  it('should analyse a folder, write both reports and record the run', async () => {
    const exitCode = await createApp().run(baseArgs('--tolerance', '0.5', 'masters'));

    assert.strictEqual(exitCode, EXIT_CODES.ok);
    assert.strictEqual(toolchain.verifyCalls, 1);
    assert.ok(logLines.includes('[1/2] a.wav -> READY (NONE)'));
    assert.ok(logLines.includes('[2/2] b.wav -> ADJUST (LUFS LOW)'));
    assert.ok(logLines.includes('Files: 2  READY: 1  ADJUST: 1  ERROR: 0  Avg LUFS: -16.10  Avg LRA: 6.00'));

    const csvPath = path.join(outputDir, 'loudness_report_20240131_154502.csv');
    const rows: string[][] = parse(await fs.readFile(csvPath, 'utf-8'));
    assert.deepStrictEqual(
      rows.slice(1).map((row) => [row[0], row[8], row[12]]),
      [
        ['a.wav', '0.20', 'READY'],
        ['b.wav', '4.00', 'ADJUST']
      ]
    );
    await fs.access(path.join(outputDir, 'loudness_report_20240131_154502.html'));

    const database = new DatabaseService(dbPath);
    database.initialize();
    const runs = database.listRuns();
    database.close();
    assert.strictEqual(runs.length, 1);
    assert.strictEqual(runs[0].summary.fileCount, 2);
    assert.strictEqual(runs[0].csvPath, csvPath);
    assert.strictEqual(runs[0].settings.toleranceLu, 0.5);
  });

  it('should write debug dumps for files whose loudness cannot be read', async () => {
    await TestWavGenerator.writeTestWav(path.join(libraryDir, 'broken.wav'));

    const exitCode = await createApp().run(baseArgs(path.join(libraryDir, 'broken.wav')));

    assert.strictEqual(exitCode, EXIT_CODES.ok);
    assert.ok(logLines.includes('[1/1] broken.wav -> ERROR (ANALYSIS ERROR)'));
    const dumps = await fs.readdir(path.join(outputDir, 'debug'));
    assert.deepStrictEqual(dumps.sort(), [
      'broken_20240131_154502_001_loudnorm_raw.txt',
      'broken_20240131_154502_001_loudnorm_span.txt'
    ]);
  });

  describe('without a usable settings database', () => {
    let blockedDbPath: string;

    beforeEach(async () => {
      const blocker = path.join(workDir, 'not-a-folder');
      await fs.writeFile(blocker, 'plain file');
      blockedDbPath = path.join(blocker, 'qc.db');
    });

    it('should still analyse on defaults and command line values', async () => {
      const exitCode = await createApp().run(['--db', blockedDbPath, '--out', outputDir, '--tolerance', '0.5', 'masters']);

      assert.strictEqual(exitCode, EXIT_CODES.ok);
      assert.ok(logLines.includes('[1/2] a.wav -> READY (NONE)'));
      assert.ok(logLines.includes('[2/2] b.wav -> ADJUST (LUFS LOW)'));
      await fs.access(path.join(outputDir, 'loudness_report_20240131_154502.csv'));
    });

    it('should fail the database-only actions', async () => {
      assert.strictEqual(await createApp().run(['--db', blockedDbPath, '--history']), EXIT_CODES.fatal);
      assert.strictEqual(await createApp().run(['--db', blockedDbPath, '--save-settings', '--target', '-16']), EXIT_CODES.fatal);
      assert.strictEqual(await createApp().run(['--db', blockedDbPath, '--reset-settings']), EXIT_CODES.fatal);
      assert.strictEqual(toolOptions.length, 0);
    });

    it('should keep a successful run when the history entry cannot be stored', async () => {
      const legacy = new Database(dbPath);
      legacy.exec('CREATE TABLE runs (id INTEGER PRIMARY KEY, started_at INTEGER NOT NULL)');
      legacy.close();

      const exitCode = await createApp().run(baseArgs('masters'));

      assert.strictEqual(exitCode, EXIT_CODES.ok);
      await fs.access(path.join(outputDir, 'loudness_report_20240131_154502.html'));
    });
  });

  it('should pass tool paths from flags and the environment', async () => {
    await createApp({ LOUDNESS_QC_FFPROBE: '/env/ffprobe' }).run(
      baseArgs('--ffmpeg', '/flag/ffmpeg', '--timeout', '30', 'masters')
    );

    assert.deepStrictEqual(toolOptions, [{ ffmpegPath: '/flag/ffmpeg', ffprobePath: '/env/ffprobe', timeoutMs: 30_000 }]);
  });

  it('should fail when a media tool is missing', async () => {
    toolchain.missingTool = 'ffprobe';

    const exitCode = await createApp().run(baseArgs('masters'));

    assert.strictEqual(exitCode, EXIT_CODES.fatal);
    assert.strictEqual(toolchain.calls.length, 0);
  });

  it('should exit cleanly when no supported files are found', async () => {
    const exitCode = await createApp().run(baseArgs('--ext', 'mp3', 'masters'));

    assert.strictEqual(exitCode, EXIT_CODES.ok);
    assert.strictEqual(toolchain.calls.length, 0);
    await assert.rejects(fs.access(outputDir));
  });

  it('should return the usage exit code for a bad command line', async () => {
    assert.strictEqual(await createApp().run(['--bogus']), EXIT_CODES.usage);
    assert.strictEqual(toolOptions.length, 0);
  });

  it('should print help without touching the database', async () => {
    assert.strictEqual(await createApp().run(baseArgs('--help')), EXIT_CODES.ok);
    await assert.rejects(fs.access(dbPath));
  });

  it('should use saved defaults in later runs until they are reset', async () => {
    assert.strictEqual(await createApp().run(baseArgs('--save-settings', '--target', '-18', '--tolerance', '0.5')), EXIT_CODES.ok);
    assert.strictEqual(toolOptions.length, 0);

    await createApp().run(baseArgs('masters'));
    assert.ok(logLines.includes('[2/2] b.wav -> READY (NONE)'));

    assert.strictEqual(await createApp().run(baseArgs('--reset-settings')), EXIT_CODES.ok);
    assert.ok(logLines.includes('Cleared 2 stored setting(s).'));
  });

  it('should print the run history without analysing', async () => {
    await createApp().run(baseArgs('masters'));
    logLines.length = 0;

    const exitCode = await createApp().run(baseArgs('--history', '5'));

    assert.strictEqual(exitCode, EXIT_CODES.ok);
    assert.strictEqual(toolOptions.length, 1);
    assert.strictEqual(logLines.length, 1);
    assert.ok(logLines[0].startsWith('#1 '));
  });
});
