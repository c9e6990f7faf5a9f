import os from 'node:os';
import path from 'node:path';
import type { AnalysisSettings, MeasurementRecord, RunHistoryEntry, RunSummary } from '../shared/models';
import { errorMessage, formatDecibels } from '../shared/format';
import { CliUsageError, parseArgs, USAGE, type CliOptions } from './cli';
import { AnalysisService } from './services/AnalysisService';
import { ClassificationService } from './services/ClassificationService';
import { DatabaseService } from './services/DatabaseService';
import { DiscoveryService, expandArguments } from './services/DiscoveryService';
import { LoudnessService } from './services/LoudnessService';
import {
  MediaToolNotFoundError,
  MediaToolService,
  type MediaToolOptions,
  type MediaToolRunner
} from './services/MediaToolService';
import { ProbeService } from './services/ProbeService';
import { ReportService, summarize } from './services/ReportService';
import { SamplePeakService } from './services/SamplePeakService';
import { resolveSettings, SettingsService } from './services/SettingsService';

/** Exit codes returned by {@link LoudnessApp.run}. */
export const EXIT_CODES = {
  ok: 0,
  fatal: 1,
  usage: 2
} as const;

/**
 * Tool runner that can also confirm the binaries exist before a run starts.
 */
export interface MediaToolchain extends MediaToolRunner {
  verifyAvailable(): Promise<void>;
}

export interface LoudnessAppEnvironment {
  /** Directory relative inputs and the default report location resolve against. */
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Builds the tool runner; tests substitute an in-process fake. */
  createToolchain(options: MediaToolOptions): MediaToolchain;
  now(): Date;
}

/**
 * Default database location: `LOUDNESS_QC_DB`, else `~/.loudness-qc/loudness-qc.db`.
 */
export function defaultDatabasePath(env: NodeJS.ProcessEnv): string {
  return env.LOUDNESS_QC_DB ?? path.join(os.homedir(), '.loudness-qc', 'loudness-qc.db');
}

function formatAverage(value: number | null): string {
  return value === null ? 'n/a' : formatDecibels(value);
}

/**
 * Command line coordinator: wires the services together for one invocation.
 */
export class LoudnessApp {
  private readonly environment: LoudnessAppEnvironment;

  public constructor(environment: Partial<LoudnessAppEnvironment> = {}) {
    this.environment = {
      cwd: environment.cwd ?? process.cwd(),
      env: environment.env ?? process.env,
      createToolchain: environment.createToolchain ?? ((options) => new MediaToolService(options)),
      now: environment.now ?? (() => new Date())
    };
  }

  /**
   * Runs the command line and resolves to the process exit code.
   */
  public async run(argv: readonly string[]): Promise<number> {
    let options: CliOptions;
    try {
      options = parseArgs(argv);
    } catch (error) {
      if (error instanceof CliUsageError) {
        // eslint-disable-next-line no-console -- Usage errors go to stderr.
        console.error(`${error.message}\n\n${USAGE}`);
        return EXIT_CODES.usage;
      }
      throw error;
    }

    if (options.help) {
      // eslint-disable-next-line no-console -- Help output.
      console.log(USAGE);
      return EXIT_CODES.ok;
    }

    const dbPath = options.dbPath
      ? path.resolve(this.environment.cwd, options.dbPath)
      : defaultDatabasePath(this.environment.env);
    const database = this.openDatabase(dbPath);
    try {
      if (database) {
        return await this.runWithDatabase(options, database);
      }
      if (options.resetSettings || options.history !== null || options.saveSettings) {
        // eslint-disable-next-line no-console -- These actions only exist for the database.
        console.error(`Cannot open the settings database at ${dbPath}.`);
        return EXIT_CODES.fatal;
      }
      const settings = this.resolveOrReport(() => resolveSettings([options.overrides]));
      return settings ? await this.analyze(options, settings, null) : EXIT_CODES.usage;
    } catch (error) {
      // eslint-disable-next-line no-console -- Logging fatal failures is necessary for troubleshooting.
      console.error('loudness-qc failed:', errorMessage(error));
      return EXIT_CODES.fatal;
    } finally {
      database?.close();
    }
  }

  /**
   * Opens the settings and history database, or returns null when it cannot be opened. Analysis
   * still runs without it, on the defaults and command line values.
   */
  private openDatabase(dbPath: string): DatabaseService | null {
    const database = new DatabaseService(dbPath);
    try {
      database.initialize();
      return database;
    } catch (error) {
      database.close();
      // eslint-disable-next-line no-console -- Stored defaults and history are unavailable for this run.
      console.warn(`Settings database ${dbPath} is unavailable (${errorMessage(error)}); using defaults.`);
      return null;
    }
  }

  private resolveOrReport(resolve: () => AnalysisSettings): AnalysisSettings | null {
    try {
      return resolve();
    } catch (error) {
      // eslint-disable-next-line no-console -- Usage errors go to stderr.
      console.error(`Invalid settings: ${errorMessage(error)}`);
      return null;
    }
  }

  private async runWithDatabase(options: CliOptions, database: DatabaseService): Promise<number> {
    const settingsService = new SettingsService(database);

    if (options.resetSettings) {
      const removed = settingsService.reset();
      // eslint-disable-next-line no-console -- Command feedback.
      console.log(`Cleared ${removed} stored setting(s).`);
      return EXIT_CODES.ok;
    }

    if (options.history !== null) {
      this.printHistory(database.listRuns(options.history));
      return EXIT_CODES.ok;
    }

    const settings = this.resolveOrReport(() =>
      options.saveSettings ? settingsService.save(options.overrides) : settingsService.resolve(options.overrides)
    );
    if (!settings) {
      return EXIT_CODES.usage;
    }

    if (options.saveSettings) {
      // eslint-disable-next-line no-console -- Command feedback.
      console.log(`Saved defaults:\n${JSON.stringify(settings, null, 2)}`);
      return EXIT_CODES.ok;
    }

    return this.analyze(options, settings, database);
  }

  private async analyze(
    options: CliOptions,
    settings: AnalysisSettings,
    database: DatabaseService | null
  ): Promise<number> {
    const { cwd, env } = this.environment;
    const startedAt = this.environment.now();

    const toolchain = this.environment.createToolchain({
      ffmpegPath: options.ffmpegPath ?? env.LOUDNESS_QC_FFMPEG ?? 'ffmpeg',
      ffprobePath: options.ffprobePath ?? env.LOUDNESS_QC_FFPROBE ?? 'ffprobe',
      timeoutMs: settings.timeoutMs
    });
    try {
      await toolchain.verifyAvailable();
    } catch (error) {
      if (error instanceof MediaToolNotFoundError) {
        // eslint-disable-next-line no-console -- Nothing can run without the media tools.
        console.error(error.message);
        return EXIT_CODES.fatal;
      }
      throw error;
    }

    const inputs = await expandArguments(options.inputs, cwd);
    const discovery = new DiscoveryService(settings);
    const { files, failures } = await discovery.discover(inputs, cwd);
    for (const failure of failures) {
      // eslint-disable-next-line no-console -- Report unreadable inputs without stopping the run.
      console.warn(`Skipping ${failure.path}: ${failure.message}`);
    }
    if (files.length === 0) {
      // eslint-disable-next-line no-console -- Informational exit.
      console.log(`No supported audio files found (extensions: ${settings.extensions.join(', ')}).`);
      return EXIT_CODES.ok;
    }

    const outputDir = path.resolve(cwd, options.outputDir ?? '.');
    const analysis = new AnalysisService(
      new ProbeService(toolchain),
      new LoudnessService(toolchain, settings, { outputDir, runStartedAt: startedAt }),
      new SamplePeakService(toolchain),
      new ClassificationService(settings),
      settings.concurrency
    );

    // eslint-disable-next-line no-console -- Progress output.
    console.log(`Analysing ${files.length} file(s) against ${settings.targetLufs} LUFS ± ${settings.toleranceLu} LU`);
    const records = await analysis.analyzeAll(files, (record, completed, total) => {
      this.printProgress(record, completed, total);
    });

    const reports = new ReportService(settings);
    const summary = summarize(records);
    const finishedAt = this.environment.now();
    const written = await reports.write(records, summary, outputDir, startedAt);
    if (database) {
      try {
        database.insertRun({
          startedAt: startedAt.getTime(),
          finishedAt: finishedAt.getTime(),
          summary,
          csvPath: written.csvPath,
          htmlPath: written.htmlPath,
          settings
        });
      } catch (error) {
        // eslint-disable-next-line no-console -- The reports are written; only the history entry is lost.
        console.warn(`Could not record the run in the history: ${errorMessage(error)}`);
      }
    }

    this.printSummary(summary);
    // eslint-disable-next-line no-console -- Report locations.
    console.log(`CSV:  ${written.csvPath}\nHTML: ${written.htmlPath}`);
    return EXIT_CODES.ok;
  }

  private printProgress(record: MeasurementRecord, completed: number, total: number): void {
    // eslint-disable-next-line no-console -- Progress output.
    console.log(`[${completed}/${total}] ${record.fileName} -> ${record.verdict} (${ClassificationService.formatIssues(record.issues)})`);
  }

  private printSummary(summary: RunSummary): void {
    // eslint-disable-next-line no-console -- Run summary.
    console.log(
      `Files: ${summary.fileCount}  READY: ${summary.ready}  ADJUST: ${summary.adjust}  ERROR: ${summary.error}  ` +
        `Avg LUFS: ${formatAverage(summary.averageIntegratedLufs)}  Avg LRA: ${formatAverage(summary.averageLoudnessRangeLu)}`
    );
  }

  private printHistory(entries: readonly RunHistoryEntry[]): void {
    if (entries.length === 0) {
      // eslint-disable-next-line no-console -- Command feedback.
      console.log('No runs recorded yet.');
      return;
    }
    for (const entry of entries) {
      const { summary } = entry;
      // eslint-disable-next-line no-console -- Command feedback.
      console.log(
        `#${entry.id} ${new Date(entry.startedAt).toISOString()}  files=${summary.fileCount} ` +
          `ready=${summary.ready} adjust=${summary.adjust} error=${summary.error} ` +
          `target=${entry.settings.targetLufs}  ${entry.csvPath}`
      );
    }
  }
}
