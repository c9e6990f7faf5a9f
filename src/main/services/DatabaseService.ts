/**
 * Thin wrapper around better-sqlite3 holding persisted settings and the run history.
 */
import Database, { Database as BetterSqliteDatabase } from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { AnalysisSettings, RunHistoryEntry, RunSummary } from '../../shared/models';
import { DEFAULT_SETTINGS, settingsOverrideSchema } from '../../shared/settings';

export interface RunRecordInput {
  /** Unix epoch milliseconds. */
  startedAt: number;
  /** Unix epoch milliseconds. */
  finishedAt: number;
  summary: RunSummary;
  csvPath: string;
  htmlPath: string;
  /** Effective settings of the run. */
  settings: AnalysisSettings;
}

type DbRow = Record<string, unknown>;

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}

function numberOrZero(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

function stringOrEmpty(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Handles persistence for settings and run summaries.
 */
export class DatabaseService {
  private db: BetterSqliteDatabase | null = null;

  public constructor(private readonly dbFilePath: string) {}

  /**
   * Opens the database connection (creating the file if necessary) and ensures the schema exists.
   */
  public initialize(): void {
    const folder = path.dirname(this.dbFilePath);
    if (!fs.existsSync(folder)) {
      fs.mkdirSync(folder, { recursive: true });
    }
    this.db = new Database(this.dbFilePath);
    this.db.pragma('journal_mode = WAL');
    this.applySchema();
  }

  /**
   * Closes the active database connection.
   */
  public close(): void {
    this.db?.close();
    this.db = null;
  }

  /**
   * Returns every stored setting with its JSON value decoded. Rows that fail to decode are skipped.
   */
  public getSettings(): Map<string, unknown> {
    const rows = this.requireDb().prepare('SELECT key, value FROM settings').all() as DbRow[];
    const map = new Map<string, unknown>();
    for (const row of rows) {
      const key = row.key;
      const value = row.value;
      if (typeof key !== 'string' || typeof value !== 'string') {
        continue;
      }
      try {
        map.set(key, JSON.parse(value));
      } catch {
        // eslint-disable-next-line no-console -- Corrupt rows are ignored but worth knowing about.
        console.warn(`Ignoring unreadable stored setting "${key}"`);
      }
    }
    return map;
  }

  /**
   * Stores a setting value as JSON, replacing any previous value.
   */
  public setSetting(key: string, value: unknown): void {
    this.requireDb()
      .prepare(
        `INSERT INTO settings (key, value) VALUES (@key, @value)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`
      )
      .run({ key, value: JSON.stringify(value) });
  }

  /**
   * Removes every stored setting and returns how many were removed.
   */
  public clearSettings(): number {
    return this.requireDb().prepare('DELETE FROM settings').run().changes;
  }

  /**
   * Inserts a finished run and returns the stored entry.
   */
  public insertRun(record: RunRecordInput): RunHistoryEntry {
    const row = this.requireDb()
      .prepare(
        `INSERT INTO runs (
          started_at,
          finished_at,
          file_count,
          ready_count,
          adjust_count,
          error_count,
          average_lufs,
          average_lra,
          csv_path,
          html_path,
          settings_json
        ) VALUES (
          @startedAt,
          @finishedAt,
          @fileCount,
          @ready,
          @adjust,
          @error,
          @averageLufs,
          @averageLra,
          @csvPath,
          @htmlPath,
          @settingsJson
        )
        RETURNING *`
      )
      .get({
        startedAt: record.startedAt,
        finishedAt: record.finishedAt,
        fileCount: record.summary.fileCount,
        ready: record.summary.ready,
        adjust: record.summary.adjust,
        error: record.summary.error,
        averageLufs: record.summary.averageIntegratedLufs,
        averageLra: record.summary.averageLoudnessRangeLu,
        csvPath: record.csvPath,
        htmlPath: record.htmlPath,
        settingsJson: JSON.stringify(record.settings)
      }) as DbRow | undefined;

    if (!row) {
      throw new Error('Failed to persist run record.');
    }
    return this.mapRunRow(row, record.settings);
  }

  /**
   * Lists the most recent runs, newest first.
   */
  public listRuns(limit = 10): RunHistoryEntry[] {
    const rows = this.requireDb()
      .prepare('SELECT * FROM runs ORDER BY started_at DESC, id DESC LIMIT ?')
      .all(limit) as DbRow[];
    return rows.map((row) => this.mapRunRow(row, this.parseSettingsSnapshot(row.settings_json)));
  }

  /**
   * Maps a raw database row to the strongly typed history shape.
   */
  private mapRunRow(row: DbRow, settings: AnalysisSettings): RunHistoryEntry {
    return {
      id: numberOrZero(row.id),
      startedAt: numberOrZero(row.started_at),
      finishedAt: numberOrZero(row.finished_at),
      summary: {
        fileCount: numberOrZero(row.file_count),
        ready: numberOrZero(row.ready_count),
        adjust: numberOrZero(row.adjust_count),
        error: numberOrZero(row.error_count),
        averageIntegratedLufs: numberOrNull(row.average_lufs),
        averageLoudnessRangeLu: numberOrNull(row.average_lra)
      },
      csvPath: stringOrEmpty(row.csv_path),
      htmlPath: stringOrEmpty(row.html_path),
      settings
    };
  }

  /**
   * Decodes a stored settings snapshot, filling fields that no longer validate with defaults.
   */
  private parseSettingsSnapshot(value: unknown): AnalysisSettings {
    let decoded: unknown = {};
    try {
      decoded = JSON.parse(stringOrEmpty(value) || '{}');
    } catch {
      return { ...DEFAULT_SETTINGS };
    }
    const parsed = settingsOverrideSchema.safeParse(decoded);
    return parsed.success ? { ...DEFAULT_SETTINGS, ...parsed.data } : { ...DEFAULT_SETTINGS };
  }

  /**
   * Lazy accessor ensuring the database has been initialised.
   */
  private requireDb(): BetterSqliteDatabase {
    if (!this.db) {
      throw new Error('Database connection has not been initialised.');
    }
    return this.db;
  }

  /**
   * Applies the schema for the application.
   */
  private applySchema(): void {
    this.requireDb().exec(`
      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        started_at INTEGER NOT NULL,
        finished_at INTEGER NOT NULL,
        file_count INTEGER NOT NULL,
        ready_count INTEGER NOT NULL,
        adjust_count INTEGER NOT NULL,
        error_count INTEGER NOT NULL,
        average_lufs REAL,
        average_lra REAL,
        csv_path TEXT NOT NULL,
        html_path TEXT NOT NULL,
        settings_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
    `);
  }
}
