import * as fs from 'fs';
import * as path from 'path';
import initSqlJs, { Database, SqlJsStatic, SqlValue } from 'sql.js';
import {
  ANALYSIS_MODES,
  AnalysisMode,
  GuildSettingKey,
  GuildSettings,
  GuildSettingValues,
  SettingsStore,
} from '../models/types';
import { SettingsValidationError } from '../models/errors';
import { logger } from '../utils/logger';

export const DEFAULT_ANALYSIS_MODE: AnalysisMode = 'debate';
export const DEFAULT_RECORDING_INTERVAL = 300;
export const MIN_RECORDING_INTERVAL = 60;

const IN_MEMORY = ':memory:';

let sqlJs: Promise<SqlJsStatic> | undefined; // the WASM module loads once per process

export function defaultGuildSettings(guildId: string): GuildSettings {
  return {
    guildId,
    apiKey: null,
    analysisMode: DEFAULT_ANALYSIS_MODE,
    recordingInterval: DEFAULT_RECORDING_INTERVAL,
  };
}

export function isAnalysisMode(value: string): value is AnalysisMode {
  return ANALYSIS_MODES.some(mode => mode === value);
}

export function validateSetting<K extends GuildSettingKey>(key: K, value: GuildSettingValues[K]): void {
  switch (key) {
    case 'apiKey':
      if (typeof value !== 'string' || value.trim() === '') {
        throw new SettingsValidationError('The API key must not be empty');
      }
      return;
    case 'analysisMode':
      if (typeof value !== 'string' || !isAnalysisMode(value)) {
        throw new SettingsValidationError(`Mode must be one of: ${ANALYSIS_MODES.join(', ')}`);
      }
      return;
    case 'recordingInterval':
      if (typeof value !== 'number' || !Number.isInteger(value) || value < MIN_RECORDING_INTERVAL) {
        throw new SettingsValidationError(`The interval must be a whole number of at least ${MIN_RECORDING_INTERVAL} seconds`);
      }
      return;
  }
}

export class SqliteSettingsStore implements SettingsStore {
  private db: Database;
  private databasePath: string;

  private constructor(db: Database, databasePath: string) {
    this.db = db;
    this.databasePath = databasePath;
  }

  // ':memory:' keeps the database in process only
  static async open(databasePath: string): Promise<SqliteSettingsStore> {
    sqlJs ??= initSqlJs();
    const SQL = await sqlJs;

    const persisted = databasePath !== IN_MEMORY && fs.existsSync(databasePath);
    const db = persisted ? new SQL.Database(fs.readFileSync(databasePath)) : new SQL.Database();
    db.run(`
      CREATE TABLE IF NOT EXISTS guild_settings (
        guild_id TEXT PRIMARY KEY,
        api_key TEXT,
        analysis_mode TEXT NOT NULL DEFAULT '${DEFAULT_ANALYSIS_MODE}',
        recording_interval INTEGER NOT NULL DEFAULT ${DEFAULT_RECORDING_INTERVAL}
      )
    `);

    logger.info('Settings database ready', { databasePath, persisted });
    return new SqliteSettingsStore(db, databasePath);
  }

  get(guildId: string): GuildSettings {
    const statement = this.db.prepare(
      'SELECT api_key, analysis_mode, recording_interval FROM guild_settings WHERE guild_id = ?'
    );
    try {
      statement.bind([guildId]);
      if (!statement.step()) {
        return defaultGuildSettings(guildId);
      }
      return toGuildSettings(guildId, statement.get());
    } finally {
      statement.free();
    }
  }

  set<K extends GuildSettingKey>(guildId: string, key: K, value: GuildSettingValues[K]): void {
    validateSetting(key, value);

    const updated: GuildSettings = { ...this.get(guildId), [key]: value };

    this.db.run(
      `INSERT INTO guild_settings (guild_id, api_key, analysis_mode, recording_interval)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(guild_id) DO UPDATE SET
         api_key = excluded.api_key,
         analysis_mode = excluded.analysis_mode,
         recording_interval = excluded.recording_interval`,
      [guildId, updated.apiKey, updated.analysisMode, updated.recordingInterval]
    );
    this.persist();

    logger.info(`Updated setting ${key} for guild ${guildId}`);
  }

  close(): void {
    this.db.close();
  }

  private persist(): void {
    if (this.databasePath === IN_MEMORY) return;

    fs.mkdirSync(path.dirname(this.databasePath), { recursive: true });
    fs.writeFileSync(this.databasePath, Buffer.from(this.db.export()));
  }
}

function toGuildSettings(guildId: string, [apiKey, analysisMode, recordingInterval]: SqlValue[]): GuildSettings {
  const defaults = defaultGuildSettings(guildId);
  return {
    guildId,
    apiKey: typeof apiKey === 'string' ? apiKey : null,
    analysisMode: typeof analysisMode === 'string' && isAnalysisMode(analysisMode) ? analysisMode : defaults.analysisMode,
    recordingInterval: typeof recordingInterval === 'number' ? recordingInterval : defaults.recordingInterval,
  };
}
