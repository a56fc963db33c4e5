import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ChangeEntry, ChangeHistory, WatchState } from '../types/index.js';
import { StorageError, errorMessage } from '../types/errors.js';
import { Logger } from './logger.js';

const MAX_HISTORY_ENTRIES = 10;

const watchStateSchema = z.object({
  lastKnownIp: z.string().min(1).nullable(),
  lastCheckAt: z.string().nullable().default(null),
  updatedAt: z.string()
});

const changeHistorySchema = z.object({
  updates: z.array(z.object({
    id: z.string(),
    timestamp: z.string(),
    oldIp: z.string().nullable(),
    newIp: z.string(),
    notified: z.boolean()
  }))
});

export class StorageService {
  readonly statePath: string;
  readonly historyPath: string;

  constructor(readonly dataDir: string) {
    this.statePath = path.join(dataDir, 'state.json');
    this.historyPath = path.join(dataDir, 'history.json');
  }

  /**
   * Create the data directory and empty state/history files if missing.
   */
  initialize(): void {
    try {
      if (!fs.existsSync(this.dataDir)) {
        fs.mkdirSync(this.dataDir, { recursive: true });
        Logger.info('Created data directory', { dataDir: this.dataDir });
      }
    } catch (error) {
      throw new StorageError(`Failed to create data directory: ${errorMessage(error)}`, this.dataDir);
    }

    if (!fs.existsSync(this.statePath)) {
      this.writeState({ lastKnownIp: null, lastCheckAt: null, updatedAt: new Date().toISOString() });
      Logger.info('Created default state.json');
    }

    if (!fs.existsSync(this.historyPath)) {
      this.writeHistory({ updates: [] });
      Logger.info('Created default history.json');
    }
  }

  readState(): WatchState {
    if (!fs.existsSync(this.statePath)) {
      return { lastKnownIp: null, lastCheckAt: null, updatedAt: new Date().toISOString() };
    }
    return this.readJson(this.statePath, watchStateSchema);
  }

  writeState(state: WatchState): void {
    this.writeJson(this.statePath, { ...state, updatedAt: new Date().toISOString() });
  }

  readHistory(): ChangeHistory {
    if (!fs.existsSync(this.historyPath)) {
      return { updates: [] };
    }
    return this.readJson(this.historyPath, changeHistorySchema);
  }

  writeHistory(history: ChangeHistory): void {
    this.writeJson(this.historyPath, history);
  }

  addChangeEntry(entry: ChangeEntry): void {
    const history = this.readHistory();
    history.updates.unshift(entry); // Newest first

    if (history.updates.length > MAX_HISTORY_ENTRIES) {
      history.updates = history.updates.slice(0, MAX_HISTORY_ENTRIES);
    }

    this.writeHistory(history);
  }

  updateLastKnownIp(ip: string, checkedAt: string = new Date().toISOString()): void {
    const state = this.readState();
    this.writeState({ ...state, lastKnownIp: ip, lastCheckAt: checkedAt });
  }

  recordCheck(checkedAt: string = new Date().toISOString()): void {
    const state = this.readState();
    this.writeState({ ...state, lastCheckAt: checkedAt });
  }

  private readJson<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      Logger.error(`Failed to read JSON data from \`${filePath}\``, error instanceof Error ? error : undefined);
      throw new StorageError(`Failed to read ${path.basename(filePath)}: ${errorMessage(error)}`, filePath);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      Logger.error(`Unexpected contents in \`${filePath}\``, undefined, { issues });
      throw new StorageError(`Invalid ${path.basename(filePath)}: ${issues.join('; ')}`, filePath);
    }
    return parsed.data;
  }

  private writeJson(filePath: string, data: unknown): void {
    try {
      fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
      Logger.debug(`Wrote JSON data to \`${filePath}\``);
    } catch (error) {
      Logger.error(`Failed to write JSON data to \`${filePath}\``, error instanceof Error ? error : undefined);
      throw new StorageError(`Failed to write ${path.basename(filePath)}: ${errorMessage(error)}`, filePath);
    }
  }
}
