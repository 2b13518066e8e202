import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import process from 'process';
import console from 'console';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  RunRecordSchema,
  WeatherHistorySchema,
  type RunRecord,
  type RunStatus,
  type WeatherHistory,
} from '../models';
import { StoreError } from './errors';
import { emptyHistory } from './history';

export interface DataStoreOptions {
  dataDir: string;
  historyFile?: string;
  runRecordFile?: string;
  now?: () => Date;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Owns the two persisted documents: the forecast history and the run record.
 * Every write goes to its own temp file that is renamed over the target, so a
 * crash leaves either the old or the new document on disk, and overlapping
 * runs end with the last rename winning.
 */
export class DataStore {
  readonly historyPath: string;
  readonly runRecordPath: string;
  private readonly now: () => Date;

  constructor(options: DataStoreOptions) {
    this.historyPath = path.join(options.dataDir, options.historyFile ?? 'weather_data.json');
    this.runRecordPath = path.join(options.dataDir, options.runRecordFile ?? 'run_record.json');
    this.now = options.now ?? (() => new Date());
  }

  async loadHistory(): Promise<WeatherHistory> {
    const history = await this.readDocument(this.historyPath, WeatherHistorySchema);
    return history ?? emptyHistory();
  }

  async saveHistory(history: WeatherHistory): Promise<void> {
    await this.writeDocument(this.historyPath, history);
    console.info(`Saved ${history.records.length} records to ${this.historyPath}`);
  }

  async loadRunRecord(): Promise<RunRecord | null> {
    return this.readDocument(this.runRecordPath, RunRecordSchema);
  }

  async recordRun(status: RunStatus, error?: string): Promise<RunRecord> {
    const record: RunRecord = {
      last_run_timestamp: this.now().toISOString(),
      last_run_status: status,
      ...(error !== undefined ? { last_error: error } : {}),
    };
    await this.writeDocument(this.runRecordPath, record);
    return record;
  }

  private async readDocument<T>(
    file: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T | null> {
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new StoreError(`Could not read ${file}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreError(`${file} is not valid JSON`, { cause: err });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new StoreError(`${file} is corrupt${where}: ${issue?.message ?? 'invalid content'}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private async writeDocument(file: string, data: unknown): Promise<void> {
    const tempFile = `${file}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(tempFile, JSON.stringify(data, null, 2) + '\n', 'utf-8');
      await fs.rename(tempFile, file);
    } catch (err) {
      await fs.rm(tempFile, { force: true }).catch((rmErr: unknown) => {
        console.warn(`Could not remove ${tempFile}:`, rmErr);
      });
      throw new StoreError(`Could not write ${file}`, { cause: err });
    }
  }
}
