/**
 * Snapshot Store
 *
 * Keeps the grades seen by the last successful run of each account, so the
 * next run only reports what changed.
 *
 * The default provider writes one JSON file per account
 * (`previous_grades_<accountId>.json`). Implement {@link SnapshotStore} to
 * keep snapshots elsewhere.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { parseSnapshot, type GradeRecord } from '../grades/index.js';
import { PersistenceError } from '../shared/errors.js';
import { getErrorMessage } from '../shared/utils/helpers.js';
import { createLogger, type Logger } from '../shared/utils/logger.js';

export interface SnapshotStore {
  /** Previous records, or an empty list when none are stored or readable */
  load(accountId: string): Promise<GradeRecord[]>;
  /** Replace the stored records. Throws PersistenceError on failure. */
  save(accountId: string, records: readonly GradeRecord[]): Promise<void>;
}

export interface FileSnapshotStoreConfig {
  /** Directory holding the snapshot files (default: cwd) */
  directory?: string;
  logger?: Logger;
}

export class FileSnapshotStore implements SnapshotStore {
  private directory: string;
  private logger: Logger;

  constructor(config: FileSnapshotStoreConfig = {}) {
    this.directory = config.directory ?? process.cwd();
    this.logger = config.logger ?? createLogger('SnapshotStore');
  }

  pathFor(accountId: string): string {
    const safeId = accountId.replace(/[^A-Za-z0-9_-]/g, '_');
    return join(this.directory, `previous_grades_${safeId}.json`);
  }

  async load(accountId: string): Promise<GradeRecord[]> {
    const path = this.pathFor(accountId);

    let raw: string;
    try {
      raw = await fs.readFile(path, 'utf-8');
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        this.logger.info(`No previous grades file for '${accountId}' at ${path}. Starting with empty grades.`);
      } else {
        this.logger.error(`Cannot read ${path}: ${getErrorMessage(error)}. Starting with empty grades for '${accountId}'.`);
      }
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      this.logger.error(`Error decoding JSON from ${path}: ${getErrorMessage(error)}. Starting with empty grades for '${accountId}'.`);
      return [];
    }

    const records = parseSnapshot(parsed);
    if (!records) {
      this.logger.error(`${path} is not a list of grade records. Starting with empty grades for '${accountId}'.`);
      return [];
    }

    this.logger.info(`Loaded ${records.length} previous grades for '${accountId}' from ${path}`);
    return records;
  }

  async save(accountId: string, records: readonly GradeRecord[]): Promise<void> {
    const path = this.pathFor(accountId);
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(path, JSON.stringify(records, null, 4), 'utf-8');
    } catch (error: unknown) {
      throw new PersistenceError(`Error saving grades for '${accountId}' to ${path}: ${getErrorMessage(error)}`, {
        accountId,
        cause: error
      });
    }
    this.logger.info(`Saved ${records.length} current grades for '${accountId}' to ${path}`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Create a file-backed snapshot store
 */
export function createFileSnapshotStore(config?: FileSnapshotStoreConfig): FileSnapshotStore {
  return new FileSnapshotStore(config);
}
