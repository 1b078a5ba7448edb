/**
 * Backup rotation
 *
 * Before a write, the output file is copied to
 * `articles_backup_<yyyyMMdd_HHmmss>.jsonl`, then the oldest snapshots beyond
 * `maxFiles` are deleted. Names sort by age, so pruning is a sort by name.
 * Every failure here is a warning; a write never fails because of a backup.
 */

import { copyFile, readdir, unlink } from 'fs/promises';
import { join } from 'path';
import { format } from 'date-fns';
import { logger } from '../utils/logger.js';
import type { BackupOptions } from './types.js';

const BACKUP_PREFIX = 'articles_backup_';
const BACKUP_EXTENSION = '.jsonl';
const BACKUP_NAME = /^articles_backup_\d{8}_\d{6}\.jsonl$/;

export function backupFileName(date: Date): string {
  return `${BACKUP_PREFIX}${format(date, 'yyyyMMdd_HHmmss')}${BACKUP_EXTENSION}`;
}

export interface BackupRotatorOptions extends BackupOptions {
  now?: () => Date;
}

export class BackupRotator {
  private readonly directory: string;
  private readonly maxFiles: number;
  private readonly now: () => Date;

  constructor(options: BackupRotatorOptions) {
    this.directory = options.directory;
    this.maxFiles = options.maxFiles;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Snapshot `sourcePath` and prune. Returns the snapshot path, or null when
   * the snapshot could not be taken.
   */
  async rotate(sourcePath: string): Promise<string | null> {
    const target = join(this.directory, backupFileName(this.now()));

    try {
      await copyFile(sourcePath, target);
    } catch (error) {
      logger.warn({ source: sourcePath, target, error }, 'Backup snapshot failed');
      return null;
    }

    await this.prune();
    return target;
  }

  /**
   * Snapshot file names, oldest first
   */
  async list(): Promise<string[]> {
    const entries = await readdir(this.directory);
    return entries.filter((name) => BACKUP_NAME.test(name)).sort();
  }

  private async prune(): Promise<void> {
    let snapshots: string[];
    try {
      snapshots = await this.list();
    } catch (error) {
      logger.warn({ directory: this.directory, error }, 'Could not list backups');
      return;
    }

    const excess = snapshots.slice(0, Math.max(0, snapshots.length - this.maxFiles));
    for (const name of excess) {
      try {
        await unlink(join(this.directory, name));
        logger.debug({ file: name }, 'Removed old backup');
      } catch (error) {
        logger.warn({ file: name, error }, 'Could not remove old backup');
      }
    }
  }
}
