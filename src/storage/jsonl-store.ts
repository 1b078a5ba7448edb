/**
 * JSONL Article Store
 *
 * One JSON object per line, append-only. An in-memory fingerprint index is
 * rebuilt from the file on open and makes `exists` O(1). A fingerprint is
 * reserved in the index before its write is queued and released again if the
 * write fails, so two concurrent saves of equal content produce one record.
 * Appends, backup snapshots and pruning run one at a time under a mutex.
 */

import { createReadStream } from 'fs';
import { mkdir, open, stat } from 'fs/promises';
import { dirname } from 'path';
import { createInterface } from 'readline';
import type { Article, ArticleRecord, BatchSaveResult, SaveStatus, StoreStats } from '../types/index.js';
import { Mutex } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import { BackupRotator } from './backup.js';
import { decodeRecord, encodeRecord, fromRecord } from './record.js';
import { StoreClosedError, type ArticleStore, type BackupOptions } from './types.js';

export interface JsonlStoreOptions {
  outputFile: string;
  /** fsync after every append (default true) */
  fsync?: boolean;
  backup?: BackupOptions;
  now?: () => Date;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export class JsonlStore implements ArticleStore {
  private readonly index = new Set<string>();
  private readonly writeLock = new Mutex();
  private readonly outputFile: string;
  private readonly fsync: boolean;
  private readonly backups: BackupRotator | null;
  private recordCount = 0;
  private closing: Promise<void> | null = null;

  private constructor(options: JsonlStoreOptions) {
    this.outputFile = options.outputFile;
    this.fsync = options.fsync ?? true;
    this.backups = options.backup
      ? new BackupRotator({ ...options.backup, ...(options.now ? { now: options.now } : {}) })
      : null;
  }

  /**
   * Create directories and rebuild the fingerprint index
   */
  static async open(options: JsonlStoreOptions): Promise<JsonlStore> {
    await mkdir(dirname(options.outputFile), { recursive: true });
    if (options.backup) {
      await mkdir(options.backup.directory, { recursive: true });
    }

    const store = new JsonlStore(options);
    await store.rebuildIndex();

    logger.info(
      { path: options.outputFile, records: store.recordCount, backups: Boolean(options.backup) },
      'Article store ready'
    );
    return store;
  }

  exists(fingerprint: string): boolean {
    return this.index.has(fingerprint);
  }

  async save(article: Article): Promise<SaveStatus> {
    this.assertOpen();

    if (this.index.has(article.fingerprint)) {
      return 'duplicate';
    }

    let line: string;
    try {
      line = `${encodeRecord(article)}\n`;
    } catch (error) {
      logger.error({ url: article.url, error }, 'Failed to encode article');
      return 'error';
    }

    this.index.add(article.fingerprint);

    try {
      await this.writeLock.runExclusive(async () => {
        await this.snapshot();
        await this.append(line);
      });
    } catch (error) {
      this.index.delete(article.fingerprint);
      logger.error({ url: article.url, path: this.outputFile, error }, 'Failed to write article');
      return 'error';
    }

    this.recordCount += 1;
    return 'saved';
  }

  /**
   * One snapshot, one handle and one write for the whole batch
   */
  async saveBatch(articles: readonly Article[]): Promise<BatchSaveResult> {
    this.assertOpen();

    const result: BatchSaveResult = { saved: 0, skipped: 0, failed: 0 };
    const reserved: string[] = [];
    const lines: string[] = [];

    for (const article of articles) {
      if (this.index.has(article.fingerprint)) {
        result.skipped += 1;
        continue;
      }

      try {
        lines.push(`${encodeRecord(article)}\n`);
      } catch (error) {
        logger.error({ url: article.url, error }, 'Failed to encode article, skipping');
        result.failed += 1;
        continue;
      }

      this.index.add(article.fingerprint);
      reserved.push(article.fingerprint);
    }

    if (lines.length === 0) {
      return result;
    }

    try {
      await this.writeLock.runExclusive(async () => {
        await this.snapshot();
        await this.append(lines.join(''));
      });
    } catch (error) {
      for (const fingerprint of reserved) {
        this.index.delete(fingerprint);
      }
      logger.error({ count: lines.length, path: this.outputFile, error }, 'Failed to write batch');
      result.failed += lines.length;
      return result;
    }

    this.recordCount += lines.length;
    result.saved = lines.length;
    return result;
  }

  async loadAll(): Promise<Article[]> {
    const articles: Article[] = [];
    for await (const article of this.stream()) {
      articles.push(article);
    }
    return articles;
  }

  /**
   * Records in append order; unreadable lines and repeated fingerprints are
   * skipped. Each call reads the file from the start.
   */
  async *stream(): AsyncGenerator<Article> {
    const seen = new Set<string>();
    for await (const record of this.readRecords()) {
      if (seen.has(record.content_hash)) continue;
      seen.add(record.content_hash);
      yield fromRecord(record);
    }
  }

  async stats(): Promise<StoreStats> {
    const base = { count: this.recordCount, format: 'jsonl' as const, path: this.outputFile };

    if (!(await fileExists(this.outputFile))) {
      return { ...base, sizeBytes: 0, lastModified: null };
    }

    const info = await stat(this.outputFile);
    return { ...base, sizeBytes: info.size, lastModified: info.mtime };
  }

  /**
   * Waits for queued writes. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.writeLock.runExclusive(async () => {
        logger.info({ path: this.outputFile, records: this.recordCount }, 'Article store closed');
      });
    }
    return this.closing;
  }

  private assertOpen(): void {
    if (this.closing) {
      throw new StoreClosedError(this.outputFile);
    }
  }

  private async rebuildIndex(): Promise<void> {
    for await (const record of this.readRecords()) {
      if (this.index.has(record.content_hash)) continue;
      this.index.add(record.content_hash);
      this.recordCount += 1;
    }
  }

  private async *readRecords(): AsyncGenerator<ArticleRecord> {
    if (!(await fileExists(this.outputFile))) {
      return;
    }

    const lines = createInterface({
      input: createReadStream(this.outputFile, { encoding: 'utf-8' }),
      crlfDelay: Infinity,
    });

    let lineNumber = 0;
    for await (const line of lines) {
      lineNumber += 1;
      if (!line.trim()) continue;

      const decoded = decodeRecord(line);
      if (!decoded.ok) {
        logger.warn({ path: this.outputFile, line: lineNumber, error: decoded.error }, 'Skipping unreadable record');
        continue;
      }
      yield decoded.record;
    }
  }

  private async snapshot(): Promise<void> {
    if (!this.backups || !(await fileExists(this.outputFile))) {
      return;
    }
    await this.backups.rotate(this.outputFile);
  }

  private async append(data: string): Promise<void> {
    const handle = await open(this.outputFile, 'a');
    try {
      await handle.appendFile(data, 'utf-8');
      if (this.fsync) {
        await handle.sync();
      }
    } finally {
      await handle.close();
    }
  }
}
