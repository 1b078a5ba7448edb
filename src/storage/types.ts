/**
 * Storage Types
 */

import type { Article, BatchSaveResult, SaveStatus, StoreStats } from '../types/index.js';

/**
 * Append-only article store, deduplicated by content fingerprint
 */
export interface ArticleStore {
  save(article: Article): Promise<SaveStatus>;
  saveBatch(articles: readonly Article[]): Promise<BatchSaveResult>;
  exists(fingerprint: string): boolean;
  loadAll(): Promise<Article[]>;
  stream(): AsyncGenerator<Article>;
  stats(): Promise<StoreStats>;
  close(): Promise<void>;
}

export interface BackupOptions {
  directory: string;
  maxFiles: number;
}

export class StoreClosedError extends Error {
  constructor(path: string) {
    super(`Store is closed: ${path}`);
    this.name = 'StoreClosedError';
  }
}
