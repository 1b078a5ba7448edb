/**
 * Storage module
 */

import { ConfigError, type CrawlConfig } from '../config/index.js';
import { JsonlStore } from './jsonl-store.js';
import type { ArticleStore, BackupOptions } from './types.js';

export const SUPPORTED_FORMATS = ['jsonl'] as const;

/**
 * Open the store described by the `storage` section of the crawl config
 */
export async function createStore(
  storage: CrawlConfig['storage'],
  now?: () => Date
): Promise<ArticleStore> {
  if (storage.format !== 'jsonl') {
    throw new ConfigError('Invalid storage configuration', [
      `storage.format: unsupported format "${storage.format}" (supported: ${SUPPORTED_FORMATS.join(', ')})`,
    ]);
  }

  const { enabled, directory, maxFiles } = storage.backup;
  const backup: BackupOptions | undefined =
    enabled && directory && maxFiles ? { directory, maxFiles } : undefined;

  return JsonlStore.open({
    outputFile: storage.outputFile,
    fsync: storage.fsync,
    ...(backup ? { backup } : {}),
    ...(now ? { now } : {}),
  });
}

export { JsonlStore, type JsonlStoreOptions } from './jsonl-store.js';
export { BackupRotator, backupFileName } from './backup.js';
export { toRecord, fromRecord, encodeRecord, decodeRecord, articleRecordSchema } from './record.js';
export { StoreClosedError, type ArticleStore, type BackupOptions } from './types.js';
