/**
 * Data Synchronizer
 *
 * Pulls the run's remote file set into local storage.
 *
 * Flow:
 * 1. Resolve each entry to concrete transfers (list folders for 'latest' and
 *    'folder' sources). A required entry that resolves to nothing aborts here.
 * 2. Download transfers through a bounded worker pool. Each file is tried
 *    exactly once, written to a temp file, then renamed into place.
 * 3. The first required failure aborts the pool: pending transfers never
 *    start, in-flight ones are discarded when they return.
 * 4. Verify every required file is present before returning.
 *
 * Completed downloads are left in place on failure; the next run overwrites them.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { AccessToken } from '../auth/index.js';
import { SyncError, errorMessage } from '../errors.js';
import { runWithConcurrency } from '../shared/worker-pool.js';
import { DropboxApiError, createDropboxStore } from './dropbox-client.js';
import type {
  RemoteFileEntry,
  RemoteStore,
  SyncedFile,
  SyncOptions,
  SyncResult,
} from './types.js';

export const DEFAULT_SYNC_CONCURRENCY = 3;

interface Transfer {
  entry: RemoteFileEntry;
  remotePath: string;
  localPath: string;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Synchronizes every entry of the file set into `destinationRoot`.
 *
 * @throws SyncError (missing-file | transfer-error) for the first required
 *   entry that could not be retrieved
 */
export async function syncRemoteFiles(
  accessToken: AccessToken,
  fileSet: readonly RemoteFileEntry[],
  destinationRoot: string,
  options: SyncOptions,
): Promise<SyncResult> {
  const store = options.store ?? createDropboxStore({
    accessToken: accessToken.value,
    teamMemberId: options.teamMemberId,
  });
  const concurrency = options.concurrency ?? DEFAULT_SYNC_CONCURRENCY;
  const skipped = new Set<string>();

  console.log('[sync] Starting', { entries: fileSet.length, concurrency });

  // 1. Resolve entries to concrete transfers
  const transfers: Transfer[] = [];
  for (const entry of fileSet) {
    try {
      transfers.push(...(await resolveEntry(store, entry, destinationRoot, options.signal)));
    } catch (err) {
      const failure = toSyncError(entry, err);
      if (entry.required) throw failure;
      console.warn('[sync] Optional entry unavailable, skipping', { entry: entry.name, reason: failure.reason });
      skipped.add(entry.name);
    }
  }

  // 2. Download with bounded concurrency, fail-fast on required files
  const failures: SyncError[] = [];
  const outcomes = await runWithConcurrency(
    transfers,
    async (transfer, _index, signal): Promise<SyncedFile | null> => {
      try {
        return await transferFile(store, transfer, signal);
      } catch (err) {
        const failure = toSyncError(transfer.entry, err, transfer.remotePath);
        if (!transfer.entry.required) {
          console.warn('[sync] Optional file failed, skipping', { entry: transfer.entry.name, reason: failure.reason });
          skipped.add(transfer.entry.name);
          return null;
        }
        failures.push(failure);
        throw failure;
      }
    },
    { concurrency, stopOnError: true, signal: options.signal },
  );

  // In-flight transfers discarded after the abort also land in failures; the first one is the cause
  const firstFailure = failures.at(0);
  if (firstFailure) {
    const notStarted = outcomes.filter(outcome => outcome.status === 'skipped').length;
    console.error('[sync] Aborted', {
      entry: firstFailure.file,
      reason: firstFailure.reason,
      notStarted,
    });
    throw firstFailure;
  }

  if (outcomes.some(outcome => outcome.status === 'skipped')) {
    throw new SyncError('transfer-error', '(all)', 'Synchronization cancelled before all files were transferred');
  }

  const files: SyncedFile[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'fulfilled' && outcome.value) files.push(outcome.value);
  }

  // 3. Every required file must be on disk before we hand control back
  for (const transfer of transfers) {
    if (!transfer.entry.required) continue;
    try {
      await stat(transfer.localPath);
    } catch (err) {
      throw new SyncError(
        'missing-file',
        transfer.entry.name,
        `Required file "${transfer.entry.name}" missing after sync: ${transfer.localPath}`,
        { cause: err },
      );
    }
  }

  console.log('[sync] Complete', {
    files: files.length,
    bytes: files.reduce((sum, file) => sum + file.bytes, 0),
    skipped: [...skipped],
  });

  return { files, skipped: [...skipped] };
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

async function resolveEntry(
  store: RemoteStore,
  entry: RemoteFileEntry,
  destinationRoot: string,
  signal: AbortSignal | undefined,
): Promise<Transfer[]> {
  const localBase = path.resolve(destinationRoot, entry.localPath);
  const { source } = entry;

  switch (source.kind) {
    case 'file':
      return [{ entry, remotePath: source.path, localPath: localBase }];

    case 'latest': {
      const extension = source.extension.toLowerCase();
      const candidates = (await store.listFolder(source.folder, signal))
        .filter(file => file.name.toLowerCase().endsWith(extension) && !file.name.startsWith('~'))
        .sort((a, b) => b.serverModified.localeCompare(a.serverModified));

      const latest = candidates[0];
      if (!latest) {
        throw new SyncError(
          'missing-file',
          entry.name,
          `No ${source.extension} files found for "${entry.name}" in ${source.folder}`,
        );
      }
      console.log('[sync] Selected latest file', { entry: entry.name, file: latest.name });
      return [{ entry, remotePath: latest.path, localPath: path.join(localBase, latest.name) }];
    }

    case 'folder': {
      const files = await store.listFolder(source.folder, signal);
      if (files.length === 0) {
        throw new SyncError(
          'missing-file',
          entry.name,
          `No files found for "${entry.name}" in ${source.folder}`,
        );
      }
      return files.map(file => ({ entry, remotePath: file.path, localPath: path.join(localBase, file.name) }));
    }
  }
}

async function transferFile(store: RemoteStore, transfer: Transfer, signal: AbortSignal): Promise<SyncedFile> {
  const content = await store.download(transfer.remotePath, signal);

  // Another transfer failed while this one was in flight; its result is discarded
  if (signal.aborted) {
    throw new Error('Transfer discarded: synchronization aborted');
  }

  await mkdir(path.dirname(transfer.localPath), { recursive: true });
  const tempPath = `${transfer.localPath}.${randomUUID().slice(0, 8)}.part`;
  try {
    await writeFile(tempPath, content);
    await rename(tempPath, transfer.localPath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }

  console.log('[sync] Downloaded', { entry: transfer.entry.name, file: path.basename(transfer.localPath), bytes: content.length });

  return {
    entry: transfer.entry.name,
    remotePath: transfer.remotePath,
    localPath: transfer.localPath,
    bytes: content.length,
  };
}

function toSyncError(entry: RemoteFileEntry, err: unknown, remotePath?: string): SyncError {
  if (err instanceof SyncError) return err;
  const target = remotePath ? `${entry.name} (${remotePath})` : entry.name;
  if (err instanceof DropboxApiError && err.isNotFound) {
    return new SyncError('missing-file', entry.name, `Required file not found: ${target}`, { cause: err });
  }
  return new SyncError(
    'transfer-error',
    entry.name,
    `Transfer failed for ${target}: ${errorMessage(err)}`,
    { cause: err },
  );
}
