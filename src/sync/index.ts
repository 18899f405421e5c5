// ============================================================================
// Sync Module — Barrel Export
// ============================================================================
//
// NOT exported: DropboxApiError internals beyond the class itself — consumers
// see SyncError from the synchronizer.

export type {
  RemoteSource,
  RemoteFileEntry,
  RemoteFileMeta,
  RemoteStore,
  SyncedFile,
  SyncResult,
  SyncOptions,
} from './types.js';

export { syncRemoteFiles, DEFAULT_SYNC_CONCURRENCY } from './synchronizer.js';
export { buildRemoteFileSet, forecastDirectory, FORECAST_ENTRY, VBA_ENTRY, TEMPLATES_ENTRY } from './file-set.js';
export { createDropboxStore, DropboxApiError } from './dropbox-client.js';
export { installRepoTemplates, REPO_TEMPLATES_DIR } from './repo-templates.js';
