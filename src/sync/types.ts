/**
 * Sync Module Type Definitions
 *
 * Types for:
 * - The remote file set a run requires (RemoteFileEntry, RemoteSource)
 * - The remote store seam the synchronizer talks to (RemoteStore)
 * - Sync results handed to report generation (SyncResult, SyncedFile)
 */

// ---------------------------------------------------------------------------
// Remote File Set
// ---------------------------------------------------------------------------

/** Where an entry's file(s) come from in the remote namespace */
export type RemoteSource =
  /** A single file at a fixed path */
  | { kind: 'file'; path: string }
  /** Newest file (by server_modified) in a folder with the given extension; `~` lock files ignored */
  | { kind: 'latest'; folder: string; extension: string }
  /** Every file directly inside a folder */
  | { kind: 'folder'; folder: string };

export interface RemoteFileEntry {
  /** Logical name used in logs and errors, e.g. "forecast" */
  name: string;
  source: RemoteSource;
  /**
   * Destination. For 'file' sources this is the file path; for 'latest' and
   * 'folder' sources it is the directory the file(s) land in. Relative paths
   * resolve against the sync destination root.
   */
  localPath: string;
  /** A required entry that cannot be retrieved aborts the run */
  required: boolean;
}

// ---------------------------------------------------------------------------
// Remote Store
// ---------------------------------------------------------------------------

export interface RemoteFileMeta {
  name: string;
  path: string;
  /** ISO-8601 timestamp from the store */
  serverModified: string;
}

/**
 * Narrow seam over the remote file store. The Dropbox implementation lives in
 * dropbox-client.ts; tests supply an in-memory one.
 */
export interface RemoteStore {
  /** Files (not folders) directly inside `folder` */
  listFolder(folder: string, signal?: AbortSignal): Promise<RemoteFileMeta[]>;
  download(remotePath: string, signal?: AbortSignal): Promise<Buffer>;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface SyncedFile {
  /** Logical entry name this file belongs to */
  entry: string;
  remotePath: string;
  localPath: string;
  bytes: number;
}

export interface SyncResult {
  files: SyncedFile[];
  /** Optional entries that could not be retrieved */
  skipped: string[];
}

export interface SyncOptions {
  teamMemberId: string;
  concurrency?: number;
  /** Overrides the Dropbox store built from the access token */
  store?: RemoteStore;
  signal?: AbortSignal;
}
