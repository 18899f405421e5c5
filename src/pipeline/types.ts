/**
 * Pipeline Type Definitions
 */

import type { AccessToken, RefreshCredentials } from '../auth/index.js';
import type { EnvSource, ReportConfig, ResolveOptions, RunMode } from '../config/index.js';
import type { DeliveryResult, EmailTransport } from '../email/index.js';
import type { ErrorKind } from '../errors.js';
import type { ReportGenerator } from '../report/index.js';
import type { RemoteFileEntry, SyncedFile, SyncOptions, SyncResult } from '../sync/index.js';

// ---------------------------------------------------------------------------
// State Machine
// ---------------------------------------------------------------------------

export type PipelineState =
  | 'Init'
  | 'ConfigResolved'
  | 'CredentialRefreshed'
  | 'DataSynced'
  | 'ReportsGenerated'
  | 'Dispatched'
  | 'Done'
  | 'Failed';

/** States a stage can be attempting to reach */
export type PipelineStage = Exclude<PipelineState, 'Init' | 'Done' | 'Failed'>;

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface RunOptions {
  mode: RunMode;
  configPath: string;
  /** Apply the ci_ path overrides in production mode */
  ci?: boolean;
  /** Restrict dispatch to these recipient categories */
  categories?: readonly string[];
  /** Write the merged configuration (no secrets) to this path */
  materializePath?: string;
  env?: EnvSource;
}

/** Collaborators, replaceable for tests */
export interface PipelineDeps {
  resolveConfig: (basePath: string, mode: RunMode, options: ResolveOptions) => Promise<ReportConfig>;
  materializeConfig: (config: ReportConfig, outPath: string) => Promise<void>;
  refreshAccessToken: (credentials: RefreshCredentials) => Promise<AccessToken>;
  syncRemoteFiles: (
    accessToken: AccessToken,
    fileSet: readonly RemoteFileEntry[],
    destinationRoot: string,
    options: SyncOptions,
  ) => Promise<SyncResult>;
  /** Fills the templates folder from the repository when `useRepoTemplates` is set */
  installRepoTemplates: (targetDir: string) => Promise<SyncedFile[]>;
  generator: ReportGenerator;
  createTransport: (config: ReportConfig) => EmailTransport;
  now: () => Date;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export interface RunSummary {
  status: 'Done' | 'Failed';
  mode: RunMode;
  /** Last state reached before the run terminated */
  stage: PipelineState;
  /** Stage that was being attempted when the run failed */
  failedStage?: PipelineStage;
  error?: { kind: ErrorKind; message: string };
  files: { entry: string; localPath: string; bytes: number }[];
  artifacts: { category: string; subject: string; attachments: number }[];
  deliveries: DeliveryResult[];
  startedAt: string;
  finishedAt: string;
}
