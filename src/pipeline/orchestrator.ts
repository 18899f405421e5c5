/**
 * Pipeline Orchestrator
 *
 * Runs the weekly report stages in strict order:
 *
 *   Init -> ConfigResolved -> CredentialRefreshed -> DataSynced
 *        -> ReportsGenerated -> Dispatched -> Done
 *
 * Any stage failure moves straight to Failed and skips the rest. Completed
 * stages are not rolled back; the next run regenerates everything.
 *
 * Delivery is the one stage that does not stop at the first error: every
 * category is attempted, and any category not fully delivered fails the run
 * afterwards.
 *
 * runPipeline never throws. Its RunSummary is the only result, and error
 * messages in it have every known secret redacted.
 */

import { refreshAccessToken } from '../auth/index.js';
import type { AccessToken } from '../auth/index.js';
import {
  describeConfig,
  materializeConfig,
  resolveConfig,
  secretValues,
} from '../config/index.js';
import type { ReportConfig } from '../config/index.js';
import { createTransport, dispatchAll, isFullyDelivered } from '../email/index.js';
import type { DeliveryResult, DispatchPlan } from '../email/index.js';
import {
  ConfigError,
  DeliveryError,
  GenerationError,
  PipelineError,
  errorMessage,
  redactSecrets,
} from '../errors.js';
import type { ErrorKind } from '../errors.js';
import { createSummaryReportGenerator } from '../report/index.js';
import type { ReportArtifact } from '../report/index.js';
import { knownCategories, routeRecipients } from '../routing/index.js';
import { buildRemoteFileSet, installRepoTemplates, syncRemoteFiles } from '../sync/index.js';
import type { SyncedFile } from '../sync/index.js';
import type { PipelineDeps, PipelineStage, PipelineState, RunOptions, RunSummary } from './types.js';

export const DISPATCH_CONCURRENCY = 3;

/** Error kind recorded when a stage fails with something that is not a PipelineError */
const STAGE_ERROR_KIND: Record<PipelineStage, ErrorKind> = {
  ConfigResolved: 'ConfigError',
  CredentialRefreshed: 'AuthError',
  DataSynced: 'SyncError',
  ReportsGenerated: 'GenerationError',
  Dispatched: 'DeliveryError',
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export async function runPipeline(options: RunOptions, overrides: Partial<PipelineDeps> = {}): Promise<RunSummary> {
  const deps = withDefaults(overrides);
  const startedAt = deps.now();

  let state: PipelineState = 'Init';
  let attempting: PipelineStage = 'ConfigResolved';
  const secrets: string[] = [];
  const files: SyncedFile[] = [];
  const artifacts: ReportArtifact[] = [];
  const deliveries: DeliveryResult[] = [];

  const transition = (to: PipelineState): void => {
    console.log(`[pipeline] ${state} -> ${to}`);
    state = to;
  };

  const summarize = (error?: RunSummary['error']): RunSummary => ({
    status: error ? 'Failed' : 'Done',
    mode: options.mode,
    stage: state,
    ...(error ? { failedStage: attempting, error } : {}),
    files: files.map(file => ({ entry: file.entry, localPath: file.localPath, bytes: file.bytes })),
    artifacts: artifacts.map(artifact => ({
      category: artifact.category,
      subject: artifact.subject,
      attachments: artifact.attachments.length,
    })),
    deliveries,
    startedAt: startedAt.toISOString(),
    finishedAt: deps.now().toISOString(),
  });

  try {
    // -- Configuration ------------------------------------------------------
    const config = await deps.resolveConfig(options.configPath, options.mode, {
      env: options.env,
      ci: options.ci,
    });
    secrets.push(...secretValues(config));
    console.log('[pipeline] Configuration resolved', describeConfig(config));

    const categories = selectCategories(config, options.categories);
    if (options.materializePath) {
      await deps.materializeConfig(config, options.materializePath);
    }
    transition('ConfigResolved');

    // -- Credential + sync --------------------------------------------------
    attempting = 'CredentialRefreshed';
    const synced = await syncWithFreshToken(config, deps, token => {
      secrets.push(token.value);
      transition('CredentialRefreshed');
      attempting = 'DataSynced';
    });
    files.push(...synced);
    transition('DataSynced');

    // -- Reports ------------------------------------------------------------
    attempting = 'ReportsGenerated';
    const generated = await generateReports(config, files, deps);
    artifacts.push(...generated.filter(artifact => categories.has(artifact.category)));
    const missing = [...categories].filter(category => !artifacts.some(artifact => artifact.category === category));
    if (missing.length > 0) {
      throw new GenerationError(`Report generator produced no artifacts for: ${missing.join(', ')}`);
    }
    transition('ReportsGenerated');

    // -- Delivery -----------------------------------------------------------
    attempting = 'Dispatched';
    const plans: DispatchPlan[] = artifacts.map(artifact => ({
      artifact,
      recipients: routeRecipients(config, options.mode, artifact.category),
    }));
    const transport = deps.createTransport(config);
    deliveries.push(
      ...(await dispatchAll(plans, config.senderAddress, transport, {
        concurrency: DISPATCH_CONCURRENCY,
        mode: options.mode,
        secrets,
      })),
    );

    const undelivered = deliveries.filter(result => !isFullyDelivered(result)).map(result => result.category);
    if (undelivered.length > 0) {
      throw new DeliveryError(
        `Delivery failed for ${undelivered.length} of ${deliveries.length} categories: ${undelivered.join(', ')}`,
      );
    }
    transition('Dispatched');
    transition('Done');

    return summarize();
  } catch (err) {
    const error = {
      kind: err instanceof PipelineError ? err.kind : STAGE_ERROR_KIND[attempting],
      message: redactSecrets(errorMessage(err), secrets),
    };
    console.error('[pipeline] Stage failed', { stage: attempting, kind: error.kind, message: error.message });

    const summary = summarize(error);
    console.log(`[pipeline] ${state} -> Failed`);
    return summary;
  }
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

/**
 * Mints the access token and runs the sync with it. The token is handed only
 * to `onRefreshed` (for redaction) and the synchronizer, and is released on
 * success and on every failure path.
 */
async function syncWithFreshToken(
  config: ReportConfig,
  deps: PipelineDeps,
  onRefreshed: (token: AccessToken) => void,
): Promise<SyncedFile[]> {
  const token = await deps.refreshAccessToken({
    appKey: config.secrets.dropboxAppKey,
    appSecret: config.secrets.dropboxAppSecret,
    refreshToken: config.secrets.dropboxRefreshToken,
  });
  onRefreshed(token);

  const result = await deps.syncRemoteFiles(token, buildRemoteFileSet(config), process.cwd(), {
    teamMemberId: config.secrets.dropboxTeamMemberId,
    concurrency: config.sync.concurrency,
  });
  if (!config.useRepoTemplates) return result.files;

  return [...result.files, ...(await deps.installRepoTemplates(config.templatesPath))];
}

async function generateReports(
  config: ReportConfig,
  files: readonly SyncedFile[],
  deps: PipelineDeps,
): Promise<ReportArtifact[]> {
  try {
    return await deps.generator.generate({ config, files });
  } catch (err) {
    if (err instanceof PipelineError) throw err;
    throw new GenerationError(`Report generation failed: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Categories this run dispatches to: every known category, or the requested
 * subset.
 *
 * @throws ConfigError for a requested category the configuration does not know
 */
export function selectCategories(config: ReportConfig, requested: readonly string[] | undefined): Set<string> {
  const known = knownCategories(config);
  if (!requested || requested.length === 0) return new Set(known);

  const unknown = requested.filter(category => !known.includes(category));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown recipient category: ${unknown.join(', ')}`, 'CONFIG_UNKNOWN_CATEGORY');
  }
  return new Set(requested);
}

function withDefaults(overrides: Partial<PipelineDeps>): PipelineDeps {
  return {
    resolveConfig,
    materializeConfig,
    refreshAccessToken: credentials => refreshAccessToken(credentials),
    syncRemoteFiles,
    installRepoTemplates: targetDir => installRepoTemplates(targetDir),
    generator: createSummaryReportGenerator(),
    createTransport,
    now: () => new Date(),
    ...overrides,
  };
}
