/**
 * Configuration Type Definitions
 *
 * The resolved ReportConfig is built once per run by resolveConfig() and is
 * deep-frozen before anything downstream sees it. Components receive it as a
 * value; none of them read process.env.
 */

import type { z } from 'zod';
import type { BaseConfigSchema } from './schema.js';

// ---------------------------------------------------------------------------
// Run Mode
// ---------------------------------------------------------------------------

/** Decided once at the entry point and threaded through every call */
export type RunMode = 'production' | 'test';

export const RUN_MODES: readonly RunMode[] = ['production', 'test'];

// ---------------------------------------------------------------------------
// Base Document
// ---------------------------------------------------------------------------

/** Parsed base document (snake_case keys, as committed in config.json) */
export type BaseConfigDocument = z.infer<typeof BaseConfigSchema>;

/** Path keys that have a `ci_`-prefixed execution-environment counterpart */
export const OVERRIDABLE_KEYS = ['root_path', 'reports_folder', 'vba_path', 'templates_path'] as const;

export type OverridableKey = (typeof OVERRIDABLE_KEYS)[number];

/** Keys whose override must exist when running in test mode */
export const TEST_REQUIRED_OVERRIDES: readonly OverridableKey[] = ['root_path', 'reports_folder', 'vba_path'];

export const OVERRIDE_PREFIX = 'ci_';

// ---------------------------------------------------------------------------
// Resolved Configuration
// ---------------------------------------------------------------------------

export interface QuarterlyBudget {
  readonly q1: number;
  readonly q2: number;
  readonly q3: number;
  readonly q4: number;
}

export interface AccountExecutiveConfig {
  readonly enabled: boolean;
  readonly budgets: QuarterlyBudget;
}

/** Folder layout inside the team Dropbox namespace */
export interface RemoteLayout {
  readonly forecastFolder: string;
  readonly vbaFile: string;
  readonly templatesFolder: string;
}

export type DeliveryProvider = 'sendgrid' | 'gmail';

export interface GoogleOAuthCredentials {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly refreshToken: string;
}

/** Values that only ever come from the environment */
export interface SecretValues {
  readonly dropboxAppKey: string;
  readonly dropboxAppSecret: string;
  readonly dropboxRefreshToken: string;
  readonly dropboxTeamMemberId: string;
  readonly sendgridApiKey: string | null;
  readonly google: GoogleOAuthCredentials | null;
}

export interface RecipientSettings {
  /** Category name -> production address list, as supplied by the environment */
  readonly categories: Readonly<Record<string, readonly string[]>>;
  /** Single verification address used for every category in test mode */
  readonly testAddress: string | null;
}

export interface ReportConfig {
  readonly mode: RunMode;
  /** True when the `ci_` path overrides replaced the production paths */
  readonly overridesApplied: boolean;
  readonly rootPath: string;
  readonly reportsFolder: string;
  readonly vbaPath: string;
  readonly templatesPath: string;
  readonly accountExecutives: Readonly<Record<string, AccountExecutiveConfig>>;
  /** Names of enabled account executives, in document order */
  readonly activeAccountExecutives: readonly string[];
  readonly remote: RemoteLayout;
  readonly useRepoTemplates: boolean;
  readonly sync: { readonly concurrency: number };
  readonly delivery: { readonly provider: DeliveryProvider };
  readonly senderAddress: string;
  readonly recipients: RecipientSettings;
  readonly secrets: SecretValues;
}

/** Environment record the resolver reads secrets from */
export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface ResolveOptions {
  /** Defaults to process.env (after dotenv has loaded .env) */
  env?: EnvSource;
  /**
   * Apply the `ci_` path overrides in production mode too. Used by scheduled
   * runs on a CI runner where the production paths do not exist.
   */
  ci?: boolean;
}
