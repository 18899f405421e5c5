/**
 * Configuration Resolver
 *
 * Builds the single immutable ReportConfig for a run by overlaying three
 * sources, highest priority last:
 *
 *   1. Base document (config.json, validated with zod)
 *   2. Execution-mode overrides — `ci_root_path` etc. replace their production
 *      counterparts in test mode (and in CI production runs when asked)
 *   3. Environment — credentials and addresses, which never live in the
 *      committed document
 *
 * Environment variables read here (and nowhere else):
 * - DROPBOX_APP_KEY / DROPBOX_APP_SECRET / DROPBOX_REFRESH_TOKEN / DROPBOX_TEAM_MEMBER_ID
 * - SENDGRID_API_KEY (provider "sendgrid")
 * - GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET / GOOGLE_REFRESH_TOKEN (provider "gmail")
 * - SENDER_EMAIL, TEST_EMAIL, MANAGEMENT_EMAILS, AE_EMAILS_<NAME>
 * - USE_REPO_TEMPLATES, DELIVERY_PROVIDER
 */

import 'dotenv/config';
import { readFile, mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { ConfigError, errorMessage, maskSecret } from '../errors.js';
import { BaseConfigSchema, ENVIRONMENT_ONLY_KEYS } from './schema.js';
import {
  OVERRIDABLE_KEYS,
  OVERRIDE_PREFIX,
  TEST_REQUIRED_OVERRIDES,
} from './types.js';
import type {
  BaseConfigDocument,
  DeliveryProvider,
  EnvSource,
  OverridableKey,
  ReportConfig,
  ResolveOptions,
  RunMode,
  SecretValues,
} from './types.js';

export const DEFAULT_CONFIG_PATH = 'config.json';

/** Recipient category that receives the roll-up report */
export const MANAGEMENT_CATEGORY = 'management';

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Loads, overlays, validates and freezes the run configuration.
 *
 * @throws ConfigError when the document is missing or malformed, or when any
 *   required key is still absent after the merge
 */
export async function resolveConfig(
  basePath: string,
  mode: RunMode,
  options: ResolveOptions = {},
): Promise<ReportConfig> {
  const env = options.env ?? process.env;
  const document = await loadBaseDocument(basePath);

  const applyOverrides = mode === 'test' || options.ci === true;
  const paths = applyOverrides ? overlayPaths(document, mode) : pickPaths(document);

  const missing: string[] = [];
  const invalid: string[] = [];

  const rootPath = paths.root_path;
  const reportsFolder = paths.reports_folder;
  const vbaPath = paths.vba_path;
  if (!rootPath) missing.push('root_path');
  if (!reportsFolder) missing.push('reports_folder');
  if (!vbaPath) missing.push('vba_path');

  // Account executives, in document order
  const accountExecutives = document.account_executives;
  const activeAccountExecutives = Object.entries(accountExecutives)
    .filter(([, ae]) => ae.enabled)
    .map(([name]) => name);
  if (activeAccountExecutives.length === 0) {
    missing.push('account_executives (at least one enabled)');
  }
  if (activeAccountExecutives.some(name => name.toLowerCase() === MANAGEMENT_CATEGORY)) {
    invalid.push(`account executive name "${MANAGEMENT_CATEGORY}" is reserved`);
  }

  // Environment layer
  const provider = resolveProvider(env.DELIVERY_PROVIDER, document.delivery_provider, invalid);
  const secrets = readSecrets(env, provider, missing);

  const senderAddress = trimmed(env.SENDER_EMAIL);
  if (!senderAddress) {
    missing.push('SENDER_EMAIL');
  } else if (!isAddress(senderAddress)) {
    invalid.push('SENDER_EMAIL is not an email address');
  }

  const testAddress = trimmed(env.TEST_EMAIL) || null;
  if (mode === 'test') {
    if (!testAddress) missing.push('TEST_EMAIL');
    else if (!isAddress(testAddress)) invalid.push('TEST_EMAIL is not an email address');
  }

  const categories: Record<string, string[]> = {};
  for (const name of activeAccountExecutives) {
    categories[name] = parseAddressList(env[recipientEnvKey(name)]);
  }
  categories[MANAGEMENT_CATEGORY] = parseAddressList(env.MANAGEMENT_EMAILS);

  // Production lists only matter in production; test mode never reads them
  if (mode === 'production') {
    for (const [category, addresses] of Object.entries(categories)) {
      const envKey = category === MANAGEMENT_CATEGORY ? 'MANAGEMENT_EMAILS' : recipientEnvKey(category);
      if (addresses.length === 0) {
        missing.push(envKey);
        continue;
      }
      const bad = addresses.filter(address => !isAddress(address)).length;
      if (bad > 0) invalid.push(`${envKey} contains ${bad} invalid address(es)`);
    }
  }

  if (missing.length > 0 || invalid.length > 0) {
    throw new ConfigError(
      'Configuration incomplete after merge:\n' +
        [...missing.map(k => `  - missing ${k}`), ...invalid.map(k => `  - ${k}`)].join('\n'),
      'CONFIG_MISSING_KEYS',
    );
  }

  // Unreachable once the missing-key check above has passed
  if (!rootPath || !reportsFolder || !vbaPath) {
    throw new ConfigError('Path keys missing after merge', 'CONFIG_MISSING_KEYS');
  }

  const useRepoTemplates = env.USE_REPO_TEMPLATES !== undefined
    ? env.USE_REPO_TEMPLATES.toLowerCase() === 'true'
    : document.use_repo_templates;

  const config: ReportConfig = {
    mode,
    overridesApplied: applyOverrides,
    rootPath,
    reportsFolder,
    vbaPath,
    templatesPath: paths.templates_path ?? path.join(rootPath, 'email_templates'),
    accountExecutives,
    activeAccountExecutives,
    remote: {
      forecastFolder: document.dropbox_forecast_path,
      vbaFile: document.dropbox_vba_path,
      templatesFolder: document.dropbox_templates_path,
    },
    useRepoTemplates,
    sync: { concurrency: document.sync_concurrency },
    delivery: { provider },
    senderAddress,
    recipients: { categories, testAddress },
    secrets,
  };

  return deepFreeze(config);
}

/**
 * Writes the merged, non-secret shape back out as a snake_case document for
 * consumers that only understand config.json. The base document is untouched.
 */
export async function materializeConfig(config: ReportConfig, outPath: string): Promise<void> {
  const accountExecutives: Record<string, { enabled: boolean; budgets: Record<string, number> }> = {};
  for (const [name, ae] of Object.entries(config.accountExecutives)) {
    accountExecutives[name] = { enabled: ae.enabled, budgets: { ...ae.budgets } };
  }

  const document = {
    root_path: config.rootPath,
    reports_folder: config.reportsFolder,
    vba_path: config.vbaPath,
    templates_path: config.templatesPath,
    account_executives: accountExecutives,
    dropbox_forecast_path: config.remote.forecastFolder,
    dropbox_vba_path: config.remote.vbaFile,
    dropbox_templates_path: config.remote.templatesFolder,
    use_repo_templates: config.useRepoTemplates,
    sync_concurrency: config.sync.concurrency,
    delivery_provider: config.delivery.provider,
  };

  await mkdir(path.dirname(path.resolve(outPath)), { recursive: true });
  await writeFile(outPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
  console.log('[config] Materialized merged configuration', { outPath });
}

/** Log-safe view of the resolved configuration (no addresses, masked secrets) */
export function describeConfig(config: ReportConfig): Record<string, unknown> {
  return {
    mode: config.mode,
    overridesApplied: config.overridesApplied,
    rootPath: config.rootPath,
    reportsFolder: config.reportsFolder,
    vbaPath: config.vbaPath,
    activeAccountExecutives: config.activeAccountExecutives,
    provider: config.delivery.provider,
    senderDomain: config.senderAddress.split('@')[1],
    recipientCounts: Object.fromEntries(
      Object.entries(config.recipients.categories).map(([name, list]) => [name, list.length]),
    ),
    dropboxRefreshToken: maskSecret(config.secrets.dropboxRefreshToken),
    sendgridApiKey: maskSecret(config.secrets.sendgridApiKey),
  };
}

/** Every secret value in the config, for redaction of outbound error text */
export function secretValues(config: ReportConfig): string[] {
  const { secrets } = config;
  return [
    secrets.dropboxAppKey,
    secrets.dropboxAppSecret,
    secrets.dropboxRefreshToken,
    secrets.sendgridApiKey ?? '',
    secrets.google?.clientSecret ?? '',
    secrets.google?.refreshToken ?? '',
  ].filter(value => value.length > 0);
}

/** "John Doe" -> "AE_EMAILS_JOHN_DOE" */
export function recipientEnvKey(accountExecutive: string): string {
  return `AE_EMAILS_${accountExecutive.trim().toUpperCase().replace(/[^A-Z0-9]+/g, '_')}`;
}

/** Splits a comma-separated address list, dropping blanks */
export function parseAddressList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(address => address.trim())
    .filter(address => address.length > 0);
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

async function loadBaseDocument(basePath: string): Promise<BaseConfigDocument> {
  let raw: string;
  try {
    raw = await readFile(basePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Configuration file not found or unreadable: ${basePath}`,
      'CONFIG_NOT_FOUND',
      { cause: err },
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `Configuration file is not valid JSON: ${basePath} (${errorMessage(err)})`,
      'CONFIG_MALFORMED',
      { cause: err },
    );
  }

  const parsed = BaseConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(
      `Configuration file failed validation: ${basePath}\n${issues.join('\n')}`,
      'CONFIG_SCHEMA',
    );
  }

  const ignored = ENVIRONMENT_ONLY_KEYS.filter(key => key in parsed.data);
  if (ignored.length > 0) {
    console.warn('[config] Ignoring keys that are only read from the environment:', ignored);
  }

  return parsed.data;
}

type PathValues = Partial<Record<OverridableKey, string>>;

function pickPaths(document: BaseConfigDocument): PathValues {
  return {
    root_path: document.root_path,
    reports_folder: document.reports_folder,
    vba_path: document.vba_path,
    templates_path: document.templates_path,
  };
}

/**
 * Replaces each path with its `ci_` counterpart. In test mode the counterpart
 * is mandatory for the core paths so a test run can never touch production
 * folders.
 */
function overlayPaths(document: BaseConfigDocument, mode: RunMode): PathValues {
  const overrides: PathValues = {
    root_path: document.ci_root_path,
    reports_folder: document.ci_reports_folder,
    vba_path: document.ci_vba_path,
    templates_path: document.ci_templates_path,
  };

  if (mode === 'test') {
    const absent = TEST_REQUIRED_OVERRIDES.filter(key => !overrides[key]);
    if (absent.length > 0) {
      throw new ConfigError(
        'Test mode requires execution-environment overrides for: ' +
          absent.map(key => `${OVERRIDE_PREFIX}${key}`).join(', '),
        'CONFIG_MISSING_OVERRIDE',
      );
    }
  }

  // Once root_path is overridden, templates_path never falls back to the
  // production value: without its own override it defaults under the new root
  const base = pickPaths(document);
  const merged: PathValues = {};
  for (const key of OVERRIDABLE_KEYS) {
    const followsRoot = key === 'templates_path' && overrides.root_path !== undefined;
    merged[key] = followsRoot ? overrides[key] : overrides[key] ?? base[key];
  }
  return merged;
}

function resolveProvider(
  fromEnv: string | undefined,
  fromDocument: DeliveryProvider,
  invalid: string[],
): DeliveryProvider {
  if (fromEnv === undefined || fromEnv === '') return fromDocument;
  if (fromEnv === 'sendgrid' || fromEnv === 'gmail') return fromEnv;
  invalid.push(`DELIVERY_PROVIDER must be "sendgrid" or "gmail"`);
  return fromDocument;
}

function readSecrets(env: EnvSource, provider: DeliveryProvider, missing: string[]): SecretValues {
  const require = (key: string): string => {
    const value = trimmed(env[key]);
    if (!value) missing.push(key);
    return value;
  };

  const dropboxAppKey = require('DROPBOX_APP_KEY');
  const dropboxAppSecret = require('DROPBOX_APP_SECRET');
  const dropboxRefreshToken = require('DROPBOX_REFRESH_TOKEN');
  const dropboxTeamMemberId = require('DROPBOX_TEAM_MEMBER_ID');

  let sendgridApiKey: string | null = trimmed(env.SENDGRID_API_KEY) || null;
  let google: SecretValues['google'] = null;

  if (provider === 'sendgrid') {
    sendgridApiKey = require('SENDGRID_API_KEY') || null;
  } else {
    const clientId = require('GOOGLE_CLIENT_ID');
    const clientSecret = require('GOOGLE_CLIENT_SECRET');
    const refreshToken = require('GOOGLE_REFRESH_TOKEN');
    if (clientId && clientSecret && refreshToken) {
      google = { clientId, clientSecret, refreshToken };
    }
  }

  return {
    dropboxAppKey,
    dropboxAppSecret,
    dropboxRefreshToken,
    dropboxTeamMemberId,
    sendgridApiKey,
    google,
  };
}

function trimmed(value: string | undefined): string {
  return value?.trim() ?? '';
}

function isAddress(value: string): boolean {
  const at = value.indexOf('@');
  return at > 0 && at < value.length - 1;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
