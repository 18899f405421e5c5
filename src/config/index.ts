// ============================================================================
// Config Module — Barrel Export
// ============================================================================

export type {
  RunMode,
  ReportConfig,
  ResolveOptions,
  EnvSource,
  AccountExecutiveConfig,
  QuarterlyBudget,
  RemoteLayout,
  DeliveryProvider,
  SecretValues,
  RecipientSettings,
  GoogleOAuthCredentials,
} from './types.js';

export { RUN_MODES } from './types.js';

export {
  resolveConfig,
  materializeConfig,
  describeConfig,
  secretValues,
  recipientEnvKey,
  parseAddressList,
  DEFAULT_CONFIG_PATH,
  MANAGEMENT_CATEGORY,
} from './resolver.js';
