// ============================================================================
// Pipeline Error Types — Typed errors for each failing stage
// ============================================================================

/** Discriminator surfaced in the run summary and exit diagnostics */
export type ErrorKind =
  | 'ConfigError'
  | 'AuthError'
  | 'SyncError'
  | 'GenerationError'
  | 'DeliveryError';

/**
 * Base error for everything the pipeline raises on purpose.
 * NEVER includes secrets (tokens, API keys) in messages — callers that embed
 * upstream text run it through redactSecrets first.
 */
export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly code: string;

  constructor(kind: ErrorKind, message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
    this.code = code;
  }
}

/**
 * Thrown when the base document is missing or malformed, when a required key
 * is absent after merge, or when an unknown recipient category is requested.
 */
export class ConfigError extends PipelineError {
  constructor(message: string, code: string = 'CONFIG_INVALID', options?: { cause?: unknown }) {
    super('ConfigError', message, code, options);
  }
}

/**
 * Thrown when the token endpoint does not return a usable access token.
 * Always fatal: the synchronizer has no other way to authenticate.
 */
export class AuthError extends PipelineError {
  constructor(message: string, code: string = 'AUTH_REFRESH_FAILED', options?: { cause?: unknown }) {
    super('AuthError', message, code, options);
  }
}

export type SyncFailureReason = 'missing-file' | 'transfer-error';

/**
 * Thrown when a required remote file is missing or cannot be transferred.
 * Fatal for the current run only; the next run starts from scratch.
 */
export class SyncError extends PipelineError {
  readonly reason: SyncFailureReason;
  /** Logical entry name or remote path of the file that failed */
  readonly file: string;

  constructor(reason: SyncFailureReason, file: string, message: string, options?: { cause?: unknown }) {
    super(
      'SyncError',
      message,
      reason === 'missing-file' ? 'SYNC_MISSING_FILE' : 'SYNC_TRANSFER_FAILED',
      options,
    );
    this.reason = reason;
    this.file = file;
  }
}

/** Report building failed. The generator is opaque to the pipeline. */
export class GenerationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GenerationError', message, 'REPORT_GENERATION_FAILED', options);
  }
}

/**
 * Raised by transports for a failed send. The dispatcher converts it into
 * per-address failures instead of letting it abort other categories.
 */
export class DeliveryError extends PipelineError {
  readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super('DeliveryError', message, 'DELIVERY_FAILED', options);
    this.statusCode = statusCode;
  }
}

// ---------------------------------------------------------------------------
// Secret hygiene
// ---------------------------------------------------------------------------

/**
 * Replaces every occurrence of a known secret value with a fixed marker.
 * Values shorter than 4 characters are ignored (they would mangle ordinary text).
 */
export function redactSecrets(text: string, secrets: ReadonlyArray<string | null | undefined>): string {
  let result = text;
  for (const secret of secrets) {
    if (!secret || secret.length < 4) continue;
    result = result.split(secret).join('[REDACTED]');
  }
  return result;
}

/** Log-safe rendering of a secret: its length and last two characters only */
export function maskSecret(value: string | null | undefined): string {
  if (!value) return '(unset)';
  if (value.length <= 8) return `***(${value.length})`;
  return `***${value.slice(-2)}(${value.length})`;
}

/** Error message of anything thrown, without assuming it is an Error */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
