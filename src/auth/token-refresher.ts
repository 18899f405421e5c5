/**
 * Dropbox Access Token Refresher
 *
 * Exchanges the long-lived refresh token for a short-lived access token at the
 * start of every run. Confirmed endpoint:
 * - POST https://api.dropboxapi.com/oauth2/token
 *   body: grant_type=refresh_token&refresh_token=...
 *   auth: HTTP Basic appKey:appSecret
 *
 * Failure handling:
 * - Non-2xx, network failure, or a response without access_token -> AuthError
 * - No retry and no cached fallback; a refresh failure ends the run
 *
 * Security:
 * - The token is returned to the caller only; it is never written to
 *   process.env, disk, or logs (only its length and expiry are logged)
 */

import { z } from 'zod';
import { AuthError, errorMessage, redactSecrets } from '../errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const DROPBOX_TOKEN_URL = 'https://api.dropboxapi.com/oauth2/token';

export interface RefreshCredentials {
  appKey: string;
  appSecret: string;
  refreshToken: string;
}

/** Short-lived access credential, scoped to the current run */
export interface AccessToken {
  readonly value: string;
  /** Expiry hint from the endpoint; null when it sent none */
  readonly expiresAt: Date | null;
  /** Log-safe rendering */
  readonly masked: string;
}

export interface RefreshOptions {
  tokenUrl?: string;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional(),
});

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Mints a fresh access token from the refresh credential.
 *
 * @throws AuthError when the endpoint returns no usable token
 */
export async function refreshAccessToken(
  credentials: RefreshCredentials,
  options: RefreshOptions = {},
): Promise<AccessToken> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const now = options.now ?? (() => new Date());
  const secrets = [credentials.appKey, credentials.appSecret, credentials.refreshToken];

  const basic = Buffer.from(`${credentials.appKey}:${credentials.appSecret}`).toString('base64');
  const body = new URLSearchParams({
    grant_type: 'refresh_token',
    refresh_token: credentials.refreshToken,
  });

  let response: Response;
  try {
    response = await fetchImpl(options.tokenUrl ?? DROPBOX_TOKEN_URL, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${basic}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: body.toString(),
    });
  } catch (err) {
    throw new AuthError(
      `Token refresh request failed: ${redactSecrets(errorMessage(err), secrets)}`,
      'AUTH_NETWORK',
    );
  }

  if (!response.ok) {
    const text = await response.text().catch(() => '');
    throw new AuthError(
      `Token refresh rejected: ${response.status} ${response.statusText} ${redactSecrets(text, secrets)}`.trim(),
      response.status === 400 || response.status === 401 ? 'AUTH_INVALID_GRANT' : 'AUTH_REFRESH_FAILED',
    );
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch {
    throw new AuthError('Token refresh returned a non-JSON body', 'AUTH_NO_TOKEN');
  }

  const parsed = TokenResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new AuthError('Token refresh response has no usable access_token', 'AUTH_NO_TOKEN');
  }

  const { access_token: value, expires_in: expiresIn } = parsed.data;
  const expiresAt = expiresIn ? new Date(now().getTime() + expiresIn * 1000) : null;

  const masked = `***(${value.length})`;

  console.log('[auth] Access token refreshed', {
    token: masked,
    expiresAt: expiresAt?.toISOString() ?? null,
  });

  return Object.freeze({ value, expiresAt, masked });
}
