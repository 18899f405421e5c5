/**
 * Tests for the Dropbox access token refresher
 *
 * fetch is replaced by a vi.fn per test; no network access.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { refreshAccessToken, DROPBOX_TOKEN_URL } from '../token-refresher.js';
import { AuthError } from '../../errors.js';

const CREDENTIALS = {
  appKey: 'test-app-key',
  appSecret: 'test-app-secret',
  refreshToken: 'test-refresh-token',
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('refreshAccessToken', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('posts a refresh_token grant with basic client auth', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(
      jsonResponse({ access_token: 'sl.test-access', token_type: 'bearer', expires_in: 14400 }),
    );

    await refreshAccessToken(CREDENTIALS, { fetchImpl });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(DROPBOX_TOKEN_URL);
    expect(init.method).toBe('POST');
    expect(init.headers.Authorization).toBe(
      `Basic ${Buffer.from('test-app-key:test-app-secret').toString('base64')}`,
    );
    expect(init.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
    expect(init.body).toBe('grant_type=refresh_token&refresh_token=test-refresh-token');
  });

  it('returns the token with an expiry derived from expires_in', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(
      jsonResponse({ access_token: 'sl.test-access', expires_in: 3600 }),
    );
    const now = () => new Date('2026-01-05T02:00:00.000Z');

    const token = await refreshAccessToken(CREDENTIALS, { fetchImpl, now });

    expect(token.value).toBe('sl.test-access');
    expect(token.expiresAt?.toISOString()).toBe('2026-01-05T03:00:00.000Z');
    expect(token.masked).toBe('***(14)');
    expect(Object.isFrozen(token)).toBe(true);
  });

  it('logs the masked token, never the token', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(jsonResponse({ access_token: 'sl.test-access' }));

    const token = await refreshAccessToken(CREDENTIALS, { fetchImpl });

    expect(console.log).toHaveBeenCalledWith('[auth] Access token refreshed', {
      token: token.masked,
      expiresAt: null,
    });
    expect(token.masked).toBe('***(14)');
  });

  it.each([
    ['absent', { token_type: 'bearer' }],
    ['null', { access_token: null }],
    ['empty', { access_token: '' }],
  ])('throws AuthError when access_token is %s', async (_label, body) => {
    const fetchImpl = vi.fn().mockResolvedValue(jsonResponse(body));

    const err = await refreshAccessToken(CREDENTIALS, { fetchImpl }).catch(e => e);

    expect(err).toBeInstanceOf(AuthError);
    expect(err.code).toBe('AUTH_NO_TOKEN');
  });

  it('does not populate the environment with a token on failure', async () => {
    const before = { ...process.env };
    const fetchImpl = vi.fn().mockResolvedValue(jsonResponse({ access_token: null }));

    await expect(refreshAccessToken(CREDENTIALS, { fetchImpl })).rejects.toBeInstanceOf(AuthError);

    expect(process.env).toEqual(before);
  });

  it('throws AUTH_INVALID_GRANT on a 400 and redacts echoed secrets', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(
      new Response('{"error":"invalid_grant","detail":"test-refresh-token revoked"}', {
        status: 400,
        statusText: 'Bad Request',
      }),
    );

    const err = await refreshAccessToken(CREDENTIALS, { fetchImpl }).catch(e => e);

    expect(err).toBeInstanceOf(AuthError);
    expect(err.code).toBe('AUTH_INVALID_GRANT');
    expect(err.message).toContain('400 Bad Request');
    expect(err.message).toContain('[REDACTED] revoked');
    expect(err.message).not.toContain('test-refresh-token');
  });

  it('wraps network failures as AuthError without retrying', async () => {
    const fetchImpl = vi.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));

    const err = await refreshAccessToken(CREDENTIALS, { fetchImpl }).catch(e => e);

    expect(err).toBeInstanceOf(AuthError);
    expect(err.code).toBe('AUTH_NETWORK');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('throws AuthError for a non-JSON body', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));

    await expect(refreshAccessToken(CREDENTIALS, { fetchImpl })).rejects.toThrow(
      'Token refresh returned a non-JSON body',
    );
  });
});
