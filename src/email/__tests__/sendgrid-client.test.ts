/**
 * Tests for the SendGrid transport
 *
 * fetch is injected as a vi.fn; no network access.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createSendGridTransport, buildPayload, SENDGRID_API_URL } from '../sendgrid-client.js';
import { DeliveryError } from '../../errors.js';
import type { OutboundEmail } from '../types.js';

const EMAIL: OutboundEmail = {
  from: 'reports@y.com',
  to: ['x@y.com', 'z@y.com'],
  subject: 'house - Your 2026 Weekly Sales Report',
  html: '<p>report</p>',
  attachments: [{ filename: 'Jan.xlsx', contentType: 'application/octet-stream', content: Buffer.from('abc') }],
};

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildPayload', () => {
  it('puts every recipient in one personalization with base64 attachments', () => {
    expect(buildPayload(EMAIL)).toEqual({
      personalizations: [{ to: [{ email: 'x@y.com' }, { email: 'z@y.com' }] }],
      from: { email: 'reports@y.com' },
      subject: 'house - Your 2026 Weekly Sales Report',
      content: [{ type: 'text/html', value: '<p>report</p>' }],
      attachments: [{ content: 'YWJj', filename: 'Jan.xlsx', type: 'application/octet-stream', disposition: 'attachment' }],
    });
  });

  it('omits the attachments key when there are none', () => {
    expect(buildPayload({ ...EMAIL, attachments: [] })).not.toHaveProperty('attachments');
  });
});

describe('createSendGridTransport', () => {
  it('posts to the mail/send endpoint with bearer auth', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response(null, { status: 202 }));
    const transport = createSendGridTransport('test-sendgrid-key', { fetchImpl });

    const outcome = await transport.send(EMAIL);

    expect(outcome).toEqual({ accepted: ['x@y.com', 'z@y.com'], rejected: [] });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(SENDGRID_API_URL);
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      Authorization: 'Bearer test-sendgrid-key',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(init.body)).toEqual(buildPayload(EMAIL));
    expect(transport.provider).toBe('sendgrid');
  });

  it('throws DeliveryError with the status for a non-2xx response', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('{"errors":[{"message":"bad"}]}', { status: 400 }));
    const transport = createSendGridTransport('test-sendgrid-key', { fetchImpl });

    const err = await transport.send(EMAIL).catch(e => e);

    expect(err).toBeInstanceOf(DeliveryError);
    expect(err.statusCode).toBe(400);
    expect(err.message).toBe('SendGrid API error: 400 - {"errors":[{"message":"bad"}]}');
  });

  it('throws DeliveryError when the request itself fails', async () => {
    const fetchImpl = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    const transport = createSendGridTransport('test-sendgrid-key', { fetchImpl });

    const err = await transport.send(EMAIL).catch(e => e);

    expect(err).toBeInstanceOf(DeliveryError);
    expect(err.statusCode).toBeUndefined();
    expect(err.message).toBe('SendGrid request failed: fetch failed');
  });
});
