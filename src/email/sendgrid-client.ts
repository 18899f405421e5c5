/**
 * SendGrid Transport
 *
 * Default delivery provider. One v3 mail/send request per message: every
 * recipient in a single personalization, the HTML body as content and each
 * attachment base64-encoded. Any 2xx means every address was accepted.
 */

import { DeliveryError, errorMessage } from '../errors.js';
import type { EmailTransport, OutboundEmail, TransportOutcome } from './types.js';

export const SENDGRID_API_URL = 'https://api.sendgrid.com/v3/mail/send';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface SendGridTransportOptions {
  apiUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function createSendGridTransport(apiKey: string, options: SendGridTransportOptions = {}): EmailTransport {
  const apiUrl = options.apiUrl ?? SENDGRID_API_URL;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    provider: 'sendgrid',
    async send(email: OutboundEmail): Promise<TransportOutcome> {
      let response: Response;
      try {
        response = await fetchImpl(apiUrl, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(buildPayload(email)),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        throw new DeliveryError(`SendGrid request failed: ${errorMessage(err)}`, undefined, { cause: err });
      }

      if (!response.ok) {
        const errorBody = await response.text();
        throw new DeliveryError(`SendGrid API error: ${response.status} - ${errorBody}`, response.status);
      }

      console.log('[sendgrid] Message accepted', {
        status: response.status,
        messageId: response.headers.get('X-Message-Id'),
        recipientCount: email.to.length,
      });

      return { accepted: [...email.to], rejected: [] };
    },
  };
}

/** v3 mail/send request body */
export function buildPayload(email: OutboundEmail): Record<string, unknown> {
  return {
    personalizations: [{ to: email.to.map(address => ({ email: address })) }],
    from: { email: email.from },
    subject: email.subject,
    content: [{ type: 'text/html', value: email.html }],
    ...(email.attachments.length > 0
      ? {
          attachments: email.attachments.map(attachment => ({
            content: attachment.content.toString('base64'),
            filename: attachment.filename,
            type: attachment.contentType,
            disposition: 'attachment',
          })),
        }
      : {}),
  };
}
