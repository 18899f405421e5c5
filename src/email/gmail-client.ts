/**
 * Gmail API Transport
 *
 * Alternative delivery provider for mailboxes on Google Workspace. Sends
 * through `users.messages.send` with OAuth2 refresh-token credentials taken
 * from the resolved configuration (GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET,
 * GOOGLE_REFRESH_TOKEN). The refresh token determines the sending mailbox.
 *
 * Error handling:
 * - Auth errors (401, 403, invalid_grant) become DeliveryError with code
 *   GMAIL_AUTH_ERROR in the message so operators know to re-authorize
 * - Everything else becomes DeliveryError with the upstream status
 */

import { google } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import type { GoogleOAuthCredentials } from '../config/index.js';
import { DeliveryError, errorMessage } from '../errors.js';
import { encodeMimeMessage } from './mime.js';
import type { EmailTransport, OutboundEmail, TransportOutcome } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Sends a base64url MIME message and returns the Gmail message id */
export type RawMessageSender = (raw: string) => Promise<string>;

export interface GmailTransportOptions {
  /** Replaces the googleapis client (used by tests) */
  sendRaw?: RawMessageSender;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

function createOAuth2Auth(credentials: GoogleOAuthCredentials): OAuth2Client {
  const oauth2Client = new OAuth2Client(credentials.clientId, credentials.clientSecret);
  oauth2Client.setCredentials({ refresh_token: credentials.refreshToken });
  return oauth2Client;
}

function createGmailSender(credentials: GoogleOAuthCredentials): RawMessageSender {
  const gmail = google.gmail({ version: 'v1', auth: createOAuth2Auth(credentials) });

  return async (raw: string): Promise<string> => {
    const response = await gmail.users.messages.send({
      userId: 'me',
      requestBody: { raw },
    });

    const messageId = response.data.id;
    if (!messageId) {
      throw new Error('Gmail API returned sent message with no ID');
    }
    return messageId;
  };
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export function createGmailTransport(
  credentials: GoogleOAuthCredentials,
  options: GmailTransportOptions = {},
): EmailTransport {
  const sendRaw = options.sendRaw ?? createGmailSender(credentials);

  return {
    provider: 'gmail',
    async send(email: OutboundEmail): Promise<TransportOutcome> {
      const raw = encodeMimeMessage({
        from: email.from,
        to: email.to,
        subject: email.subject,
        html: email.html,
        attachments: email.attachments,
      });

      try {
        const messageId = await sendRaw(raw);
        console.log('[gmail] Message sent', { messageId, recipientCount: email.to.length });
      } catch (err) {
        throw toDeliveryError(err);
      }

      return { accepted: [...email.to], rejected: [] };
    },
  };
}

// ---------------------------------------------------------------------------
// Error Mapping
// ---------------------------------------------------------------------------

function toDeliveryError(err: unknown): DeliveryError {
  const message = errorMessage(err);
  const status = statusOf(err);

  if (
    status === 401 ||
    status === 403 ||
    message.includes('invalid_grant') ||
    message.includes('unauthorized')
  ) {
    return new DeliveryError(
      `Gmail API auth error (GMAIL_AUTH_ERROR): ${message}. Check credentials and permissions.`,
      status,
      { cause: err },
    );
  }

  return new DeliveryError(`Gmail API error: ${message}`, status, { cause: err });
}

function statusOf(err: unknown): number | undefined {
  if (err !== null && typeof err === 'object' && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}
