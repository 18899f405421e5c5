// ============================================================================
// Email Module — Barrel Export
// ============================================================================
//
// Public API for the email module. All downstream consumers should import
// from this barrel rather than individual files.

export type {
  MimeMessageInput,
  OutboundEmail,
  RejectedAddress,
  TransportOutcome,
  EmailTransport,
  DeliveryResult,
  DispatchPlan,
  DispatchOptions,
  DispatchAllOptions,
} from './types.js';

export { encodeMimeMessage, buildMimeMessage } from './mime.js';
export { createSendGridTransport, SENDGRID_API_URL } from './sendgrid-client.js';
export type { SendGridTransportOptions } from './sendgrid-client.js';
export { createGmailTransport } from './gmail-client.js';
export type { GmailTransportOptions, RawMessageSender } from './gmail-client.js';
export {
  dispatchArtifact,
  dispatchAll,
  isFullyDelivered,
  createTransport,
  TEST_SUBJECT_PREFIX,
} from './dispatcher.js';
