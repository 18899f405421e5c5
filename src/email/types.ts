/**
 * Email Module Type Definitions
 *
 * Types for:
 * - MIME message construction (MimeMessageInput)
 * - Transport seam shared by SendGrid and Gmail (EmailTransport)
 * - Per-category delivery accounting (DeliveryResult)
 */

import type { DeliveryProvider, RunMode } from '../config/index.js';
import type { ReportArtifact, ReportAttachment } from '../report/index.js';

// ---------------------------------------------------------------------------
// MIME Message
// ---------------------------------------------------------------------------

export interface MimeMessageInput {
  from: string;
  to: readonly string[];
  subject: string;
  html: string;
  attachments?: readonly ReportAttachment[];
  /** Multipart boundary; generated when omitted */
  boundary?: string;
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/** One message addressed to every recipient of a category */
export interface OutboundEmail {
  from: string;
  to: readonly string[];
  subject: string;
  html: string;
  attachments: readonly ReportAttachment[];
}

export interface RejectedAddress {
  address: string;
  reason: string;
}

export interface TransportOutcome {
  accepted: string[];
  rejected: RejectedAddress[];
}

/**
 * Sends one message. Throws DeliveryError when the provider refuses the
 * whole request; per-address refusals go in `rejected`.
 */
export interface EmailTransport {
  readonly provider: DeliveryProvider;
  send(email: OutboundEmail): Promise<TransportOutcome>;
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export interface DeliveryResult {
  category: string;
  delivered: string[];
  failed: RejectedAddress[];
}

export interface DispatchPlan {
  artifact: ReportArtifact;
  recipients: readonly string[];
}

export interface DispatchOptions {
  /** Test mode prefixes every subject with [TEST] */
  mode?: RunMode;
  /** Secret values scrubbed from failure reasons */
  secrets?: ReadonlyArray<string | null | undefined>;
}

export interface DispatchAllOptions extends DispatchOptions {
  concurrency: number;
}
