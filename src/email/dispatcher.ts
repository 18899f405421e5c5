/**
 * Distribution Dispatcher
 *
 * Sends each report artifact to its routed recipients and accounts for the
 * outcome per address. A failure in one category never aborts another, and
 * nothing is retried within a run.
 */

import type { ReportConfig } from '../config/index.js';
import { ConfigError, redactSecrets, errorMessage } from '../errors.js';
import type { ReportArtifact } from '../report/index.js';
import { runWithConcurrency } from '../shared/worker-pool.js';
import { createGmailTransport } from './gmail-client.js';
import { createSendGridTransport } from './sendgrid-client.js';
import type {
  DeliveryResult,
  DispatchAllOptions,
  DispatchOptions,
  DispatchPlan,
  EmailTransport,
} from './types.js';

export const TEST_SUBJECT_PREFIX = '[TEST] ';

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Sends one artifact. Never throws: a transport error marks every address
 * of the category failed with the (redacted) error message.
 */
export async function dispatchArtifact(
  artifact: ReportArtifact,
  recipients: readonly string[],
  senderAddress: string,
  transport: EmailTransport,
  options: DispatchOptions = {},
): Promise<DeliveryResult> {
  if (recipients.length === 0) {
    console.warn('[dispatch] No recipients for category', { category: artifact.category });
    return { category: artifact.category, delivered: [], failed: [] };
  }

  const subject = options.mode === 'test' ? `${TEST_SUBJECT_PREFIX}${artifact.subject}` : artifact.subject;

  try {
    const outcome = await transport.send({
      from: senderAddress,
      to: recipients,
      subject,
      html: artifact.html,
      attachments: artifact.attachments,
    });

    const result: DeliveryResult = {
      category: artifact.category,
      delivered: outcome.accepted,
      failed: outcome.rejected.map(rejection => ({
        address: rejection.address,
        reason: redactSecrets(rejection.reason, options.secrets ?? []),
      })),
    };

    console.log('[dispatch] Category sent', {
      category: artifact.category,
      provider: transport.provider,
      delivered: result.delivered.length,
      failed: result.failed.length,
    });
    return result;
  } catch (err) {
    const reason = redactSecrets(errorMessage(err), options.secrets ?? []);
    console.error('[dispatch] Category failed', {
      category: artifact.category,
      provider: transport.provider,
      recipientCount: recipients.length,
      error: reason,
    });
    return {
      category: artifact.category,
      delivered: [],
      failed: recipients.map(address => ({ address, reason })),
    };
  }
}

/**
 * Dispatches every plan with at most `concurrency` sends in flight. Results
 * follow the input order.
 */
export async function dispatchAll(
  plans: readonly DispatchPlan[],
  senderAddress: string,
  transport: EmailTransport,
  options: DispatchAllOptions,
): Promise<DeliveryResult[]> {
  const outcomes = await runWithConcurrency(
    plans,
    plan => dispatchArtifact(plan.artifact, plan.recipients, senderAddress, transport, options),
    { concurrency: options.concurrency },
  );

  return outcomes.map((outcome, index) => {
    if (outcome.status === 'fulfilled') return outcome.value;
    const plan = plans[index];
    const reason =
      outcome.status === 'rejected'
        ? redactSecrets(errorMessage(outcome.reason), options.secrets ?? [])
        : 'Dispatch cancelled';
    return {
      category: plan.artifact.category,
      delivered: [],
      failed: plan.recipients.map(address => ({ address, reason })),
    };
  });
}

/** Every routed address accepted, and at least one address routed */
export function isFullyDelivered(result: DeliveryResult): boolean {
  return result.failed.length === 0 && result.delivered.length > 0;
}

/**
 * Transport for the configured provider.
 *
 * @throws ConfigError when the provider's credentials are missing
 */
export function createTransport(config: ReportConfig): EmailTransport {
  switch (config.delivery.provider) {
    case 'sendgrid': {
      const apiKey = config.secrets.sendgridApiKey;
      if (!apiKey) {
        throw new ConfigError('SendGrid delivery requires SENDGRID_API_KEY', 'CONFIG_MISSING_KEYS');
      }
      return createSendGridTransport(apiKey);
    }
    case 'gmail': {
      const google = config.secrets.google;
      if (!google) {
        throw new ConfigError(
          'Gmail delivery requires GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN',
          'CONFIG_MISSING_KEYS',
        );
      }
      return createGmailTransport(google);
    }
  }
}
