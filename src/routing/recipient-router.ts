/**
 * Recipient Router
 *
 * Pure category -> address resolution. No I/O, no logging.
 *
 * - test mode:       every category collapses to [testAddress], so no
 *                    production recipient is reachable while validating changes
 * - production mode: the category's configured list, deduplicated
 *                    case-insensitively (first spelling wins, order kept)
 *
 * The mode is an explicit argument and is not read from the config, so a
 * caller can never route with a mode other than the one it was given.
 */

import type { ReportConfig, RunMode } from '../config/index.js';
import { ConfigError } from '../errors.js';

/**
 * @throws ConfigError for an unknown category, or for test mode without a
 *   test address
 */
export function routeRecipients(config: ReportConfig, mode: RunMode, category: string): readonly string[] {
  if (!Object.hasOwn(config.recipients.categories, category)) {
    throw new ConfigError(`Unknown recipient category: ${category}`, 'CONFIG_UNKNOWN_CATEGORY');
  }

  if (mode === 'test') {
    const { testAddress } = config.recipients;
    if (!testAddress) {
      throw new ConfigError('Test mode requires a test address (TEST_EMAIL)', 'CONFIG_MISSING_KEYS');
    }
    return [testAddress];
  }

  return dedupeAddresses(config.recipients.categories[category]);
}

/** Routes several categories at once; keys follow the input order */
export function routeAll(
  config: ReportConfig,
  mode: RunMode,
  categories: readonly string[],
): Record<string, readonly string[]> {
  const routed: Record<string, readonly string[]> = {};
  for (const category of categories) {
    routed[category] = routeRecipients(config, mode, category);
  }
  return routed;
}

/** Every category the configuration knows about */
export function knownCategories(config: ReportConfig): string[] {
  return Object.keys(config.recipients.categories);
}

export function dedupeAddresses(addresses: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const address of addresses) {
    const key = address.trim().toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    result.push(address.trim());
  }
  return result;
}
