/**
 * Execution summary printed by the CLI at the end of every run.
 */

import type { RunSummary } from './types.js';

const RULE = '='.repeat(40);

export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    RULE,
    'EXECUTION SUMMARY',
    RULE,
    `Status:    ${summary.status}`,
    `Mode:      ${summary.mode}`,
    `Stage:     ${summary.stage}`,
    `Files:     ${summary.files.length} synced`,
    `Reports:   ${summary.artifacts.length} generated`,
    `Delivery:  ${formatDeliveries(summary)}`,
    `Duration:  ${formatDuration(summary.startedAt, summary.finishedAt)}`,
  ];

  if (summary.error) {
    lines.push(`Failed at: ${summary.failedStage ?? summary.stage} (${summary.error.kind})`);
    lines.push(`Error:     ${summary.error.message}`);
  }

  lines.push(RULE);
  return lines.join('\n');
}

function formatDeliveries(summary: RunSummary): string {
  if (summary.deliveries.length === 0) return 'none';
  return summary.deliveries
    .map(result => {
      const total = result.delivered.length + result.failed.length;
      return `${result.category} ${result.delivered.length}/${total}`;
    })
    .join(', ');
}

function formatDuration(startedAt: string, finishedAt: string): string {
  const ms = Date.parse(finishedAt) - Date.parse(startedAt);
  return `${(ms / 1000).toFixed(1)}s`;
}
