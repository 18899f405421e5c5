/**
 * Report Body Generator — HTML
 *
 * Turns budget figures into the HTML fragments the email templates place:
 * budget tables, the forecast note and the management roll-up. Templates own
 * the surrounding layout; keep it at max width 600px for email clients.
 */

import type { QuarterlyBudget } from '../config/index.js';
import { renderTemplate } from './templates.js';
import type { ReportTemplates } from './templates.js';

// ---------------------------------------------------------------------------
// Template Constants
// ---------------------------------------------------------------------------

const QUARTERS = ['q1', 'q2', 'q3', 'q4'] as const;

const CELL = 'style="padding:4px 8px;border-bottom:1px solid #ddd;text-align:right;"';
const HEADER_CELL = 'style="padding:4px 8px;border-bottom:2px solid #333;text-align:right;"';

const currency = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  maximumFractionDigits: 0,
});

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface ManagementRow {
  name: string;
  budgets: QuarterlyBudget;
}

export interface AccountExecutiveReport {
  name: string;
  budgets: QuarterlyBudget;
  year: number;
  /** File name of the attached forecast workbook, or null when none is attached */
  forecastFile: string | null;
}

/**
 * Body for one account executive's weekly report.
 *
 * Placeholders: styles, ae_name, year, budget_table, forecast_note.
 */
export function renderAccountExecutiveBody(templates: ReportTemplates, report: AccountExecutiveReport): string {
  return renderTemplate(templates.accountExecutive, {
    styles: templates.styles,
    ae_name: escapeHtml(report.name),
    year: String(report.year),
    budget_table: renderBudgetTable(report.budgets),
    forecast_note: renderForecastNote(report.forecastFile),
  });
}

/**
 * Roll-up body listing every enabled account executive's budget.
 *
 * Placeholders: styles, report_date, management_table.
 */
export function renderManagementBody(templates: ReportTemplates, rows: readonly ManagementRow[], date: string): string {
  return renderTemplate(templates.management, {
    styles: templates.styles,
    report_date: escapeHtml(date),
    management_table: renderManagementTable(rows),
  });
}

export function renderBudgetTable(budgets: QuarterlyBudget): string {
  return [
    '<table style="border-collapse:collapse;">',
    `<tr>${QUARTERS.map(q => `<th ${HEADER_CELL}>${q.toUpperCase()}</th>`).join('')}<th ${HEADER_CELL}>Total</th></tr>`,
    `<tr>${QUARTERS.map(q => `<td ${CELL}>${currency.format(budgets[q])}</td>`).join('')}<td ${CELL}><strong>${currency.format(annualTotal(budgets))}</strong></td></tr>`,
    '</table>',
  ].join('\n');
}

export function renderManagementTable(rows: readonly ManagementRow[]): string {
  const body = rows.map(row =>
    `<tr><td style="padding:4px 8px;border-bottom:1px solid #ddd;">${escapeHtml(row.name)}</td>` +
      QUARTERS.map(q => `<td ${CELL}>${currency.format(row.budgets[q])}</td>`).join('') +
      `<td ${CELL}>${currency.format(annualTotal(row.budgets))}</td></tr>`,
  );

  const grandTotal = rows.reduce((sum, row) => sum + annualTotal(row.budgets), 0);

  return [
    '<table style="border-collapse:collapse;">',
    `<tr><th style="padding:4px 8px;border-bottom:2px solid #333;text-align:left;">Account Executive</th>${QUARTERS.map(q => `<th ${HEADER_CELL}>${q.toUpperCase()}</th>`).join('')}<th ${HEADER_CELL}>Total</th></tr>`,
    ...body,
    `<tr><td style="padding:4px 8px;"><strong>All</strong></td><td colspan="4"></td><td ${CELL}><strong>${currency.format(grandTotal)}</strong></td></tr>`,
    '</table>',
  ].join('\n');
}

/** Empty when no forecast is attached */
export function renderForecastNote(forecastFile: string | null): string {
  if (!forecastFile) return '';
  return `<p>The latest forecast (<em>${escapeHtml(forecastFile)}</em>) is attached.</p>`;
}

export function annualTotal(budgets: QuarterlyBudget): number {
  return budgets.q1 + budgets.q2 + budgets.q3 + budgets.q4;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
