/**
 * Summary Report Generator
 *
 * Default ReportGenerator: one artifact per enabled account executive plus a
 * management roll-up. Bodies are rendered from the templates in the
 * configured templates folder. Each artifact carries the synced forecast
 * workbook as an attachment, and its HTML body is also written to the
 * reports folder.
 */

import { readFile, mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { MANAGEMENT_CATEGORY } from '../config/index.js';
import { FORECAST_ENTRY } from '../sync/index.js';
import type { SyncedFile } from '../sync/index.js';
import { renderAccountExecutiveBody, renderManagementBody } from './body.js';
import type { ManagementRow } from './body.js';
import { loadTemplates } from './templates.js';
import type { GenerationInput, ReportArtifact, ReportAttachment, ReportGenerator } from './types.js';

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export interface SummaryGeneratorOptions {
  /** Clock for subjects and file names (default: Date.now) */
  now?: () => Date;
  /** Write each rendered body to the reports folder (default: true) */
  writeToDisk?: boolean;
}

export function createSummaryReportGenerator(options: SummaryGeneratorOptions = {}): ReportGenerator {
  const now = options.now ?? (() => new Date());
  const writeToDisk = options.writeToDisk ?? true;

  return {
    async generate({ config, files }: GenerationInput): Promise<ReportArtifact[]> {
      const runDate = now();
      const year = runDate.getUTCFullYear();
      const date = runDate.toISOString().slice(0, 10);

      const templates = await loadTemplates(config.templatesPath);
      const forecast = await loadForecast(files);
      const attachments = forecast ? [forecast] : [];

      const artifacts: ReportArtifact[] = [];
      const rows: ManagementRow[] = [];

      for (const name of config.activeAccountExecutives) {
        const ae = config.accountExecutives[name];
        if (!ae) continue;
        rows.push({ name, budgets: ae.budgets });
        artifacts.push({
          category: name,
          subject: `${name} - Your ${year} Weekly Sales Report`,
          html: renderAccountExecutiveBody(templates, {
            name,
            budgets: ae.budgets,
            year,
            forecastFile: forecast?.filename ?? null,
          }),
          attachments,
        });
      }

      artifacts.push({
        category: MANAGEMENT_CATEGORY,
        subject: `Weekly Sales Management Report - ${date}`,
        html: renderManagementBody(templates, rows, date),
        attachments,
      });

      if (writeToDisk) {
        await mkdir(config.reportsFolder, { recursive: true });
        for (const artifact of artifacts) {
          await writeFile(path.join(config.reportsFolder, reportFileName(artifact.category, date)), artifact.html);
        }
      }

      console.log('[report] Reports generated', {
        artifacts: artifacts.length,
        forecastAttached: forecast !== null,
      });

      return artifacts;
    },
  };
}

/** `<category>-weekly-report-YYYY-MM-DD.html`, with unsafe characters replaced */
export function reportFileName(category: string, date: string): string {
  return `${category.replace(/[^A-Za-z0-9_-]+/g, '_')}-weekly-report-${date}.html`;
}

async function loadForecast(files: readonly SyncedFile[]): Promise<ReportAttachment | null> {
  const synced = files.find(file => file.entry === FORECAST_ENTRY);
  if (!synced) return null;
  return {
    filename: path.basename(synced.localPath),
    contentType: XLSX_CONTENT_TYPE,
    content: await readFile(synced.localPath),
  };
}
