/**
 * Tests for the summary report generator
 *
 * Uses a temp directory for the forecast workbook, the templates folder and
 * the reports folder.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createSummaryReportGenerator, reportFileName } from '../generator.js';
import { createTestConfig } from '../../__tests__/fixtures/index.js';
import { GenerationError } from '../../errors.js';
import type { ReportConfig } from '../../config/index.js';
import type { SyncedFile } from '../../sync/index.js';

const NOW = () => new Date('2026-01-05T12:00:00Z');

let root: string;
let templatesPath: string;
let forecast: SyncedFile;

function configFor(overrides: Partial<ReportConfig> = {}): ReportConfig {
  return createTestConfig('production', { reportsFolder: path.join(root, 'reports'), templatesPath, ...overrides });
}

beforeEach(async () => {
  root = await mkdtemp(path.join(os.tmpdir(), 'sales-report-gen-'));
  const localPath = path.join(root, 'Jan.xlsx');
  await writeFile(localPath, 'workbook-bytes');
  forecast = { entry: 'forecast', remotePath: '/Financial/Forecast/Jan.xlsx', localPath, bytes: 14 };

  templatesPath = path.join(root, 'templates');
  await mkdir(templatesPath);
  await writeFile(path.join(templatesPath, 'sales_report.html'), '<p>{{ ae_name }} {{ year }}</p>{{ forecast_note }}');
  await writeFile(path.join(templatesPath, 'management_report.html'), '<p>Roll-up {{ report_date }}</p>');
  await writeFile(path.join(templatesPath, 'styles.css'), '.report {}');
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(root, { recursive: true, force: true });
});

describe('createSummaryReportGenerator', () => {
  it('produces one artifact per enabled account executive plus management', async () => {
    const config = configFor();
    const artifacts = await createSummaryReportGenerator({ now: NOW }).generate({ config, files: [forecast] });

    expect(artifacts.map(a => a.category)).toEqual(['house', 'national', 'management']);
    expect(artifacts.map(a => a.subject)).toEqual([
      'house - Your 2026 Weekly Sales Report',
      'national - Your 2026 Weekly Sales Report',
      'Weekly Sales Management Report - 2026-01-05',
    ]);
  });

  it('attaches the synced forecast workbook', async () => {
    const config = configFor();
    const [first] = await createSummaryReportGenerator({ now: NOW }).generate({ config, files: [forecast] });

    expect(first.attachments).toHaveLength(1);
    expect(first.attachments[0].filename).toBe('Jan.xlsx');
    expect(first.attachments[0].contentType).toBe(
      'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    );
    expect(first.attachments[0].content.toString()).toBe('workbook-bytes');
  });

  it('sends no attachment when no forecast was synced', async () => {
    const config = configFor();
    const artifacts = await createSummaryReportGenerator({ now: NOW }).generate({ config, files: [] });
    expect(artifacts.every(a => a.attachments.length === 0)).toBe(true);
  });

  it('writes every body to the reports folder', async () => {
    const reportsFolder = path.join(root, 'reports');
    const config = configFor({ reportsFolder });
    const artifacts = await createSummaryReportGenerator({ now: NOW }).generate({ config, files: [forecast] });

    expect((await readdir(reportsFolder)).sort()).toEqual([
      'house-weekly-report-2026-01-05.html',
      'management-weekly-report-2026-01-05.html',
      'national-weekly-report-2026-01-05.html',
    ]);
    expect(await readFile(path.join(reportsFolder, 'house-weekly-report-2026-01-05.html'), 'utf-8')).toBe(
      artifacts[0].html,
    );
  });

  it('skips the disk write when disabled', async () => {
    const reportsFolder = path.join(root, 'reports');
    const config = configFor({ reportsFolder });
    await createSummaryReportGenerator({ now: NOW, writeToDisk: false }).generate({ config, files: [] });
    expect((await readdir(root)).sort()).toEqual(['Jan.xlsx', 'templates']);
  });

  it('renders each body from the synced templates folder', async () => {
    const artifacts = await createSummaryReportGenerator({ now: NOW, writeToDisk: false }).generate({
      config: configFor(),
      files: [forecast],
    });

    expect(artifacts.map(a => a.html)).toEqual([
      '<p>house 2026</p><p>The latest forecast (<em>Jan.xlsx</em>) is attached.</p>',
      '<p>national 2026</p><p>The latest forecast (<em>Jan.xlsx</em>) is attached.</p>',
      '<p>Roll-up 2026-01-05</p>',
    ]);
  });

  it('fails with GenerationError when the templates folder lacks a template', async () => {
    await rm(path.join(templatesPath, 'styles.css'));

    await expect(
      createSummaryReportGenerator({ now: NOW, writeToDisk: false }).generate({ config: configFor(), files: [] }),
    ).rejects.toBeInstanceOf(GenerationError);
  });
});

describe('reportFileName', () => {
  it('replaces unsafe characters in the category', () => {
    expect(reportFileName('West Coast/Retail', '2026-01-05')).toBe('West_Coast_Retail-weekly-report-2026-01-05.html');
  });
});
