/**
 * Remote File Set
 *
 * The files a weekly run needs, derived from the resolved configuration:
 * - forecast:  newest .xlsx in the forecast folder -> <rootPath>/Forecast/
 * - vba:       workbook macro project              -> vbaPath
 * - templates: email template folder               -> templatesPath
 *              (left out when the repository's own templates are used)
 */

import * as path from 'node:path';
import type { ReportConfig } from '../config/index.js';
import type { RemoteFileEntry } from './types.js';

export const FORECAST_ENTRY = 'forecast';
export const VBA_ENTRY = 'vba';
export const TEMPLATES_ENTRY = 'templates';

export function buildRemoteFileSet(config: ReportConfig): RemoteFileEntry[] {
  const entries: RemoteFileEntry[] = [
    {
      name: FORECAST_ENTRY,
      source: { kind: 'latest', folder: config.remote.forecastFolder, extension: '.xlsx' },
      localPath: forecastDirectory(config),
      required: true,
    },
    {
      name: VBA_ENTRY,
      source: { kind: 'file', path: config.remote.vbaFile },
      localPath: config.vbaPath,
      required: true,
    },
  ];

  if (!config.useRepoTemplates) {
    entries.push({
      name: TEMPLATES_ENTRY,
      source: { kind: 'folder', folder: config.remote.templatesFolder },
      localPath: config.templatesPath,
      required: true,
    });
  }

  return entries;
}

/** Local folder the forecast workbook is synced into */
export function forecastDirectory(config: ReportConfig): string {
  return path.join(config.rootPath, 'Forecast');
}
