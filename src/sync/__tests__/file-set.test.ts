import { describe, it, expect } from 'vitest';
import { buildRemoteFileSet, forecastDirectory } from '../file-set.js';
import { createTestConfig } from '../../__tests__/fixtures/index.js';

describe('buildRemoteFileSet', () => {
  it('lists forecast, vba and templates as required entries', () => {
    expect(buildRemoteFileSet(createTestConfig())).toEqual([
      {
        name: 'forecast',
        source: { kind: 'latest', folder: '/Financial/Forecast', extension: '.xlsx' },
        localPath: '/data/Forecast',
        required: true,
      },
      {
        name: 'vba',
        source: { kind: 'file', path: '/Financial/Sales/WeeklyReports/vbaProject.bin' },
        localPath: '/data/vbaProject.bin',
        required: true,
      },
      {
        name: 'templates',
        source: { kind: 'folder', folder: '/Financial/Sales/WeeklySalesEmail/email_templates' },
        localPath: '/data/email_templates',
        required: true,
      },
    ]);
  });

  it('leaves the templates folder out when the repository templates are used', () => {
    const entries = buildRemoteFileSet(createTestConfig('production', { useRepoTemplates: true }));
    expect(entries.map(entry => entry.name)).toEqual(['forecast', 'vba']);
  });
});

describe('forecastDirectory', () => {
  it('is the Forecast folder under the root path', () => {
    expect(forecastDirectory(createTestConfig())).toBe('/data/Forecast');
  });
});
