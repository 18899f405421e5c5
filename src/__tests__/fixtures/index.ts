/**
 * Shared test fixtures: a resolved ReportConfig built by hand so tests of
 * downstream components do not depend on the resolver or the filesystem.
 */

import type { ReportConfig, RunMode } from '../../config/index.js';

export function createTestConfig(mode: RunMode = 'production', overrides: Partial<ReportConfig> = {}): ReportConfig {
  return {
    mode,
    overridesApplied: mode === 'test',
    rootPath: '/data',
    reportsFolder: '/data/reports',
    vbaPath: '/data/vbaProject.bin',
    templatesPath: '/data/email_templates',
    accountExecutives: {
      house: { enabled: true, budgets: { q1: 100000, q2: 200000, q3: 300000, q4: 400000 } },
      national: { enabled: true, budgets: { q1: 50000, q2: 50000, q3: 75000, q4: 125000 } },
      dormant: { enabled: false, budgets: { q1: 0, q2: 0, q3: 0, q4: 0 } },
    },
    activeAccountExecutives: ['house', 'national'],
    remote: {
      forecastFolder: '/Financial/Forecast',
      vbaFile: '/Financial/Sales/WeeklyReports/vbaProject.bin',
      templatesFolder: '/Financial/Sales/WeeklySalesEmail/email_templates',
    },
    useRepoTemplates: false,
    sync: { concurrency: 2 },
    delivery: { provider: 'sendgrid' },
    senderAddress: 'reports@y.com',
    recipients: {
      categories: {
        house: ['x@y.com', 'z@y.com'],
        national: ['n@y.com'],
        management: ['boss@y.com'],
      },
      testAddress: 't@y.com',
    },
    secrets: {
      dropboxAppKey: 'test-app-key',
      dropboxAppSecret: 'test-app-secret',
      dropboxRefreshToken: 'test-refresh-token',
      dropboxTeamMemberId: 'dbmid:test-member',
      sendgridApiKey: 'test-sendgrid-key',
      google: null,
    },
    ...overrides,
  };
}
