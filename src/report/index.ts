export type {
  ReportArtifact,
  ReportAttachment,
  ReportGenerator,
  GenerationInput,
} from './types.js';
export { createSummaryReportGenerator, reportFileName } from './generator.js';
export type { SummaryGeneratorOptions } from './generator.js';
export {
  renderAccountExecutiveBody,
  renderManagementBody,
  renderBudgetTable,
  renderManagementTable,
  renderForecastNote,
  annualTotal,
  escapeHtml,
} from './body.js';
export type { ManagementRow, AccountExecutiveReport } from './body.js';
export { loadTemplates, renderTemplate, TEMPLATE_FILES } from './templates.js';
export type { ReportTemplates } from './templates.js';
