/**
 * Base Document Schema
 *
 * zod schema for config.json. Path keys are optional here because the
 * requirement is checked after the override layer is applied.
 */

import { z } from 'zod';

export const QuarterlyBudgetSchema = z.object({
  q1: z.number(),
  q2: z.number(),
  q3: z.number(),
  q4: z.number(),
});

export const AccountExecutiveSchema = z.object({
  enabled: z.boolean(),
  budgets: QuarterlyBudgetSchema,
});

export const BaseConfigSchema = z
  .object({
    root_path: z.string().min(1).optional(),
    reports_folder: z.string().min(1).optional(),
    vba_path: z.string().min(1).optional(),
    templates_path: z.string().min(1).optional(),
    ci_root_path: z.string().min(1).optional(),
    ci_reports_folder: z.string().min(1).optional(),
    ci_vba_path: z.string().min(1).optional(),
    ci_templates_path: z.string().min(1).optional(),
    account_executives: z.record(AccountExecutiveSchema).default({}),
    dropbox_forecast_path: z.string().min(1).default('/Financial/Forecast'),
    dropbox_vba_path: z.string().min(1).default('/Financial/Sales/WeeklyReports/vbaProject.bin'),
    dropbox_templates_path: z.string().min(1).default('/Financial/Sales/WeeklySalesEmail/email_templates'),
    use_repo_templates: z.boolean().default(false),
    sync_concurrency: z.number().int().min(1).max(10).default(3),
    delivery_provider: z.enum(['sendgrid', 'gmail']).default('sendgrid'),
  })
  .passthrough();

/**
 * Keys older config.json files carried that now only come from the
 * environment. They are ignored with a warning when present.
 */
export const ENVIRONMENT_ONLY_KEYS = [
  'management_recipients',
  'email_recipients',
  'test_email',
  'test_mode',
  'sender_email',
  'sendgrid_api_key',
] as const;
