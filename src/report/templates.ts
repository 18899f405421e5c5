/**
 * Email Templates
 *
 * Report bodies are laid out by HTML templates kept in the templates folder
 * (synced from the remote store, or installed from the repository's own
 * email_templates/ directory). Values are substituted into `{{ name }}`
 * placeholders; the caller escapes them beforehand.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { GenerationError, errorMessage } from '../errors.js';

export const TEMPLATE_FILES = {
  accountExecutive: 'sales_report.html',
  management: 'management_report.html',
  styles: 'styles.css',
} as const;

export interface ReportTemplates {
  accountExecutive: string;
  management: string;
  styles: string;
}

const PLACEHOLDER = /\{\{\s*([a-z_]+)\s*\}\}/g;

/**
 * Reads every template the generator needs from `directory`.
 *
 * @throws GenerationError naming the first template that cannot be read
 */
export async function loadTemplates(directory: string): Promise<ReportTemplates> {
  const read = async (file: string): Promise<string> => {
    const templatePath = path.join(directory, file);
    try {
      return await readFile(templatePath, 'utf-8');
    } catch (err) {
      throw new GenerationError(`Email template not readable: ${templatePath} (${errorMessage(err)})`, { cause: err });
    }
  };

  return {
    accountExecutive: await read(TEMPLATE_FILES.accountExecutive),
    management: await read(TEMPLATE_FILES.management),
    styles: await read(TEMPLATE_FILES.styles),
  };
}

/**
 * Replaces each `{{ name }}` with `values[name]`.
 *
 * @throws GenerationError when the template uses a name with no value
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  const unknown = new Set<string>();
  const rendered = template.replace(PLACEHOLDER, (match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      unknown.add(name);
      return match;
    }
    return value;
  });

  if (unknown.size > 0) {
    throw new GenerationError(`Email template uses unknown placeholder: ${[...unknown].join(', ')}`);
  }
  return rendered;
}
