/**
 * Report Module Type Definitions
 *
 * The report generator is the pipeline's external collaborator: it receives
 * the synchronized files and the resolved config and returns one or more
 * artifacts per recipient category. Layout is its own business.
 */

import type { ReportConfig } from '../config/index.js';
import type { SyncedFile } from '../sync/index.js';

export interface ReportAttachment {
  filename: string;
  contentType: string;
  content: Buffer;
}

export interface ReportArtifact {
  /** Recipient category this artifact is routed to */
  category: string;
  subject: string;
  html: string;
  attachments: ReportAttachment[];
}

export interface GenerationInput {
  config: ReportConfig;
  files: readonly SyncedFile[];
}

export interface ReportGenerator {
  generate(input: GenerationInput): Promise<ReportArtifact[]>;
}
