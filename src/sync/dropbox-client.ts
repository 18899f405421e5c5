/**
 * Dropbox Team Client
 *
 * Minimal RemoteStore over the Dropbox HTTP API, acting on behalf of one team
 * member (Dropbox-API-Select-User). Confirmed endpoints:
 * - POST https://api.dropboxapi.com/2/files/list_folder
 * - POST https://api.dropboxapi.com/2/files/list_folder/continue
 * - POST https://content.dropboxapi.com/2/files/download
 *
 * Error handling:
 * - Non-2xx responses throw DropboxApiError with the status and the
 *   error_summary (e.g. "path/not_found/..") so the synchronizer can tell a
 *   missing file from a transfer failure
 * - The access token never appears in error text
 */

import { z } from 'zod';
import type { RemoteFileMeta, RemoteStore } from './types.js';

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

export class DropboxApiError extends Error {
  readonly status: number;
  readonly summary: string;

  constructor(message: string, status: number, summary: string) {
    super(message);
    this.name = 'DropboxApiError';
    this.status = status;
    this.summary = summary;
  }

  /** True for the 409 "path/not_found" family of endpoint errors */
  get isNotFound(): boolean {
    return this.status === 409 && this.summary.includes('not_found');
  }
}

// ---------------------------------------------------------------------------
// Response Schemas
// ---------------------------------------------------------------------------

const ListEntrySchema = z
  .object({
    '.tag': z.string(),
    name: z.string(),
    path_display: z.string().optional(),
    path_lower: z.string().optional(),
    server_modified: z.string().optional(),
  })
  .passthrough();

const ListFolderResponseSchema = z.object({
  entries: z.array(ListEntrySchema),
  cursor: z.string(),
  has_more: z.boolean(),
});

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export const DROPBOX_API_BASE = 'https://api.dropboxapi.com/2';
export const DROPBOX_CONTENT_BASE = 'https://content.dropboxapi.com/2';

export interface DropboxClientOptions {
  accessToken: string;
  teamMemberId: string;
  fetchImpl?: typeof fetch;
  apiBase?: string;
  contentBase?: string;
}

export function createDropboxStore(options: DropboxClientOptions): RemoteStore {
  const fetchImpl = options.fetchImpl ?? fetch;
  const apiBase = options.apiBase ?? DROPBOX_API_BASE;
  const contentBase = options.contentBase ?? DROPBOX_CONTENT_BASE;

  const baseHeaders = {
    Authorization: `Bearer ${options.accessToken}`,
    'Dropbox-API-Select-User': options.teamMemberId,
  };

  async function rpc(endpoint: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    const response = await fetchImpl(`${apiBase}${endpoint}`, {
      method: 'POST',
      headers: { ...baseHeaders, 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });
    if (!response.ok) {
      throw await toApiError(endpoint, response);
    }
    return response.json();
  }

  return {
    async listFolder(folder: string, signal?: AbortSignal): Promise<RemoteFileMeta[]> {
      const files: RemoteFileMeta[] = [];
      let page = ListFolderResponseSchema.parse(await rpc('/files/list_folder', { path: folder }, signal));

      for (;;) {
        for (const entry of page.entries) {
          if (entry['.tag'] !== 'file') continue;
          files.push({
            name: entry.name,
            path: entry.path_display ?? entry.path_lower ?? `${folder}/${entry.name}`,
            serverModified: entry.server_modified ?? '',
          });
        }
        if (!page.has_more) break;
        page = ListFolderResponseSchema.parse(
          await rpc('/files/list_folder/continue', { cursor: page.cursor }, signal),
        );
      }

      console.log('[dropbox] Listed folder', { folder, files: files.length });
      return files;
    },

    async download(remotePath: string, signal?: AbortSignal): Promise<Buffer> {
      const response = await fetchImpl(`${contentBase}/files/download`, {
        method: 'POST',
        headers: {
          ...baseHeaders,
          'Dropbox-API-Arg': httpHeaderSafeJson({ path: remotePath }),
        },
        signal,
      });
      if (!response.ok) {
        throw await toApiError('/files/download', response);
      }
      return Buffer.from(await response.arrayBuffer());
    },
  };
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

/**
 * JSON for the Dropbox-API-Arg header. Header values must be ASCII, so every
 * non-ASCII character is written as a \uXXXX escape.
 */
export function httpHeaderSafeJson(value: unknown): string {
  return JSON.stringify(value).replace(/[\u007f-\uffff]/g, ch =>
    `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`,
  );
}

async function toApiError(endpoint: string, response: Response): Promise<DropboxApiError> {
  const text = await response.text().catch(() => '');
  const summary = errorSummary(text);
  return new DropboxApiError(
    `Dropbox ${endpoint} failed: ${response.status} ${summary}`.trim(),
    response.status,
    summary,
  );
}

/** error_summary from a JSON error body, or the start of a plain-text one */
function errorSummary(text: string): string {
  const fallback = text.slice(0, 200);
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed !== null && typeof parsed === 'object' && 'error_summary' in parsed) {
      return String(parsed.error_summary);
    }
    return fallback;
  } catch {
    return fallback;
  }
}
