/**
 * Repository Templates
 *
 * With `useRepoTemplates` set, the templates folder is filled from the
 * email_templates/ directory shipped with this repository instead of the
 * remote store. The copy lands where the synced templates would.
 */

import { copyFile, mkdir, readdir, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { SyncError, errorMessage } from '../errors.js';
import { TEMPLATES_ENTRY } from './file-set.js';
import type { SyncedFile } from './types.js';

/** email_templates/ at the repository root, from src/ and from dist/ alike */
export const REPO_TEMPLATES_DIR = fileURLToPath(new URL('../../email_templates/', import.meta.url));

/**
 * Copies every file directly inside `sourceDir` into `targetDir`.
 *
 * @throws SyncError (missing-file) when the source holds no files
 */
export async function installRepoTemplates(
  targetDir: string,
  sourceDir: string = REPO_TEMPLATES_DIR,
): Promise<SyncedFile[]> {
  const names = await listFiles(sourceDir);
  if (names.length === 0) {
    throw new SyncError('missing-file', TEMPLATES_ENTRY, `No repository templates found in ${sourceDir}`);
  }

  await mkdir(targetDir, { recursive: true });
  const installed: SyncedFile[] = [];
  for (const name of names) {
    const sourcePath = path.join(sourceDir, name);
    const localPath = path.join(targetDir, name);
    try {
      await copyFile(sourcePath, localPath);
    } catch (err) {
      throw new SyncError('transfer-error', TEMPLATES_ENTRY, `Copy failed for ${sourcePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    installed.push({ entry: TEMPLATES_ENTRY, remotePath: sourcePath, localPath, bytes: (await stat(localPath)).size });
  }

  console.log('[sync] Repository templates installed', { files: installed.length, target: targetDir });
  return installed;
}

async function listFiles(directory: string): Promise<string[]> {
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries.filter(entry => entry.isFile()).map(entry => entry.name).sort();
  } catch (err) {
    throw new SyncError('missing-file', TEMPLATES_ENTRY, `Repository templates not readable: ${directory}`, {
      cause: err,
    });
  }
}
