/**
 * Tree Downloader
 *
 * Mirrors a remote folder onto local disk, depth first. Every remote call
 * is awaited before the next one starts: siblings and subfolders are never
 * fetched in parallel.
 */

import path from 'path';
import type { RunContext } from '../context.js';
import { describeError } from '../errors.js';
import type { RemoteItem } from '../graph/types.js';
import { childPath, ensureDirectory, writeFileContent } from './localFs.js';

/**
 * What to do when one item fails.
 * - abort: stop the whole walk and rethrow (files already written stay)
 * - continue: record the failure and move on to the next sibling
 */
export type ErrorPolicy = 'abort' | 'continue';

export interface DownloadOptions {
  onError?: ErrorPolicy;
}

export interface DownloadFailure {
  /** Path relative to the destination's parent, e.g. "Reports/2024/q1.xlsx" */
  path: string;
  error: Error;
}

export interface DownloadSummary {
  files: number;
  folders: number;
  bytes: number;
  failures: DownloadFailure[];
}

export async function download(
  context: RunContext,
  driveId: string,
  folderItemId: string,
  localDir: string,
  options: DownloadOptions = {}
): Promise<DownloadSummary> {
  const { client, logger } = context;
  const policy = options.onError ?? 'abort';
  const base = path.dirname(localDir);
  const summary: DownloadSummary = { files: 0, folders: 0, bytes: 0, failures: [] };

  const display = (target: string) => path.relative(base, target).split(path.sep).join('/');

  const handleFailure = (target: string, error: unknown): void => {
    if (policy === 'abort') {
      throw error;
    }
    const failure = error instanceof Error ? error : new Error(String(error));
    summary.failures.push({ path: display(target), error: failure });
    logger.error(`Failed ${display(target)}: ${describeError(failure)}`);
  };

  const downloadFile = async (item: RemoteItem, target: string): Promise<void> => {
    const content = await client.getContent(driveId, item.id);
    await writeFileContent(target, content);
    summary.files++;
    summary.bytes += content.length;
    logger.success(`Downloaded file: ${display(target)}`);
  };

  const visit = async (item: RemoteItem, dir: string): Promise<void> => {
    if (item.kind === 'other') {
      logger.verbose(`Skipping ${display(path.join(dir, item.name))}: not a file or folder`);
      return;
    }

    const fallback = path.join(dir, item.name);
    try {
      const target = childPath(dir, item.name);
      if (item.kind === 'folder') {
        await ensureDirectory(target);
        summary.folders++;
        await walk(item.id, target);
      } else {
        await downloadFile(item, target);
      }
    } catch (error) {
      handleFailure(fallback, error);
    }
  };

  const walk = async (folderId: string, dir: string): Promise<void> => {
    try {
      for await (const child of client.listChildren(driveId, folderId)) {
        await visit(child, dir);
      }
    } catch (error) {
      // Under `continue` only a failed listing page lands here
      handleFailure(dir, error);
    }
  };

  // The destination root is needed for anything else to succeed, so its
  // failure always propagates
  await ensureDirectory(localDir);
  await walk(folderItemId, localDir);

  return summary;
}
