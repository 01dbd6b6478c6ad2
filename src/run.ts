import type { RunContext } from './context.js';
import { childPath } from './download/localFs.js';
import { download, type DownloadSummary, type ErrorPolicy } from './download/treeDownloader.js';
import { locate, type LocateOptions, type SearchMatch } from './locate/folderLocator.js';

export interface SearchAndDownloadOptions extends LocateOptions {
  folderName: string;
  webUrl: string;
  downloadPath: string;
  onError?: ErrorPolicy;
}

export type RunOutcome =
  | { status: 'not-found' }
  | {
      status: 'downloaded';
      match: SearchMatch;
      destination: string;
      summary: DownloadSummary;
    };

/**
 * Locate the folder, then mirror it into `<downloadPath>/<folderName>`
 */
export async function searchAndDownload(
  context: RunContext,
  options: SearchAndDownloadOptions
): Promise<RunOutcome> {
  const { folderName, webUrl, downloadPath } = options;

  const match = await locate(context, folderName, webUrl, options);
  if (!match) {
    context.logger.warn(`No matching folder found for query: ${folderName} and webUrl: ${webUrl}`);
    return { status: 'not-found' };
  }

  const destination = childPath(downloadPath, folderName);
  const summary = await download(context, match.driveId, match.itemId, destination, {
    onError: options.onError,
  });

  return { status: 'downloaded', match, destination, summary };
}
