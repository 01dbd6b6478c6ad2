import ora, { type Ora } from 'ora';
import { resolveOptions, type RawFlags } from '../../config/options.js';
import { describeError } from '../../errors.js';
import { authenticate, type GraphCredential } from '../../graph/credentials.js';
import { createGraphRemoteClient } from '../../graph/graphClient.js';
import type { RemoteClient } from '../../graph/types.js';
import { searchAndDownload } from '../../run.js';
import { formatBytes, plural } from '../format.js';
import { createLogger, resolveVerbosity, Verbosity, type Logger } from '../logger.js';

export interface DownloadCommandDeps {
  authenticate?: typeof authenticate;
  createClient?: (credential: GraphCredential) => RemoteClient;
  logger?: Logger;
  /** Show a spinner while authenticating; defaults to on for interactive, non-quiet runs */
  spinner?: boolean;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Authenticate, find the folder and download it.
 * Resolves to the process exit code.
 */
export async function downloadCommand(flags: RawFlags, deps: DownloadCommandDeps = {}): Promise<number> {
  const logger = deps.logger ?? createLogger({ verbosity: resolveVerbosity(flags) });
  const signIn = deps.authenticate ?? authenticate;
  const createClient = deps.createClient
    ?? ((credential: GraphCredential) => createGraphRemoteClient({ authProvider: credential }));

  let spinner: Ora | null = null;

  try {
    const options = resolveOptions(flags, deps.env, deps.cwd);

    logger.plain(`\n  Downloading "${options.folderName}"\n`);

    const showSpinner = deps.spinner
      ?? (logger.verbosity > Verbosity.Quiet && process.stdout.isTTY === true);
    if (showSpinner) {
      spinner = ora('Authenticating with Microsoft Entra ID...').start();
    }

    const credential = await signIn({
      clientId: options.clientId,
      clientSecret: options.clientSecret,
      tenantId: options.tenantId,
    });
    spinner?.succeed('Authenticated');
    spinner = null;
    logger.verbose(`Token valid until ${new Date(credential.expiresOnTimestamp).toISOString()}`);

    const outcome = await searchAndDownload(
      { client: createClient(credential), logger },
      {
        folderName: options.folderName,
        webUrl: options.webUrl,
        downloadPath: options.downloadPath,
        region: options.region,
        size: options.pageSize,
        matchPolicy: options.matchPolicy,
        onError: options.onError,
      }
    );

    if (outcome.status === 'not-found') {
      return 0;
    }

    const { summary, destination } = outcome;
    logger.plain('');
    logger.success(
      `${plural(summary.files, 'file')} (${formatBytes(summary.bytes)}) in ${plural(summary.folders, 'folder')} saved to ${destination}`
    );

    if (summary.failures.length > 0) {
      logger.warn(`${plural(summary.failures.length, 'item')} could not be downloaded`);
      return 1;
    }
    return 0;
  } catch (error) {
    spinner?.fail('Authentication failed');
    logger.error(describeError(error));
    return 1;
  }
}
