import type { Logger } from './cli/logger.js';
import type { RemoteClient } from './graph/types.js';

/**
 * Everything a run needs, passed explicitly to the locator and downloader
 */
export interface RunContext {
  client: RemoteClient;
  logger: Logger;
}
