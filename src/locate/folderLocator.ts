import type { RunContext } from '../context.js';
import { DuplicateMatchError, describeError } from '../errors.js';
import type { SearchHit, SearchRequest, SearchResponse } from '../graph/types.js';

export type MatchPolicy = 'first' | 'last' | 'unique';

export interface SearchMatch {
  driveId: string;
  itemId: string;
}

export interface LocateOptions {
  region?: string;
  from?: number;
  size?: number;
  matchPolicy?: MatchPolicy;
}

export const DEFAULT_REGION = 'IND';
export const DEFAULT_PAGE_SIZE = 25;

export function buildSearchRequest(folderName: string, options: LocateOptions = {}): SearchRequest {
  return {
    entityTypes: ['driveItem'],
    region: options.region ?? DEFAULT_REGION,
    query: { queryString: folderName },
    from: options.from ?? 0,
    size: options.size ?? DEFAULT_PAGE_SIZE,
  };
}

function* flattenHits(responses: SearchResponse[]): Generator<SearchHit> {
  for (const response of responses) {
    for (const container of response.hitsContainers) {
      yield* container.hits;
    }
  }
}

/**
 * Search for a folder by name and pick the hit whose name and webUrl both
 * equal the requested values.
 *
 * A failed search is reported and treated as "not found". Only a duplicate
 * match under the `unique` policy is thrown.
 */
export async function locate(
  context: RunContext,
  folderName: string,
  webUrl: string,
  options: LocateOptions = {}
): Promise<SearchMatch | null> {
  const { client, logger } = context;
  const policy = options.matchPolicy ?? 'first';

  let responses: SearchResponse[];
  try {
    responses = await client.search(buildSearchRequest(folderName, options));
  } catch (error) {
    logger.error(`Error while searching for folder: ${describeError(error)}`);
    return null;
  }

  let match: SearchMatch | null = null;
  let matches = 0;

  for (const hit of flattenHits(responses)) {
    logger.verbose(`${hit.driveId ?? '-'}  ${hit.name ?? '(unnamed)'}`);

    if (hit.name !== folderName || hit.webUrl !== webUrl) continue;

    if (!hit.driveId) {
      logger.verbose(`Ignoring hit ${hit.itemId}: no drive id in search result`);
      continue;
    }

    matches++;
    if (match && policy === 'first') continue;

    match = { driveId: hit.driveId, itemId: hit.itemId };
    logger.verbose(`Matching folder found. Folder Item ID: ${match.itemId}, Drive ID: ${match.driveId}`);
  }

  if (policy === 'unique' && matches > 1) {
    throw new DuplicateMatchError(folderName, matches);
  }

  return match;
}
