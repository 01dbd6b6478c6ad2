/**
 * Remote Client over Microsoft Graph
 *
 * A thin, stateless wrapper around @microsoft/microsoft-graph-client. The
 * only state it holds is the credential (or, in tests, the middleware chain)
 * the Graph client was built with.
 */

import {
  Client,
  GraphError,
  ResponseType,
  type AuthenticationProvider,
  type Middleware,
} from '@microsoft/microsoft-graph-client';
import { ZodError } from 'zod';
import { ContentError, ListingError, SearchError, describeError } from '../errors.js';
import {
  DriveItemPageSchema,
  SearchResultSchema,
  toRemoteItem,
  toSearchResponses,
  type DriveItemPage,
  type RemoteClient,
  type RemoteItem,
  type SearchRequest,
  type SearchResponse,
} from './types.js';

export type GraphClientOptions =
  | { authProvider: AuthenticationProvider }
  | { middleware: Middleware };

/**
 * One-line description of a failed Graph call
 */
export function describeGraphError(error: unknown): string {
  if (error instanceof GraphError) {
    const code = error.code ? ` ${error.code}` : '';
    return `Graph API error: ${error.statusCode}${code} ${error.message}`.trim();
  }
  if (error instanceof ZodError) {
    const fields = error.issues.map(issue => issue.path.join('.') || '(root)');
    return `Unexpected Graph response (${[...new Set(fields)].join(', ')})`;
  }
  return describeError(error);
}

function itemPath(driveId: string, itemId: string): string {
  return `/drives/${encodeURIComponent(driveId)}/items/${encodeURIComponent(itemId)}`;
}

export function createGraphRemoteClient(options: GraphClientOptions): RemoteClient {
  const client = 'middleware' in options
    ? Client.initWithMiddleware({ middleware: options.middleware })
    : Client.initWithMiddleware({ authProvider: options.authProvider });

  async function search(request: SearchRequest): Promise<SearchResponse[]> {
    try {
      const raw: unknown = await client.api('/search/query').post({ requests: [request] });
      return toSearchResponses(SearchResultSchema.parse(raw));
    } catch (error) {
      throw new SearchError(describeGraphError(error), { cause: error });
    }
  }

  async function* listChildren(driveId: string, itemId: string): AsyncGenerator<RemoteItem> {
    let next: string | undefined = `${itemPath(driveId, itemId)}/children`;

    while (next) {
      let page: DriveItemPage;
      try {
        const raw: unknown = await client.api(next).get();
        page = DriveItemPageSchema.parse(raw);
      } catch (error) {
        throw new ListingError(
          itemId,
          `Could not list folder ${itemId}: ${describeGraphError(error)}`,
          { cause: error }
        );
      }

      for (const item of page.value) {
        yield toRemoteItem(item, driveId);
      }
      next = page['@odata.nextLink'];
    }
  }

  async function getContent(driveId: string, itemId: string): Promise<Buffer> {
    let raw: unknown;
    try {
      raw = await client
        .api(`${itemPath(driveId, itemId)}/content`)
        .responseType(ResponseType.ARRAYBUFFER)
        .get();
    } catch (error) {
      throw new ContentError(
        itemId,
        `Could not download item ${itemId}: ${describeGraphError(error)}`,
        { cause: error }
      );
    }

    // 204 No Content comes back as undefined
    if (raw === undefined || raw === null) return Buffer.alloc(0);
    if (raw instanceof ArrayBuffer) return Buffer.from(raw);
    if (raw instanceof Uint8Array) return Buffer.from(raw);
    throw new ContentError(itemId, `Could not download item ${itemId}: unexpected content payload`);
  }

  return { search, listChildren, getContent };
}
