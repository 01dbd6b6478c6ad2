import { z } from 'zod';

// Only the fields drivepull reads are modeled; Graph sends many more and
// zod strips the rest.

const ParentReferenceSchema = z.object({
  driveId: z.string().optional(),
  id: z.string().optional(),
  path: z.string().optional(),
});

export const DriveItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  size: z.number().optional(),
  webUrl: z.string().optional(),
  parentReference: ParentReferenceSchema.optional(),
  file: z.object({ mimeType: z.string().optional() }).passthrough().optional(),
  folder: z.object({ childCount: z.number().optional() }).passthrough().optional(),
});

export type DriveItem = z.infer<typeof DriveItemSchema>;

export const DriveItemPageSchema = z.object({
  value: z.array(DriveItemSchema),
  '@odata.nextLink': z.string().optional(),
});

export type DriveItemPage = z.infer<typeof DriveItemPageSchema>;

const SearchResourceSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  webUrl: z.string().optional(),
  parentReference: ParentReferenceSchema.optional(),
});

const SearchHitSchema = z.object({
  hitId: z.string().optional(),
  resource: SearchResourceSchema,
});

const HitsContainerSchema = z.object({
  hits: z.array(SearchHitSchema).default([]),
  total: z.number().optional(),
  moreResultsAvailable: z.boolean().optional(),
});

const SearchResponseSchema = z.object({
  searchTerms: z.array(z.string()).optional(),
  hitsContainers: z.array(HitsContainerSchema).default([]),
});

export const SearchResultSchema = z.object({
  value: z.array(SearchResponseSchema),
});

export type GraphSearchResponse = z.infer<typeof SearchResponseSchema>;

export type EntityType = 'driveItem' | 'drive' | 'site' | 'list' | 'listItem';

/**
 * Body of a single entry in POST /search/query `requests`
 */
export interface SearchRequest {
  entityTypes: EntityType[];
  region?: string;
  query: { queryString: string };
  from: number;
  size: number;
}

export type ItemKind = 'folder' | 'file' | 'other';

/**
 * A drive item as the rest of drivepull sees it
 */
export interface RemoteItem {
  id: string;
  name: string;
  driveId: string;
  kind: ItemKind;
  webUrl?: string;
  size?: number;
}

/**
 * A flattened search hit
 */
export interface SearchHit {
  itemId: string;
  name?: string;
  webUrl?: string;
  driveId?: string;
}

export interface SearchResponse {
  hitsContainers: Array<{ hits: SearchHit[] }>;
}

export function toRemoteItem(item: DriveItem, fallbackDriveId: string): RemoteItem {
  let kind: ItemKind = 'other';
  if (item.folder) kind = 'folder';
  else if (item.file) kind = 'file';

  return {
    id: item.id,
    name: item.name,
    driveId: item.parentReference?.driveId ?? fallbackDriveId,
    kind,
    webUrl: item.webUrl,
    size: item.size,
  };
}

export function toSearchResponses(result: z.infer<typeof SearchResultSchema>): SearchResponse[] {
  return result.value.map(response => ({
    hitsContainers: response.hitsContainers.map(container => ({
      hits: container.hits.map(hit => ({
        itemId: hit.resource.id,
        name: hit.resource.name,
        webUrl: hit.resource.webUrl,
        driveId: hit.resource.parentReference?.driveId,
      })),
    })),
  }));
}

/**
 * The remote operations drivepull needs. Implemented over Microsoft Graph
 * by createGraphRemoteClient, and by in-memory fakes in tests.
 */
export interface RemoteClient {
  search(request: SearchRequest): Promise<SearchResponse[]>;
  /** Lazily pages through a folder's children until the listing is exhausted */
  listChildren(driveId: string, itemId: string): AsyncIterable<RemoteItem>;
  getContent(driveId: string, itemId: string): Promise<Buffer>;
}
