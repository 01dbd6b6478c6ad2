/**
 * Error taxonomy for drivepull
 *
 * Every failure the tool reports is one of these. The CLI maps them to
 * console output and exit codes; the downloader uses them to tell which
 * stage of the walk failed.
 */

export type ErrorCode =
  | 'AUTH_FAILED'
  | 'SEARCH_FAILED'
  | 'LISTING_FAILED'
  | 'CONTENT_FAILED'
  | 'FILESYSTEM_FAILED'
  | 'DUPLICATE_MATCH'
  | 'INVALID_CONFIG';

export class DrivepullError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class AuthError extends DrivepullError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTH_FAILED', message, options);
  }
}

export class SearchError extends DrivepullError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SEARCH_FAILED', message, options);
  }
}

export class ListingError extends DrivepullError {
  readonly itemId: string;

  constructor(itemId: string, message: string, options?: { cause?: unknown }) {
    super('LISTING_FAILED', message, options);
    this.itemId = itemId;
  }
}

export class ContentError extends DrivepullError {
  readonly itemId: string;

  constructor(itemId: string, message: string, options?: { cause?: unknown }) {
    super('CONTENT_FAILED', message, options);
    this.itemId = itemId;
  }
}

export class FilesystemError extends DrivepullError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('FILESYSTEM_FAILED', message, options);
    this.path = path;
  }
}

export class DuplicateMatchError extends DrivepullError {
  readonly matches: number;

  constructor(folderName: string, matches: number) {
    super('DUPLICATE_MATCH', `Found ${matches} folders named "${folderName}" with the same webUrl`);
    this.matches = matches;
  }
}

export class ConfigError extends DrivepullError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid options:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.issues = issues;
  }
}

/**
 * Message text for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
