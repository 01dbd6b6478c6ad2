/**
 * Download command tests
 *
 * Authentication and the remote client are injected; output is captured.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { downloadCommand } from '../src/cli/commands/download.js';
import { Verbosity } from '../src/cli/logger.js';
import type { RawFlags } from '../src/config/options.js';
import { AuthError } from '../src/errors.js';
import { GraphCredential, type ClientCredentials } from '../src/graph/credentials.js';
import {
  createCapturingLogger,
  createFakeClient,
  file,
  folder,
  listTree,
  makeTempDir,
  removeTempDir,
  searchResult,
  type FakeClient,
} from './setup.js';

const WEB_URL = 'https://contoso.sharepoint.com/sites/team/Reports';

let tmp: string;

const flags = (overrides: RawFlags = {}): RawFlags => ({
  client_id: 'test-client',
  client_secret: 'test-secret',
  tenant_id: 'test-tenant',
  folder_name: 'Reports',
  web_url: WEB_URL,
  download_path: tmp,
  ...overrides,
});

const signedIn = async (_credentials: ClientCredentials) =>
  new GraphCredential({ getToken: async () => null }, { token: 'test-token', expiresOnTimestamp: Date.UTC(2030, 0, 1) });

const matchingClient = (options: Parameters<typeof createFakeClient>[1] = {}): FakeClient =>
  createFakeClient([file('f1.txt', 'hello'), folder('B', [file('f2.txt', 'world!')])], {
    searchResponses: searchResult([{ itemId: 'root', name: 'Reports', webUrl: WEB_URL, driveId: 'drive-1' }]),
    ...options,
  });

beforeEach(async () => {
  tmp = await makeTempDir();
});

afterEach(async () => {
  await removeTempDir(tmp);
});

describe('downloadCommand', () => {
  it('downloads the folder and exits 0', async () => {
    const { logger, lines } = createCapturingLogger(Verbosity.Normal);
    const client = matchingClient();

    const code = await downloadCommand(flags(), {
      authenticate: signedIn,
      createClient: () => client,
      logger,
      spinner: false,
      env: {},
    });

    expect(code).toBe(0);
    expect(await listTree(tmp)).toEqual(['Reports/', 'Reports/B/', 'Reports/B/f2.txt', 'Reports/f1.txt']);
    expect(lines).toEqual([
      '\n  Downloading "Reports"\n',
      '  ✓ Downloaded file: Reports/f1.txt',
      '  ✓ Downloaded file: Reports/B/f2.txt',
      '',
      `  ✓ 2 files (11 B) in 1 folder saved to ${path.join(tmp, 'Reports')}`,
    ]);
  });

  it('exits 0 when no folder matches', async () => {
    const { logger, lines } = createCapturingLogger(Verbosity.Normal);
    const client = createFakeClient([], { searchResponses: [] });

    const code = await downloadCommand(flags(), {
      authenticate: signedIn,
      createClient: () => client,
      logger,
      spinner: false,
      env: {},
    });

    expect(code).toBe(0);
    expect(lines.at(-1)).toBe(`  ! No matching folder found for query: Reports and webUrl: ${WEB_URL}`);
    expect(await listTree(tmp)).toEqual([]);
  });

  it('passes the credential flags to authentication', async () => {
    const { logger } = createCapturingLogger(Verbosity.Quiet);
    const seen: ClientCredentials[] = [];

    await downloadCommand(flags(), {
      authenticate: async credentials => {
        seen.push(credentials);
        return signedIn(credentials);
      },
      createClient: () => createFakeClient([], { searchResponses: [] }),
      logger,
      spinner: false,
      env: {},
    });

    expect(seen).toEqual([{ clientId: 'test-client', clientSecret: 'test-secret', tenantId: 'test-tenant' }]);
  });

  it('exits 1 and prints the error when authentication fails', async () => {
    const { logger, lines } = createCapturingLogger(Verbosity.Normal);
    let clientCreated = false;

    const code = await downloadCommand(flags(), {
      authenticate: async () => {
        throw new AuthError('Authentication failed: invalid_client');
      },
      createClient: () => {
        clientCreated = true;
        return createFakeClient([]);
      },
      logger,
      spinner: false,
      env: {},
    });

    expect(code).toBe(1);
    expect(clientCreated).toBe(false);
    expect(lines.at(-1)).toBe('  ✗ Authentication failed: invalid_client');
  });

  it('exits 1 on invalid options without authenticating', async () => {
    const { logger, lines } = createCapturingLogger(Verbosity.Normal);
    let authenticated = false;

    const code = await downloadCommand(flags({ folder_name: undefined }), {
      authenticate: async credentials => {
        authenticated = true;
        return signedIn(credentials);
      },
      logger,
      spinner: false,
      env: {},
    });

    expect(code).toBe(1);
    expect(authenticated).toBe(false);
    expect(lines).toEqual(['  ✗ Invalid options:\n  - --folder_name is required']);
  });

  it('exits 1 when the download aborts', async () => {
    const { logger, lines } = createCapturingLogger(Verbosity.Normal);
    const client = matchingClient({ failListing: ['root/B'] });

    const code = await downloadCommand(flags(), {
      authenticate: signedIn,
      createClient: () => client,
      logger,
      spinner: false,
      env: {},
    });

    expect(code).toBe(1);
    expect(lines.at(-1)).toBe('  ✗ Could not list folder root/B');
  });

  it('exits 1 when a continued run recorded failures', async () => {
    const { logger, lines } = createCapturingLogger(Verbosity.Normal);
    const client = matchingClient({ failContent: ['root/f1.txt'] });

    const code = await downloadCommand(flags({ on_error: 'continue' }), {
      authenticate: signedIn,
      createClient: () => client,
      logger,
      spinner: false,
      env: {},
    });

    expect(code).toBe(1);
    expect(await listTree(tmp)).toEqual(['Reports/', 'Reports/B/', 'Reports/B/f2.txt']);
    expect(lines.at(-1)).toBe('  ! 1 item could not be downloaded');
  });
});
