/**
 * Credential Provider
 *
 * Exchanges an app registration's client id, secret and tenant for a Graph
 * access token using the client credentials flow. The scope is fixed: the
 * app's full default permission set on Microsoft Graph.
 */

import { ClientSecretCredential, type AccessToken, type TokenCredential } from '@azure/identity';
import type { AuthenticationProvider } from '@microsoft/microsoft-graph-client';
import { AuthError, describeError } from '../errors.js';

export const GRAPH_SCOPE = 'https://graph.microsoft.com/.default';

// Refresh when the cached token has less than this left
const REFRESH_MARGIN_MS = 5 * 60 * 1000;

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
  tenantId: string;
}

/**
 * A verified credential. Hands tokens to the Graph client and renews them
 * through @azure/identity when they are about to expire.
 */
export class GraphCredential implements AuthenticationProvider {
  private token: AccessToken;

  constructor(
    private readonly credential: TokenCredential,
    initialToken: AccessToken
  ) {
    this.token = initialToken;
  }

  get expiresOnTimestamp(): number {
    return this.token.expiresOnTimestamp;
  }

  async getAccessToken(): Promise<string> {
    if (this.token.expiresOnTimestamp > Date.now() + REFRESH_MARGIN_MS) {
      return this.token.token;
    }

    this.token = await requestToken(this.credential);
    return this.token.token;
  }
}

async function requestToken(credential: TokenCredential): Promise<AccessToken> {
  let token: AccessToken | null;
  try {
    token = await credential.getToken(GRAPH_SCOPE);
  } catch (error) {
    throw new AuthError(`Authentication failed: ${describeError(error)}`, { cause: error });
  }

  if (!token) {
    throw new AuthError('Authentication failed: no access token returned');
  }
  return token;
}

/**
 * Authenticate against Entra ID and return a credential scoped to Graph.
 * Fails with AuthError; there is no retry.
 */
export async function authenticate(credentials: ClientCredentials): Promise<GraphCredential> {
  const missing = (['clientId', 'clientSecret', 'tenantId'] as const)
    .filter(key => credentials[key].trim().length === 0);
  if (missing.length > 0) {
    throw new AuthError(`Missing credentials: ${missing.join(', ')}`);
  }

  let credential: TokenCredential;
  try {
    credential = new ClientSecretCredential(
      credentials.tenantId,
      credentials.clientId,
      credentials.clientSecret
    );
  } catch (error) {
    // The constructor rejects malformed tenant ids synchronously
    throw new AuthError(`Authentication failed: ${describeError(error)}`, { cause: error });
  }

  const token = await requestToken(credential);
  return new GraphCredential(credential, token);
}
