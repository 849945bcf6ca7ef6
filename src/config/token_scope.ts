/**
 * Token Scope: which kind of join token the node holds.
 *
 * CLUSTER:
 *   - CA bundle endpoint: /cacerts
 *   - Token is used as-is (never hardware-backed)
 *   - Resource fetch carries no bearer header
 *
 * MACHINE:
 *   - CA bundle endpoint: /v1-rancheros/cacerts
 *   - Token goes through the token resolver first (may be hardware-backed)
 *   - Resource fetch carries Authorization: Bearer base64(token)
 */

import { TrustBootstrapError } from '../errors.js';

export enum TokenScope {
  CLUSTER = 'CLUSTER',
  MACHINE = 'MACHINE'
}

const CACERTS_ENDPOINTS: Record<TokenScope, string> = {
  [TokenScope.CLUSTER]: '/cacerts',
  [TokenScope.MACHINE]: '/v1-rancheros/cacerts'
};

/**
 * Parse a token scope from an input string.
 * MACHINE and NODE select the machine scope; anything else is CLUSTER.
 */
export function parseTokenScope(raw: string | undefined): TokenScope {
  const value = (raw ?? '').trim().toUpperCase();
  if (value === 'MACHINE' || value === 'NODE') return TokenScope.MACHINE;
  return TokenScope.CLUSTER;
}

/**
 * Parse the server address. Only the host (with port) is used for the
 * CA bundle endpoints; the full URL is used for resource fetches.
 */
export function parseServerUrl(server: string): URL {
  let url: URL;
  try {
    url = new URL(server);
  } catch (err) {
    throw new TrustBootstrapError('CONFIGURATION_ERROR', `Invalid server URL: ${JSON.stringify(server)}`, err);
  }
  if (!url.host) {
    throw new TrustBootstrapError('CONFIGURATION_ERROR', `Server URL has no host: ${JSON.stringify(server)}`);
  }
  return url;
}

/** https://{host}/cacerts or https://{host}/v1-rancheros/cacerts */
export function cacertsUrl(server: string, scope: TokenScope): string {
  const { host } = parseServerUrl(server);
  return `https://${host}${CACERTS_ENDPOINTS[scope]}`;
}
