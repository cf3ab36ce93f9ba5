/**
 * Endpoint resolution - production vs sandbox hosts
 */

import type { EndpointConfig } from '../types/config.js';

export const PRODUCTION_HOST = 'target.my.com';
export const SANDBOX_HOST = 'target-sandbox.my.com';

const OAUTH_TOKEN_PATH = 'v2/oauth2/token.json';
const OAUTH_TOKEN_DELETE_PATH = 'v2/oauth2/token/delete.json';
const OAUTH_AUTHORIZE_PATH = '/oauth2/authorize';

export function resolveEndpoint(isSandbox: boolean): EndpointConfig {
  const host = isSandbox ? SANDBOX_HOST : PRODUCTION_HOST;
  const baseUrl = `https://${host}/api/`;

  return Object.freeze({
    host,
    baseUrl,
    tokenUrl: baseUrl + OAUTH_TOKEN_PATH,
    tokenDeleteUrl: baseUrl + OAUTH_TOKEN_DELETE_PATH,
    authorizeUrl: `https://${host}${OAUTH_AUTHORIZE_PATH}`,
  });
}
