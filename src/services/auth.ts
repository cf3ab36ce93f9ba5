/**
 * Auth Service
 * OAuth2 token exchange against the myTarget token endpoint.
 * One request per call; tokens are returned, never cached here.
 */

import { randomBytes } from 'crypto';
import { send, formBody, FORM_HEADERS } from './http.js';
import { resolveEndpoint } from './endpoint.js';
import { AuthError, MalformedResponseError, describeErrorBody } from './errors.js';
import { loggers } from '../lib/logger.js';
import type { HttpResponse } from './http.js';
import type { ClientConfig, EndpointConfig } from '../types/config.js';
import type { AuthorizeUrl, GrantType, RequestOptions, Token } from '../types/auth.js';

export const OAUTH_ADS_SCOPES = ['read_ads', 'read_payments', 'create_ads'] as const;
export const OAUTH_AGENCY_SCOPES = ['create_clients', 'read_clients', 'create_agency_payments'] as const;
export const OAUTH_MANAGER_SCOPES = ['read_manager_clients', 'edit_manager_clients', 'read_payments'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a token endpoint body
 * @throws MalformedResponseError when access_token is missing or a field has the wrong type
 */
export function parseToken(body: unknown): Token {
  if (!isRecord(body)) {
    throw new MalformedResponseError('Token response is not a JSON object', body);
  }

  const { access_token, token_type, expires_in, refresh_token, scope, tokens_left } = body;

  if (typeof access_token !== 'string' || access_token.length === 0) {
    throw new MalformedResponseError('Token response has no access_token', body);
  }
  if (token_type !== undefined && typeof token_type !== 'string') {
    throw new MalformedResponseError('Token response has a non-string token_type', body);
  }
  if (expires_in !== undefined && (typeof expires_in !== 'number' || !Number.isFinite(expires_in))) {
    throw new MalformedResponseError('Token response has a non-numeric expires_in', body);
  }

  const token: Token = {
    access_token,
    token_type: token_type ?? 'Bearer',
    expires_in: expires_in ?? 0,
  };
  if (typeof refresh_token === 'string') token.refresh_token = refresh_token;
  if (typeof scope === 'string') token.scope = scope;
  if (typeof tokens_left === 'number') token.tokens_left = tokens_left;

  return token;
}

function rejection(response: HttpResponse, fallback: string): AuthError {
  return new AuthError(
    describeErrorBody(response.body, fallback),
    response.status,
    response.body,
    response.headers.get('WWW-Authenticate')
  );
}

export class TokenAcquirer {
  private readonly config: ClientConfig;
  readonly endpoint: EndpointConfig;

  constructor(config: ClientConfig) {
    this.config = config;
    this.endpoint = resolveEndpoint(config.isSandbox);
  }

  /**
   * client_credentials grant
   */
  requestClientToken(options: RequestOptions = {}): Promise<Token> {
    return this.requestToken('client_credentials', {}, options);
  }

  /**
   * Token on behalf of an agency's client
   */
  requestAgencyClientToken(agencyClientName: string, options: RequestOptions = {}): Promise<Token> {
    return this.requestToken(
      'agency_client_credentials',
      { agency_client_name: agencyClientName },
      options
    );
  }

  refreshAccessToken(refreshToken: string, options: RequestOptions = {}): Promise<Token> {
    return this.requestToken('refresh_token', { refresh_token: refreshToken }, options);
  }

  /**
   * Exchanges the code returned to the redirect URI after user authorization
   */
  requestAppUserToken(code: string, options: RequestOptions = {}): Promise<Token> {
    return this.requestToken('authorization_code', { code }, options);
  }

  /**
   * Revokes the client's tokens, or only those issued for `username`
   */
  async deleteTokens(username?: string, options: RequestOptions = {}): Promise<boolean> {
    const fields: Record<string, string> = {
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
    };
    if (username !== undefined) {
      fields.username = username;
    }

    const url = this.endpoint.tokenDeleteUrl;
    return loggers.auth.trackAsync(
      'Token delete',
      async () => {
        const response = await send(url, {
          method: 'POST',
          headers: { ...FORM_HEADERS },
          body: formBody(fields),
          timeoutMs: this.config.timeoutMs,
          signal: options.signal,
        });

        if (response.status !== 204) {
          throw rejection(response, 'Token delete rejected');
        }
        return true;
      },
      { method: 'POST', url }
    );
  }

  /**
   * Builds the URL users visit to grant this app access
   */
  getAuthorizeUrl(scopes: readonly string[] = OAUTH_ADS_SCOPES, state?: string): AuthorizeUrl {
    const resolvedState = state || randomBytes(16).toString('hex');
    const url = new URL(this.endpoint.authorizeUrl);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', this.config.clientId);
    url.searchParams.set('state', resolvedState);
    url.searchParams.set('scope', scopes.join(','));

    return { state: resolvedState, url: url.toString() };
  }

  private async requestToken(
    grantType: GrantType,
    extra: Record<string, string>,
    options: RequestOptions
  ): Promise<Token> {
    const body = formBody({
      grant_type: grantType,
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      ...extra,
    });

    const url = this.endpoint.tokenUrl;
    return loggers.auth.trackAsync(
      `Token request (${grantType})`,
      async () => {
        const response = await send(url, {
          method: 'POST',
          headers: { ...FORM_HEADERS },
          body,
          timeoutMs: this.config.timeoutMs,
          signal: options.signal,
        });

        if (response.status !== 200) {
          throw rejection(response, 'Token request rejected');
        }
        return parseToken(response.body);
      },
      { method: 'POST', url }
    );
  }
}
