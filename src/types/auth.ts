/**
 * OAuth2 grant types accepted by the token endpoint
 */
export type GrantType =
  | 'client_credentials'
  | 'agency_client_credentials'
  | 'refresh_token'
  | 'authorization_code';

/**
 * OAuth2 Token Response
 */
export interface Token {
  access_token: string;
  token_type: string;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
  /** Tokens the client may still issue before hitting the platform limit */
  tokens_left?: number;
}

export interface ClientCredentials {
  readonly clientId: string;
  readonly clientSecret: string;
}

export interface AuthorizeUrl {
  state: string;
  url: string;
}

export interface RequestOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}
