/**
 * Target API Client
 * Authenticated requests against the myTarget REST API
 */

import { TokenAcquirer } from './auth.js';
import { send } from './http.js';
import { MalformedResponseError, toApiError } from './errors.js';
import { loggers } from '../lib/logger.js';
import type { ClientConfig } from '../types/config.js';
import type { HttpMethod, LeadFilters, LeadsResponse, ResourceRequestOptions } from '../types/api.js';

/**
 * `/campaigns.json` -> `v1/campaigns.json`; versioned paths are kept
 */
export function normalizeResource(resource: string): string {
  const trimmed = resource.replace(/^\/+/, '');
  return trimmed.startsWith('v') ? trimmed : `v1/${trimmed}`;
}

export class TargetApiClient {
  readonly auth: TokenAcquirer;
  private readonly config: ClientConfig;

  constructor(config: ClientConfig) {
    this.config = config;
    this.auth = new TokenAcquirer(config);
  }

  /**
   * Sends a request with a bearer token
   * @returns the decoded body on 200, `true` on 204
   * @throws ValidationError on 400, AuthError on 401/403, TargetApiError otherwise
   */
  async request<T>(
    resource: string,
    accessToken: string,
    options: ResourceRequestOptions = {}
  ): Promise<T | true> {
    const url = this.auth.endpoint.baseUrl + normalizeResource(resource);
    const headers: Record<string, string> = { Authorization: `Bearer ${accessToken}` };
    let method: HttpMethod = options.method ?? 'GET';
    let body: string | undefined;

    if (options.data !== undefined) {
      method = options.method ?? 'POST';
      body = JSON.stringify(options.data);
      headers['Content-Type'] = 'application/json';
    }

    return loggers.api.trackAsync(
      'API request',
      async () => {
        const response = await send<T>(url, {
          method,
          headers,
          body,
          query: options.query,
          timeoutMs: this.config.timeoutMs,
          signal: options.signal,
        });

        if (response.status === 200) {
          if (response.body === undefined) {
            throw new MalformedResponseError(`Empty response body from ${url}`, undefined);
          }
          return response.body;
        }
        if (response.status === 204) {
          return true as const;
        }
        throw toApiError(response.status, response.body, response.headers.get('WWW-Authenticate'));
      },
      { method, url }
    );
  }

  /**
   * Leads collected by an OK lead ads form
   */
  async getOkLeads(
    formId: string,
    accessToken: string,
    filters: LeadFilters = {},
    signal?: AbortSignal
  ): Promise<LeadsResponse> {
    const result = await this.request<LeadsResponse>(
      `v2/ok/lead_ads/${encodeURIComponent(formId)}.json`,
      accessToken,
      { method: 'GET', query: { ...filters }, signal }
    );

    if (result === true) {
      throw new MalformedResponseError(`Lead ads form ${formId} answered 204 without a body`, undefined);
    }
    return result;
  }
}
