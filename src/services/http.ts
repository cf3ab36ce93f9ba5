/**
 * HTTP transport
 * Single ofetch exchange: no retries, bounded by a timeout, abortable by the caller.
 * Statuses are returned to the caller; only transport failures throw.
 */

import { ofetch } from 'ofetch';
import type { FetchResponse } from 'ofetch';
import { NetworkError } from './errors.js';
import type { HttpMethod, QueryValue } from '../types/api.js';

export interface HttpRequest {
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  query?: Record<string, QueryValue | undefined>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpResponse<T = unknown> {
  status: number;
  body: T | undefined;
  headers: Headers;
}

/**
 * ofetch ignores its own `timeout` once a signal is given, so the timeout
 * travels as a signal too.
 */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export async function send<T = unknown>(url: string, request: HttpRequest): Promise<HttpResponse<T>> {
  let response: FetchResponse<T>;

  try {
    response = await ofetch.raw<T>(url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      query: request.query,
      signal: requestSignal(request.timeoutMs, request.signal),
      retry: 0,
      ignoreResponseError: true,
    });
  } catch (error) {
    throw new NetworkError(url, error);
  }

  return {
    status: response.status,
    body: response._data,
    headers: response.headers,
  };
}

/**
 * Encodes fields as an application/x-www-form-urlencoded body
 */
export function formBody(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}

export const FORM_HEADERS = {
  'Content-Type': 'application/x-www-form-urlencoded',
} as const;
