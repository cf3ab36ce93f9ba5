export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean;

export interface ResourceRequestOptions {
  /** JSON body; switches the default method to POST */
  data?: unknown;
  query?: Record<string, QueryValue | undefined>;
  method?: HttpMethod;
  signal?: AbortSignal;
}

/**
 * Filters for the OK lead ads endpoint
 * Dates use the `YYYY-MM-DD hh:mm:ss` format, id lists are comma separated.
 */
export type LeadFilters = {
  /** default 20, max 50 */
  limit?: number;
  offset?: number;
  _created_time__lt?: string;
  _created_time__gt?: string;
  _created_time__lte?: string;
  _created_time__gte?: string;
  _campaign_id?: string;
  _campaign_id__in?: string;
  _banner_id?: string;
  _banner_id__in?: string;
};

export interface Lead {
  id: number;
  [key: string]: unknown;
}

export interface LeadsResponse {
  count: number;
  offset: number;
  limit: number;
  items: Lead[];
}
