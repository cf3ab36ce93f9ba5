import type { ClientCredentials } from './auth.js';

/**
 * Config file structure
 */
export interface AppConfig {
  clientId?: string;
  clientSecret?: string;
  sandbox?: boolean;
  /** Request timeout (ms) */
  timeoutMs?: number;
}

export type ConfigKey = keyof AppConfig;

/**
 * Resolved client configuration, fixed for the lifetime of a client
 */
export interface ClientConfig extends ClientCredentials {
  readonly isSandbox: boolean;
  readonly timeoutMs: number;
}

export interface ClientConfigOptions {
  clientId: string;
  clientSecret: string;
  isSandbox?: boolean;
  timeoutMs?: number;
}

export interface EndpointConfig {
  readonly host: string;
  readonly baseUrl: string;
  readonly tokenUrl: string;
  readonly tokenDeleteUrl: string;
  readonly authorizeUrl: string;
}
