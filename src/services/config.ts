/**
 * Config Service
 * Resolves client settings from environment variables and an optional config file
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { ConfigError } from './errors.js';
import type { AppConfig, ClientConfig, ClientConfigOptions, ConfigKey } from '../types/config.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'target-ads');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Validates options and returns a frozen ClientConfig
 * @throws ConfigError on empty credentials or a non-positive timeout
 */
export function createClientConfig(options: ClientConfigOptions): ClientConfig {
  const { clientId, clientSecret } = options;

  // credentials are sent as given; blank ones are rejected
  if (clientId.trim().length === 0) {
    throw new ConfigError('clientId must be a non-empty string');
  }
  if (clientSecret.trim().length === 0) {
    throw new ConfigError('clientSecret must be a non-empty string');
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigError(`timeoutMs must be a positive number, got ${timeoutMs}`);
  }

  return Object.freeze({
    clientId,
    clientSecret,
    isSandbox: options.isSandbox ?? false,
    timeoutMs,
  });
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.length === 0) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) return true;
  if (['0', 'false', 'no'].includes(normalized)) return false;
  throw new ConfigError(`TARGET_SANDBOX must be true or false, got "${value}"`);
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined || value.length === 0) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`TARGET_TIMEOUT_MS must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Keeps only the known keys that carry the expected type
 */
function toAppConfig(value: unknown): AppConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const { clientId, clientSecret, sandbox, timeoutMs } = record;
  const config: AppConfig = {};

  if (typeof clientId === 'string') config.clientId = clientId;
  if (typeof clientSecret === 'string') config.clientSecret = clientSecret;
  if (typeof sandbox === 'boolean') config.sandbox = sandbox;
  if (typeof timeoutMs === 'number') config.timeoutMs = timeoutMs;

  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;
  private env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    this.configPath =
      configPath || env.TARGET_CONFIG_PATH || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * Load the config file
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    try {
      return toAppConfig(JSON.parse(fs.readFileSync(this.configPath, 'utf-8')));
    } catch {
      // an unreadable file counts as empty configuration
      return {};
    }
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Client ID (env first)
   */
  getClientId(): string | undefined {
    const envValue = this.env.TARGET_CLIENT_ID;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.clientId;
  }

  /**
   * Client Secret (env first)
   */
  getClientSecret(): string | undefined {
    const envValue = this.env.TARGET_CLIENT_SECRET;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.clientSecret;
  }

  isSandbox(): boolean {
    return parseBoolean(this.env.TARGET_SANDBOX) ?? this.config.sandbox ?? false;
  }

  getTimeoutMs(): number {
    return parseTimeout(this.env.TARGET_TIMEOUT_MS) ?? this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  hasCredentials(): boolean {
    return Boolean(this.getClientId() && this.getClientSecret());
  }

  /**
   * @throws ConfigError when credentials are missing or a setting is invalid
   */
  getClientConfig(): ClientConfig {
    const clientId = this.getClientId();
    const clientSecret = this.getClientSecret();

    if (!clientId || !clientSecret) {
      throw new ConfigError(
        `Missing credentials: set TARGET_CLIENT_ID and TARGET_CLIENT_SECRET or add them to ${this.configPath}`
      );
    }

    return createClientConfig({
      clientId,
      clientSecret,
      isSandbox: this.isSandbox(),
      timeoutMs: this.getTimeoutMs(),
    });
  }
}

let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}
