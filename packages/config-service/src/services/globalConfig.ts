// SPDX-License-Identifier: Apache-2.0

import { ConfigurationError } from '../errors/ConfigurationError';

/**
 * Reads typed values out of a raw environment map.
 * An unset or empty variable yields the supplied default.
 */
class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  private raw(key: string): string | undefined {
    const value = this.env[key];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  }

  string(key: string, defaultValue: string): string {
    return this.raw(key) ?? defaultValue;
  }

  optionalString(key: string): string | undefined {
    return this.raw(key);
  }

  number(key: string, defaultValue: number): number {
    const value = this.raw(key);
    if (value === undefined) {
      return defaultValue;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationError(`${key} must be a number, got "${value}".`);
    }
    return parsed;
  }

  boolean(key: string, defaultValue: boolean): boolean {
    const value = this.raw(key);
    if (value === undefined) {
      return defaultValue;
    }
    switch (value.toLowerCase()) {
      case 'true':
        return true;
      case 'false':
        return false;
      default:
        throw new ConfigurationError(`${key} must be "true" or "false", got "${value}".`);
    }
  }

  array(key: string, defaultValue: readonly string[]): string[] {
    const value = this.raw(key);
    if (value === undefined) {
      return [...defaultValue];
    }
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
}

export class GlobalConfig {
  static readonly DEFAULT_ACCOUNTS: readonly string[] = [
    '0:0e41dc1dc3c9067ed24248580e12b3359818d83dee0304fabcf80845eafafdb2',
  ];

  static readonly MAINNET_TON_API_ENDPOINT = 'https://toncenter.com/api/v2/jsonRPC';
  static readonly TESTNET_TON_API_ENDPOINT = 'https://testnet.toncenter.com/api/v2/jsonRPC';

  /**
   * Builds the full configuration from an environment map.
   * Every key the services may ask for is listed here together with its default.
   */
  static read(env: NodeJS.ProcessEnv) {
    const reader = new EnvReader(env);
    return {
      // listeners
      PORT: reader.number('PORT', 8081),
      UNIX_SOCKETS: reader.array('UNIX_SOCKETS', []),
      LOG_LEVEL: reader.string('LOG_LEVEL', 'info'),

      // monitored accounts
      ACCOUNTS: reader.array('ACCOUNTS', GlobalConfig.DEFAULT_ACCOUNTS),
      ACCOUNTS_FILE: reader.string('ACCOUNTS_FILE', 'accounts.txt'),

      // upstream ledger client
      IS_TESTNET: reader.boolean('IS_TESTNET', false),
      TON_API_ENDPOINT: reader.optionalString('TON_API_ENDPOINT'),
      TON_API_KEY: reader.optionalString('TON_API_KEY'),

      // enrichment
      ENRICHMENT_ENABLED: reader.boolean('ENRICHMENT_ENABLED', true),
      INFORMATION_SOURCE_TIMEOUT: reader.number('INFORMATION_SOURCE_TIMEOUT', 10_000),
      JETTON_MASTER_CACHE_MAX: reader.number('JETTON_MASTER_CACHE_MAX', 10_000),

      // trace store
      TRACE_CACHE_MAX: reader.number('TRACE_CACHE_MAX', 10_000),
      TRACE_CACHE_TTL: reader.number('TRACE_CACHE_TTL', 3_600_000),
      TRACE_MAX_DEPTH: reader.number('TRACE_MAX_DEPTH', 1024),

      // json-rpc server
      API_TOKENS: reader.array('API_TOKENS', []),
      INPUT_SIZE_LIMIT: reader.number('INPUT_SIZE_LIMIT', 1),
      BATCH_REQUESTS_ENABLED: reader.boolean('BATCH_REQUESTS_ENABLED', true),
      BATCH_REQUESTS_MAX_SIZE: reader.number('BATCH_REQUESTS_MAX_SIZE', 100),
      REQUEST_ID_IS_OPTIONAL: reader.boolean('REQUEST_ID_IS_OPTIONAL', false),

      // push channels
      SSE_HEARTBEAT_INTERVAL: reader.number('SSE_HEARTBEAT_INTERVAL', 5000),
      WS_CACHE_TTL: reader.number('WS_CACHE_TTL', 20_000),
      WS_CACHE_MAX: reader.number('WS_CACHE_MAX', 1000),
      WS_MAX_SUBSCRIPTIONS: reader.number('WS_MAX_SUBSCRIPTIONS', 1000),
    };
  }
}

export type ConfigValues = ReturnType<typeof GlobalConfig.read>;

export type ConfigKey = keyof ConfigValues;
