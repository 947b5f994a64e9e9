// SPDX-License-Identifier: Apache-2.0

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import pino from 'pino';

import { type ConfigKey, type ConfigValues, GlobalConfig } from './globalConfig';
import { LoggerService } from './loggerService';

const logger = pino({ name: 'config-service', level: process.env.LOG_LEVEL || 'info' });

export class ConfigService {
  /**
   * The singleton instance
   * @private
   */
  private static instance: ConfigService;

  /**
   * Path of the env file, relative to the working directory
   * @private
   */
  private static envFileName = '.env';

  /**
   * Loads the env file once and validates the resulting environment,
   * so that a misconfigured process fails at startup rather than on first use.
   * @private
   */
  private constructor() {
    const configPath = path.resolve(process.cwd(), ConfigService.envFileName);

    if (!fs.existsSync(configPath)) {
      logger.warn(`No ${ConfigService.envFileName} file found at ${configPath}. Relying on process environment.`);
    } else {
      dotenv.config({ path: configPath });
    }

    GlobalConfig.read(process.env);
  }

  private static getInstance(): ConfigService {
    if (!this.instance) {
      this.instance = new ConfigService();
    }

    return this.instance;
  }

  /**
   * Returns the typed value of a configuration key, falling back to its default.
   */
  public static get<K extends ConfigKey>(name: K): ConfigValues[K] {
    this.getInstance();
    return GlobalConfig.read(process.env)[name];
  }

  /**
   * Returns every configuration value rendered as a string, with sensitive fields masked.
   */
  public static getAllMasked(): Record<string, string> {
    this.getInstance();
    const values = GlobalConfig.read(process.env);

    const masked: Record<string, string> = {};
    for (const [key, value] of Object.entries(values)) {
      if (isConfigKey(key, values)) {
        masked[key] = LoggerService.maskUpEnv(key, value);
      }
    }
    return masked;
  }

  /**
   * The endpoint of the upstream ledger API, defaulting to the public one of the configured network.
   */
  public static getTonApiEndpoint(): string {
    return (
      this.get('TON_API_ENDPOINT') ??
      (this.get('IS_TESTNET') ? GlobalConfig.TESTNET_TON_API_ENDPOINT : GlobalConfig.MAINNET_TON_API_ENDPOINT)
    );
  }
}

function isConfigKey(key: string, values: ConfigValues): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(values, key);
}
