// SPDX-License-Identifier: Apache-2.0

import { Address } from '@ton/core';
import fs from 'fs';
import type { Logger } from 'pino';

import { ConfigurationError } from '../errors/ConfigurationError';
import { ConfigService } from './index';

/**
 * Loads the allow-list of monitored accounts.
 *
 * The list comes from ACCOUNTS_FILE when it can be read, one address per line
 * (anything after the first comma on a line is ignored), otherwise from ACCOUNTS.
 * Addresses are returned in raw form, e.g. `0:0e41...fdb2`.
 */
export class AccountsLoader {
  constructor(private readonly logger: Logger) {}

  public load(): string[] {
    const fileName = ConfigService.get('ACCOUNTS_FILE');
    try {
      return this.loadFromFile(fileName);
    } catch (error) {
      this.logger.warn(`Failed to load accounts from file: ${errorMessage(error)}`);
    }

    this.logger.info('Fallback: Load accounts from environment variable');
    return ConfigService.get('ACCOUNTS').map((account) => {
      const parsed = AccountsLoader.parseAccount(account);
      if (parsed === null) {
        throw new ConfigurationError(`ACCOUNTS contains an invalid address "${account}".`);
      }
      return parsed;
    });
  }

  public loadFromFile(fileName: string): string[] {
    let content: string;
    try {
      content = fs.readFileSync(fileName, 'utf8');
    } catch (error) {
      throw new Error(`error opening accounts file '${fileName}': ${errorMessage(error)}`);
    }

    const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
    this.logger.info(`Loading accounts from file '${fileName}'...`);

    const accounts: string[] = [];
    let lastReportedDecile = 0;
    lines.forEach((line, index) => {
      const candidate = line.split(',')[0].trim();
      const account = AccountsLoader.parseAccount(candidate);
      if (account === null) {
        this.logger.warn(`Skipping invalid account: ${candidate}`);
      } else {
        accounts.push(account);
      }

      const decile = Math.floor(((index + 1) / lines.length) * 10);
      if (decile > lastReportedDecile) {
        lastReportedDecile = decile;
        if (this.logger.isLevelEnabled('debug')) {
          this.logger.debug(`Progress: ${decile * 10}%`);
        }
      }
    });

    this.logger.info(`Finished loading ${accounts.length} accounts from file '${fileName}'`);
    return accounts;
  }

  /**
   * Parses a raw or user-friendly address into raw form, or returns null when it is not an address.
   */
  static parseAccount(value: string): string | null {
    try {
      return Address.parse(value).toRawString();
    } catch {
      return null;
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
