// SPDX-License-Identifier: Apache-2.0

import type { ConfigKey } from './globalConfig';

export class LoggerService {
  public static readonly SENSITIVE_FIELDS: readonly ConfigKey[] = ['TON_API_KEY', 'API_TOKENS'];

  public static readonly MASK = '**********';

  /**
   * Renders a configuration value for logs and the config endpoint,
   * hiding the value of every sensitive field that is set.
   */
  static maskUpEnv(key: ConfigKey, value: unknown): string {
    if (value === undefined) {
      return '';
    }
    if (LoggerService.SENSITIVE_FIELDS.includes(key)) {
      return LoggerService.MASK;
    }
    return Array.isArray(value) ? value.join(',') : String(value);
  }
}
