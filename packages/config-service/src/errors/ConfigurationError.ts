// SPDX-License-Identifier: Apache-2.0

/**
 * Raised when the process environment cannot be turned into a valid configuration.
 * The process is expected to stop on this error.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigurationError';
  }
}
