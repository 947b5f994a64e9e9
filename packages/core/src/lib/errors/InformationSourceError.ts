// SPDX-License-Identifier: Apache-2.0

/**
 * Failure of the upstream ledger API while resolving additional trace information.
 */
export class InformationSourceError extends Error {
  public statusCode: number;

  static ErrorCodes = {
    ECONNABORTED: 504,
    UNKNOWN: 500,
  };

  constructor(
    message: string,
    statusCode: number = InformationSourceError.ErrorCodes.UNKNOWN,
    public readonly method?: string,
  ) {
    super(message);
    this.name = 'InformationSourceError';
    this.statusCode = statusCode;
  }

  /**
   * Wraps an error thrown by the ledger client, keeping the upstream HTTP status when it is known.
   */
  static fromClientError(error: unknown, method: string): InformationSourceError {
    if (error instanceof InformationSourceError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new InformationSourceError(message, InformationSourceError.statusOf(error), method);
  }

  private static statusOf(error: unknown): number {
    if (typeof error !== 'object' || error === null) {
      return InformationSourceError.ErrorCodes.UNKNOWN;
    }
    if ('code' in error && error.code === 'ECONNABORTED') {
      return InformationSourceError.ErrorCodes.ECONNABORTED;
    }
    if ('response' in error && typeof error.response === 'object' && error.response !== null) {
      const { response } = error;
      if ('status' in response && typeof response.status === 'number') {
        return response.status;
      }
    }
    return InformationSourceError.ErrorCodes.UNKNOWN;
  }

  public isTimeout(): boolean {
    return this.statusCode === InformationSourceError.ErrorCodes.ECONNABORTED;
  }
}
