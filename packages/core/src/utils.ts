// SPDX-License-Identifier: Apache-2.0

import crypto from 'crypto';
import { v4 as uuid } from 'uuid';

import type { RegisteredRpcMethod, RequestDetails } from './lib/types';

export class Utils {
  /**
   * Generates a unique id to correlate the logs of a request.
   */
  public static generateRequestId(): string {
    return uuid();
  }

  /**
   * Generates a random 16 byte hex string prefixed with 0x.
   */
  public static generateRandomHex(): string {
    return '0x' + crypto.randomBytes(16).toString('hex');
  }

  /**
   * Lays out the positional RPC parameters for an operation handler.
   * Handlers declare their parameters through validation rules; missing optional
   * positions are filled with undefined so the request details always land last.
   */
  public static arrangeRpcParams(
    method: RegisteredRpcMethod,
    rpcParams: readonly unknown[],
    requestDetails: RequestDetails,
  ): unknown[] {
    const positions = method.validationRules ? Object.keys(method.validationRules).length : 0;
    const args = Array.from({ length: positions }, (_, index) => rpcParams[index]);
    return [...args, requestDetails];
  }
}
