// SPDX-License-Identifier: Apache-2.0

import { predefined, toAccountId } from '@ton-trace-api/core';

const WORKCHAIN_PARAM_REGEX = /^workchain=(-?\d+)$/;

/**
 * Normalizes the account parameters of a subscription request to raw account ids.
 *
 * @throws {JsonRpcError} if a parameter is not an address
 */
export const validateAccountParams = (params: readonly unknown[]): string[] => {
  return params.map((param, index) => {
    if (typeof param !== 'string') {
      throw predefined.INVALID_PARAMETER(index, 'Expected a raw or user-friendly account address');
    }
    try {
      return toAccountId(param);
    } catch {
      throw predefined.INVALID_PARAMETER(index, `${param} is not a valid account address`);
    }
  });
};

/**
 * Reads the optional `workchain=N` parameter of a block subscription.
 *
 * @throws {JsonRpcError} if the parameter is present but malformed
 */
export const validateWorkchainParam = (params: readonly unknown[]): number | undefined => {
  if (params.length === 0) {
    return undefined;
  }
  const [param] = params;
  const match = typeof param === 'string' ? WORKCHAIN_PARAM_REGEX.exec(param) : null;
  if (match === null) {
    throw predefined.INVALID_PARAMETER(0, 'Expected workchain=<integer>');
  }
  return Number(match[1]);
};
