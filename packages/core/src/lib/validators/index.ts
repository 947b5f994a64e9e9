// SPDX-License-Identifier: Apache-2.0

import { Address } from '@ton/core';

import constants from '../constants';
import { predefined } from '../errors/JsonRpcError';
import { ParamType, type ParamValidationRules } from '../types';

interface ParamTypeCheck {
  test: (param: unknown) => boolean;
  error: string;
}

export const TYPES: Record<ParamType, ParamTypeCheck> = {
  [ParamType.ACCOUNT_ID]: {
    test: (param: unknown) =>
      typeof param === 'string' && (constants.RAW_ADDRESS_REGEX.test(param) || isFriendlyAddress(param)),
    error: 'Expected a raw or user-friendly account address',
  },
  [ParamType.TRACE_ID]: {
    test: (param: unknown) => typeof param === 'string' && constants.TRACE_ID_REGEX.test(param.toLowerCase()),
    error: 'Expected a transaction hash of 64 hex characters',
  },
  [ParamType.LIMIT]: {
    test: (param: unknown) =>
      typeof param === 'number' &&
      Number.isInteger(param) &&
      param > 0 &&
      param <= constants.MAX_ACCOUNT_TRACES_LIMIT,
    error: `Expected an integer between 1 and ${constants.MAX_ACCOUNT_TRACES_LIMIT}`,
  },
};

function isFriendlyAddress(value: string): boolean {
  if (!Address.isFriendly(value)) {
    return false;
  }
  try {
    Address.parseFriendly(value);
    return true;
  } catch {
    // checksum or tag mismatch
    return false;
  }
}

/**
 * Validates positional parameters against the rules of a method.
 *
 * @throws {JsonRpcError} MISSING_REQUIRED_PARAMETER or INVALID_PARAMETER for the first offending position
 */
export function validateParams(params: readonly unknown[], rules: ParamValidationRules): void {
  for (const [key, rule] of Object.entries(rules)) {
    const index = Number(key);
    const param = params[index];

    if (param === undefined || param === null) {
      if (rule.required) {
        throw predefined.MISSING_REQUIRED_PARAMETER(index);
      }
      continue;
    }

    const check = TYPES[rule.type];
    if (!check.test(param)) {
      throw predefined.INVALID_PARAMETER(index, `${check.error}, value: ${JSON.stringify(param)}`);
    }
  }
}

export const Validator = { validateParams };
