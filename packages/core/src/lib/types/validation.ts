// SPDX-License-Identifier: Apache-2.0

export enum ParamType {
  ACCOUNT_ID = 'accountId',
  TRACE_ID = 'traceId',
  LIMIT = 'limit',
}

export interface ParamValidationRule {
  type: ParamType;
  required: boolean;
}

/**
 * Validation rules of a method, keyed by parameter position.
 */
export type ParamValidationRules = Record<number, ParamValidationRule>;
