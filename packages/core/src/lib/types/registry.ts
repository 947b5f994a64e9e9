// SPDX-License-Identifier: Apache-2.0

import type { ParamValidationRules } from './validation';

/**
 * Type for supported namespaces
 */
export type RpcNamespace = 'trace' | 'status';

/**
 * Type for the registry mapping of namespaces to their service implementations
 */
export type RpcNamespaceRegistry = {
  namespace: RpcNamespace;
  serviceImpl: object;
};

/**
 * A method handler registered for remote invocation.
 * Positional parameters are checked against the validation rules before the call,
 * and the request details are always passed last.
 */
export type OperationHandler = (...args: unknown[]) => unknown;

export interface RegisteredRpcMethod {
  handler: OperationHandler;
  validationRules?: ParamValidationRules;
}

/**
 * Type for the registry mapping of method names to their handler implementations
 */
export type RpcMethodRegistry = Map<string, RegisteredRpcMethod>;
