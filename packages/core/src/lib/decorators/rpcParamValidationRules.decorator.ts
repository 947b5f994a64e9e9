// SPDX-License-Identifier: Apache-2.0

import type { ParamValidationRules } from '../types';

const validationRulesByMethod = new WeakMap<object, ParamValidationRules>();

/**
 * Decorator that attaches parameter validation rules to an RPC method.
 * The dispatcher validates incoming parameters against them before invoking the method.
 *
 * @example
 * ```typescript
 * @rpcMethod
 * @rpcParamValidationRules({
 *   0: { type: ParamType.TRACE_ID, required: true },
 * })
 * async getTrace(traceId: string, requestDetails: RequestDetails) {}
 * ```
 */
export function rpcParamValidationRules(rules: ParamValidationRules) {
  return function (_target: object, _propertyKey: string, descriptor: PropertyDescriptor): PropertyDescriptor {
    validationRulesByMethod.set(descriptor.value, rules);
    return descriptor;
  };
}

export function getValidationRules(operation: object): ParamValidationRules | undefined {
  return validationRulesByMethod.get(operation);
}
