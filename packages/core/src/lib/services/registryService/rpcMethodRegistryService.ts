// SPDX-License-Identifier: Apache-2.0

import { getValidationRules, isRpcMethod } from '../../decorators';
import type { OperationHandler, RpcMethodRegistry, RpcNamespaceRegistry } from '../../types';

/**
 * Registers RPC methods from the provided service implementations.
 *
 * This function scans each implementation instance for methods decorated with
 * the @rpcMethod decorator and registers them in a map using the convention
 * namespace_operationName (e.g., trace_getTrace).
 *
 * @returns A map where keys are RPC method names in the format namespace_operationName,
 * and values are the bound implementations together with their validation rules.
 */
export function registerRpcMethods(rpcNamespaceRegistry: RpcNamespaceRegistry[]): RpcMethodRegistry {
  const registry: RpcMethodRegistry = new Map();

  rpcNamespaceRegistry.forEach(({ namespace, serviceImpl }) => {
    // Get the prototype to access the methods defined on the class
    const prototype: object = Object.getPrototypeOf(serviceImpl);

    Object.getOwnPropertyNames(prototype)
      .filter((operationName) => operationName !== 'constructor')
      .forEach((operationName) => {
        const operation: unknown = Reflect.get(prototype, operationName);

        // Only register methods that have been decorated with @rpcMethod
        if (!isOperationHandler(operation) || !isRpcMethod(operation)) {
          return;
        }

        // Bind the method to the implementation instance to preserve the 'this' context
        const handler: OperationHandler = operation.bind(serviceImpl);

        registry.set(`${namespace}_${operationName}`, {
          handler,
          validationRules: getValidationRules(operation),
        });
      });
  });

  return registry;
}

function isOperationHandler(value: unknown): value is OperationHandler {
  return typeof value === 'function';
}
