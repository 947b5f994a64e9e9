// SPDX-License-Identifier: Apache-2.0

/**
 * Methods marked as available for RPC invocation.
 */
const rpcMethods = new WeakSet<object>();

/**
 * Decorator that marks a class method as an RPC method.
 * When applied to a method, it marks that method as available for RPC invocation.
 *
 * @example
 * ```typescript
 * class StatusImpl {
 *   @rpcMethod
 *   monitoredAccounts(): string[] {
 *     return [];
 *   }
 * }
 * ```
 *
 * @param _target - The prototype of the class (ignored in this implementation)
 * @param _propertyKey - The name of the method being decorated (ignored in this implementation)
 * @param descriptor - The property descriptor for the method
 * @returns The same property descriptor, allowing for decorator composition
 */
export function rpcMethod(_target: object, _propertyKey: string, descriptor: PropertyDescriptor): PropertyDescriptor {
  rpcMethods.add(descriptor.value);
  return descriptor;
}

export function isRpcMethod(operation: object): boolean {
  return rpcMethods.has(operation);
}
