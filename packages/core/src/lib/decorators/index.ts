// SPDX-License-Identifier: Apache-2.0

export * from './rpcMethod.decorator';
export * from './rpcParamValidationRules.decorator';
