// SPDX-License-Identifier: Apache-2.0

import type { Logger } from 'pino';

import { Utils } from '../../utils';
import { InformationSourceError } from '../errors/InformationSourceError';
import { JsonRpcError, predefined } from '../errors/JsonRpcError';
import type { RegisteredRpcMethod, RequestDetails, RpcMethodRegistry } from '../types';
import { Validator } from '../validators';

/**
 * Dispatches JSON-RPC method calls to their appropriate handlers
 *
 * This class is responsible for:
 * - Validating incoming RPC method requests
 * - Routing requests to the correct operation handler
 * - Handling errors that occur during method execution
 */
export class RpcMethodDispatcher {
  /**
   * @param methodRegistry - Map of RPC method names to their implementations
   * @param logger - Logger for recording execution information
   */
  constructor(
    private readonly methodRegistry: RpcMethodRegistry,
    private readonly logger: Logger,
  ) {}

  /**
   * Dispatches an RPC method call to the appropriate operation handler
   *
   * This is the core method that handles the complete lifecycle of an RPC request:
   * 1. Pre-execution: Validates the method exists and its parameters
   * 2. Execution: Processes the method with the appropriate handler
   * 3. Error handling: Catches and formats any errors that occur
   *
   * @returns Promise that resolves to the method execution result or a JsonRpcError instance
   */
  public async dispatch(
    rpcMethodName: string,
    rpcMethodParams: readonly unknown[] = [],
    requestDetails: RequestDetails,
  ): Promise<unknown> {
    try {
      /////////////////////////////// Pre-execution Phase ///////////////////////////////
      const method = this.precheckRpcMethod(rpcMethodName, rpcMethodParams, requestDetails);

      /////////////////////////////// Execution Phase ///////////////////////////////
      return await this.processRpcMethod(method, rpcMethodParams, requestDetails);
    } catch (error: unknown) {
      /////////////////////////////// Error Handling Phase ///////////////////////////////
      return this.handleRpcMethodError(error, rpcMethodName, requestDetails);
    }
  }

  /**
   * Prechecks that the requested RPC method exists and its parameters are valid
   *
   * @throws {JsonRpcError} If the method doesn't exist or parameters are invalid
   */
  private precheckRpcMethod(
    rpcMethodName: string,
    rpcMethodParams: readonly unknown[],
    requestDetails: RequestDetails,
  ): RegisteredRpcMethod {
    const method = this.methodRegistry.get(rpcMethodName);

    if (!method) {
      if (this.logger.isLevelEnabled('debug')) {
        this.logger.debug(
          `${requestDetails.formattedRequestId} RPC method not found in registry: rpcMethodName=${rpcMethodName}`,
        );
      }
      throw predefined.METHOD_NOT_FOUND(rpcMethodName);
    }

    if (method.validationRules) {
      if (this.logger.isLevelEnabled('debug')) {
        this.logger.debug(
          `${
            requestDetails.formattedRequestId
          } Validating method parameters for ${rpcMethodName}, params: ${JSON.stringify(rpcMethodParams)}`,
        );
      }
      Validator.validateParams(rpcMethodParams, method.validationRules);
    }

    return method;
  }

  private async processRpcMethod(
    method: RegisteredRpcMethod,
    rpcMethodParams: readonly unknown[],
    requestDetails: RequestDetails,
  ): Promise<unknown> {
    const rearrangedParams = Utils.arrangeRpcParams(method, rpcMethodParams, requestDetails);
    return await method.handler(...rearrangedParams);
  }

  /**
   * Converts a failure of the method into a JsonRpcError carrying the request ID:
   * - JsonRpcError instances are kept as they are
   * - InformationSourceError maps to REQUEST_TIMEOUT or UPSTREAM_FAIL
   * - an aborted or timed out enrichment maps to REQUEST_TIMEOUT
   * - everything else becomes INTERNAL_ERROR
   */
  private handleRpcMethodError(error: unknown, rpcMethodName: string, requestDetails: RequestDetails): JsonRpcError {
    const errorMessage = error instanceof Error && error.message ? error.message : 'Unknown error';
    this.logger.error(
      `${requestDetails.formattedRequestId} Error executing method: rpcMethodName=${rpcMethodName}, error=${errorMessage}`,
    );

    if (error instanceof JsonRpcError) {
      return this.createJsonRpcError(error, requestDetails.requestId);
    }

    if (error instanceof InformationSourceError) {
      if (error.isTimeout()) {
        return this.createJsonRpcError(predefined.REQUEST_TIMEOUT, requestDetails.requestId);
      }
      return this.createJsonRpcError(
        predefined.UPSTREAM_FAIL(error.statusCode, error.message),
        requestDetails.requestId,
      );
    }

    if (isAbortError(error)) {
      return this.createJsonRpcError(predefined.REQUEST_TIMEOUT, requestDetails.requestId);
    }

    return this.createJsonRpcError(predefined.INTERNAL_ERROR(errorMessage), requestDetails.requestId);
  }

  /**
   * Creates a new JsonRpcError with the request ID attached to assist with tracing and debugging
   */
  private createJsonRpcError(error: JsonRpcError, requestId: string): JsonRpcError {
    return new JsonRpcError(
      {
        code: error.code,
        message: error.message,
        data: error.data,
      },
      requestId,
    );
  }
}

/**
 * AbortSignal.abort() rejects with an AbortError, AbortSignal.timeout() with a TimeoutError.
 */
function isAbortError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return false;
  }
  return error.name === 'AbortError' || error.name === 'TimeoutError';
}
