// SPDX-License-Identifier: Apache-2.0

import { JsonRpcError, predefined, type RequestDetails, type TraceApi } from '@ton-trace-api/core';
import type { Logger } from 'pino';

import type { SubscriptionService, WsConnection } from '../service/subscriptionService';
import { WS_CONSTANTS } from '../utils/constants';
import { jsonResp, type RequestId, type WsResponse } from '../utils/jsonResp';
import { handleSubscribe, handleSubscribeBlock } from './subscribeController';
import { handleUnsubscribe, handleUnsubscribeBlock } from './unsubscribeController';

export interface WsRequest {
  jsonrpc: '2.0';
  id: RequestId;
  method: string;
  params: unknown[];
}

export type ISharedParams = {
  request: WsRequest;
  params: unknown[];
  connection: WsConnection;
  subscriptionService: SubscriptionService;
  traceApi: TraceApi;
  logger: Logger;
  requestDetails: RequestDetails;
};

/**
 * Checks the shape of a JSON-RPC 2.0 request received on a socket.
 */
export const validateJsonRpcRequest = (body: unknown): WsRequest | undefined => {
  if (
    typeof body !== 'object' ||
    body === null ||
    !('jsonrpc' in body) ||
    body.jsonrpc !== '2.0' ||
    !('method' in body) ||
    typeof body.method !== 'string' ||
    ('params' in body && body.params !== undefined && !Array.isArray(body.params))
  ) {
    return undefined;
  }
  const params: unknown[] = 'params' in body && Array.isArray(body.params) ? body.params : [];
  return { jsonrpc: '2.0', id: idOf(body), method: body.method, params };
};

/**
 * Forwards a method that is not a subscription to the JSON-RPC method layer.
 */
const handleSendingRequestsToApi = async ({
  request,
  params,
  traceApi,
  logger,
  requestDetails,
}: ISharedParams): Promise<WsResponse> => {
  if (logger.isLevelEnabled('trace')) {
    logger.trace(`${requestDetails.formattedLogPrefix}: Submitting request=${JSON.stringify(request)}`);
  }
  const result = await traceApi.executeRpcMethod(request.method, params, requestDetails);
  if (result instanceof JsonRpcError) {
    return jsonResp(request.id, result, undefined);
  }
  return jsonResp(request.id, null, result);
};

/**
 * Answers one message received on a socket.
 */
export const getRequestResult = async (
  message: string,
  shared: Omit<ISharedParams, 'request' | 'params'>,
): Promise<WsResponse> => {
  const { logger, requestDetails } = shared;

  let body: unknown;
  try {
    body = JSON.parse(message);
  } catch {
    return jsonResp(null, predefined.PARSE_ERROR, undefined);
  }

  const request = validateJsonRpcRequest(body);
  if (request === undefined) {
    logger.warn(`${requestDetails.formattedLogPrefix} Invalid request, body: ${message}`);
    return jsonResp(idOf(body), predefined.INVALID_REQUEST, undefined);
  }

  const sharedParams: ISharedParams = { ...shared, request, params: request.params };
  const { METHODS } = WS_CONSTANTS;
  try {
    switch (request.method) {
      case METHODS.SUBSCRIBE_ACCOUNT:
        return handleSubscribe('account', sharedParams);
      case METHODS.UNSUBSCRIBE_ACCOUNT:
        return handleUnsubscribe('account', sharedParams);
      case METHODS.SUBSCRIBE_TRACE:
        return handleSubscribe('trace', sharedParams);
      case METHODS.UNSUBSCRIBE_TRACE:
        return handleUnsubscribe('trace', sharedParams);
      case METHODS.SUBSCRIBE_MEMPOOL:
        return handleSubscribe('mempool', sharedParams);
      case METHODS.UNSUBSCRIBE_MEMPOOL:
        return handleUnsubscribe('mempool', sharedParams);
      case METHODS.SUBSCRIBE_BLOCK:
        return handleSubscribeBlock(sharedParams);
      case METHODS.UNSUBSCRIBE_BLOCK:
        return handleUnsubscribeBlock(sharedParams);
      default:
        // unknown methods are reported by the dispatcher
        return await handleSendingRequestsToApi(sharedParams);
    }
  } catch (error: unknown) {
    logger.warn(
      error,
      `${requestDetails.formattedLogPrefix} Encountered error on connectionID: ${shared.connection.id}, method: ${
        request.method
      }, params: ${JSON.stringify(request.params)}`,
    );

    const jsonRpcError =
      error instanceof JsonRpcError
        ? new JsonRpcError({ code: error.code, message: error.message, data: error.data }, requestDetails.requestId)
        : predefined.INTERNAL_ERROR(error instanceof Error ? error.message : String(error));
    return jsonResp(request.id, jsonRpcError, undefined);
  }
};

function idOf(body: unknown): RequestId {
  if (typeof body === 'object' && body !== null && 'id' in body) {
    const { id } = body;
    if (typeof id === 'string' || typeof id === 'number') {
      return id;
    }
  }
  return null;
}
