// SPDX-License-Identifier: Apache-2.0

import type { JsonRpcError } from '@ton-trace-api/core';

import type { JsonRpcError as JsonRpcErrorServer } from './RpcError';

const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  NOT_IMPLEMENTED: 501,
  BAD_GATEWAY: 502,
  GATEWAY_TIMEOUT: 504,
};

// Direct mapping from RPC error codes to HTTP status codes
const ERROR_CODE_MAP: Record<number, number> = {
  [-32700]: HTTP_STATUS.BAD_REQUEST, // Parse error
  [-32603]: HTTP_STATUS.INTERNAL_SERVER_ERROR, // Internal error
  [-32600]: HTTP_STATUS.BAD_REQUEST, // Invalid request
  [-32602]: HTTP_STATUS.BAD_REQUEST, // Invalid params
  [-32601]: HTTP_STATUS.BAD_REQUEST, // Method not found
  [-32604]: HTTP_STATUS.UNAUTHORIZED, // Missing or unknown token
  [-32001]: HTTP_STATUS.NOT_FOUND, // Resource not found
  [-32010]: HTTP_STATUS.GATEWAY_TIMEOUT, // Request timeout
};

// Map information source HTTP statuses to statuses of this API
// - 404 -> 400
// - 429 -> 429
// - 501 -> 501
// - any other upstream status -> 502
const UPSTREAM_ERROR_MAP: Record<string, number> = {
  '404': HTTP_STATUS.BAD_REQUEST,
  '429': HTTP_STATUS.TOO_MANY_REQUESTS,
  '501': HTTP_STATUS.NOT_IMPLEMENTED,
};

/**
 * Translates JSON-RPC errors to appropriate HTTP responses
 *
 * @returns HTTP status code and status error description
 */
export function translateRpcErrorToHttpStatus(jsonRpcError: JsonRpcError | JsonRpcErrorServer): {
  statusErrorCode: number;
  statusErrorMessage: string;
} {
  let statusErrorCode = ERROR_CODE_MAP[jsonRpcError.code] || HTTP_STATUS.BAD_REQUEST;
  const statusErrorMessage = jsonRpcError.message;

  // -32020 is predefined.UPSTREAM_FAIL, whose data is the status returned by the information source
  if (jsonRpcError.code === -32020 && typeof jsonRpcError.data === 'string' && jsonRpcError.data) {
    statusErrorCode = UPSTREAM_ERROR_MAP[jsonRpcError.data] || HTTP_STATUS.BAD_GATEWAY;
  }

  return { statusErrorCode, statusErrorMessage };
}
