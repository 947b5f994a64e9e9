// SPDX-License-Identifier: Apache-2.0

export class JsonRpcError extends Error {
  public code: number;
  public data?: string;

  constructor(args: { code: number; message: string; data?: string }, requestId?: string) {
    super(
      requestId && !args.message.includes(`[Request ID: ${requestId}]`)
        ? `[Request ID: ${requestId}] ${args.message}`
        : args.message,
    );
    this.name = 'JsonRpcError';
    this.code = args.code;
    this.data = args.data;
  }
}

export const predefined = {
  INTERNAL_ERROR: (message = '') =>
    new JsonRpcError({
      code: -32603,
      message: message === '' ? 'Unknown error invoking RPC' : `Error invoking RPC: ${message}`,
    }),
  INVALID_PARAMETER: (index: number | string, message: string) =>
    new JsonRpcError({
      code: -32602,
      message: `Invalid parameter ${index}: ${message}`,
    }),
  MISSING_REQUIRED_PARAMETER: (index: number | string) =>
    new JsonRpcError({
      code: -32602,
      message: `Missing value for required parameter ${index}`,
    }),
  METHOD_NOT_FOUND: (methodName = '') =>
    new JsonRpcError({
      code: -32601,
      message: `Method ${methodName} not found`,
    }),
  PARSE_ERROR: new JsonRpcError({
    code: -32700,
    message: 'Parse error',
  }),
  INVALID_REQUEST: new JsonRpcError({
    code: -32600,
    message: 'Invalid Request',
  }),
  RESOURCE_NOT_FOUND: (message = '') =>
    new JsonRpcError({
      code: -32001,
      message: `Requested resource not found. ${message}`,
    }),
  REQUEST_TIMEOUT: new JsonRpcError({
    code: -32010,
    message: 'Request timeout. Please try again.',
  }),
  UPSTREAM_FAIL: (statusCode: number, message: string) =>
    new JsonRpcError({
      code: -32020,
      message: message || 'Information source upstream failure',
      data: statusCode.toString(),
    }),
  BATCH_REQUESTS_DISABLED: new JsonRpcError({
    code: -32202,
    message: 'Batch requests are disabled',
  }),
  BATCH_REQUESTS_AMOUNT_MAX_EXCEEDED: (amount: number, max: number) =>
    new JsonRpcError({
      code: -32203,
      message: `Batch request amount ${amount} exceeds max ${max}`,
    }),
  MAX_SUBSCRIPTIONS: new JsonRpcError({
    code: -32608,
    message: 'Exceeded maximum allowed subscriptions',
  }),
};
