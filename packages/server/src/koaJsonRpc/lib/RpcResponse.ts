// SPDX-License-Identifier: Apache-2.0

import type { JsonRpcError } from '@ton-trace-api/core';

import type { IJsonRpcResponse } from './IJsonRpcResponse';
import type { JsonRpcError as JsonRpcErrorServer } from './RpcError';

/**
 * Builds a JSON-RPC 2.0 response carrying either the error or the result.
 */
export default function jsonResp(
  id: string | number | null,
  error: JsonRpcError | JsonRpcErrorServer | null,
  result: unknown,
): IJsonRpcResponse {
  if (error) {
    const { code, message, data } = error;
    return {
      jsonrpc: '2.0',
      id,
      error: data === undefined ? { code, message } : { code, message, data },
    };
  }

  if (result === undefined) {
    throw new TypeError(`Response must contain either a result or an error, id: ${id}`);
  }

  return { jsonrpc: '2.0', id, result };
}
