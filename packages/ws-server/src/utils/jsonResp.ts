// SPDX-License-Identifier: Apache-2.0

import type { JsonRpcError } from '@ton-trace-api/core';

export type RequestId = string | number | null;

export interface WsResponse {
  jsonrpc: '2.0';
  id: RequestId;
  result?: unknown;
  error?: { code: number; message: string; data?: string };
}

export function jsonResp(id: RequestId, error: JsonRpcError | null, result: unknown): WsResponse {
  if (error) {
    const { code, message, data } = error;
    return { jsonrpc: '2.0', id, error: data === undefined ? { code, message } : { code, message, data } };
  }
  return { jsonrpc: '2.0', id, result: result ?? null };
}
