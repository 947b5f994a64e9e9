// SPDX-License-Identifier: Apache-2.0

export interface IJsonRpcRequest {
  jsonrpc: string;
  id?: string | number | null;
  method: string;
  params?: unknown[];
}
