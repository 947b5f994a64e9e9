// SPDX-License-Identifier: Apache-2.0

/**
 * Protocol level errors raised by the JSON-RPC transport itself, before a method is dispatched.
 */
export class JsonRpcError {
  public code: number;
  public message: string;
  public data?: unknown;

  constructor(message: string, code: number, data?: unknown) {
    this.code = code;
    this.message = message;
    this.data = data;
  }
}

export class ParseError extends JsonRpcError {
  constructor() {
    super('Parse error', -32700);
  }
}

export class InvalidRequest extends JsonRpcError {
  constructor() {
    super('Invalid Request', -32600);
  }
}

export class InternalError extends JsonRpcError {
  constructor(message?: string) {
    super(message ? `Error invoking RPC: ${message}` : 'Unknown error invoking RPC', -32603);
  }
}

export class Unauthorized extends JsonRpcError {
  constructor() {
    super('Unauthorized', -32604);
  }
}
