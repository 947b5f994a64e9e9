// SPDX-License-Identifier: Apache-2.0

import { JsonRpcError, predefined } from '@ton-trace-api/core';
import { expect } from 'chai';

import { translateRpcErrorToHttpStatus } from '../../src/koaJsonRpc/lib/httpErrorMapper';
import { ParseError, Unauthorized } from '../../src/koaJsonRpc/lib/RpcError';

describe('translateRpcErrorToHttpStatus', () => {
  const requestId = 'req-123';
  const requestIdPrefix = `[Request ID: ${requestId}]`;

  const testErrorCodeMapping = (code: number, message: string, expectedStatusCode: number, data?: string) => {
    const result = translateRpcErrorToHttpStatus(new JsonRpcError({ code, message, data }, requestId));

    expect(result.statusErrorCode).to.equal(expectedStatusCode);
    return result;
  };

  describe('Standard JSON-RPC error codes', () => {
    const errorCodeMappings = [
      { code: -32700, message: 'Parse error', expectedStatus: 400 },
      { code: -32603, message: 'Internal error', expectedStatus: 500 },
      { code: -32600, message: 'Invalid request', expectedStatus: 400 },
      { code: -32602, message: 'Invalid params', expectedStatus: 400 },
      { code: -32601, message: 'Method not found', expectedStatus: 400 },
      { code: -32604, message: 'Unauthorized', expectedStatus: 401 },
      { code: -32001, message: 'Requested resource not found', expectedStatus: 404 },
      { code: -32010, message: 'Request timeout', expectedStatus: 504 },
      { code: -99999, message: 'Unknown error', expectedStatus: 400 },
    ];

    errorCodeMappings.forEach(({ code, message, expectedStatus }) => {
      it(`should map ${message} (${code}) to HTTP ${expectedStatus}`, () => {
        testErrorCodeMapping(code, message, expectedStatus);
      });
    });
  });

  describe('Information source error handling', () => {
    const upstreamErrorCode = -32020;

    const upstreamErrorMappings = [
      { status: '404', message: 'Method Not Found', expectedStatus: 400 },
      { status: '429', message: 'Rate limit exceeded', expectedStatus: 429 },
      { status: '500', message: 'Internal Server Error', expectedStatus: 502 },
      { status: '501', message: 'Not implemented', expectedStatus: 501 },
      { status: '503', message: 'Service Unavailable', expectedStatus: 502 },
      { status: '567', message: 'Unknown upstream error', expectedStatus: 502 },
    ];

    upstreamErrorMappings.forEach(({ status, message, expectedStatus }) => {
      it(`should map upstream ${status} error to HTTP ${expectedStatus}`, () => {
        const result = testErrorCodeMapping(upstreamErrorCode, message, expectedStatus, status);
        expect(result.statusErrorMessage).to.equal(`${requestIdPrefix} ${message}`);
      });
    });

    it('should map upstream errors without data to HTTP 400', () => {
      testErrorCodeMapping(upstreamErrorCode, 'Upstream failure', 400);
    });

    it('should map predefined.UPSTREAM_FAIL through its status', () => {
      expect(translateRpcErrorToHttpStatus(predefined.UPSTREAM_FAIL(429, 'slow down')).statusErrorCode).to.equal(429);
    });
  });

  describe('Server protocol errors', () => {
    it('should map ParseError to HTTP 400', () => {
      expect(translateRpcErrorToHttpStatus(new ParseError())).to.deep.equal({
        statusErrorCode: 400,
        statusErrorMessage: 'Parse error',
      });
    });

    it('should map Unauthorized to HTTP 401', () => {
      expect(translateRpcErrorToHttpStatus(new Unauthorized()).statusErrorCode).to.equal(401);
    });
  });
});
