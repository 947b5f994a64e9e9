// SPDX-License-Identifier: Apache-2.0

import { JsonRpcError, predefined, RequestDetails, type TraceApi } from '@ton-trace-api/core';
import parse from 'co-body';
import Koa from 'koa';
import type { Logger } from 'pino';
import { Histogram, type Registry } from 'prom-client';

import { translateRpcErrorToHttpStatus } from './lib/httpErrorMapper';
import type { IJsonRpcRequest } from './lib/IJsonRpcRequest';
import type { IJsonRpcResponse } from './lib/IJsonRpcResponse';
import { InternalError, InvalidRequest, ParseError } from './lib/RpcError';
import jsonResp from './lib/RpcResponse';
import { getBatchRequestsEnabled, getBatchRequestsMaxSize, getRequestIdIsOptional, hasOwnProperty } from './lib/utils';

const INVALID_REQUEST = 'INVALID REQUEST';
const REQUEST_ID_HEADER_NAME = 'X-Request-Id';
const responseSuccessStatusCode = '200';
const METRIC_HISTOGRAM_NAME = 'ton_trace_api_method_result';
const BATCH_REQUEST_METHOD_NAME = 'batch_request';

export default class KoaJsonRpc {
  private readonly limit: string;
  private readonly metricsRegistry: Registry;
  private readonly koaApp: Koa<Koa.DefaultState, Koa.DefaultContext>;
  private readonly logger: Logger;
  private readonly requestIdIsOptional: boolean = getRequestIdIsOptional(); // default to false
  private readonly batchRequestsMaxSize: number = getBatchRequestsMaxSize(); // default to 100
  private readonly methodResponseHistogram: Histogram;
  private readonly traceApi: TraceApi;

  constructor(logger: Logger, register: Registry, traceApi: TraceApi, opts?: { limit: string | null }) {
    this.koaApp = new Koa();
    this.limit = opts?.limit ?? '1mb';
    this.logger = logger;
    this.metricsRegistry = register;
    this.traceApi = traceApi;

    // clear and create metric in registry
    this.metricsRegistry.removeSingleMetric(METRIC_HISTOGRAM_NAME);
    this.methodResponseHistogram = new Histogram({
      name: METRIC_HISTOGRAM_NAME,
      help: 'JSON RPC method statusCode latency histogram',
      labelNames: ['method', 'statusCode', 'isPartOfBatch'],
      registers: [this.metricsRegistry],
      buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 30000], // ms (milliseconds)
    });
  }

  rpcApp(): (ctx: Koa.Context, _next: Koa.Next) => Promise<void> {
    return async (ctx: Koa.Context, _next: Koa.Next) => {
      const requestDetails = new RequestDetails({ requestId: ctx.state.reqId ?? '', ipAddress: ctx.request.ip });
      ctx.set(REQUEST_ID_HEADER_NAME, requestDetails.requestId);

      if (ctx.request.method !== 'POST') {
        ctx.body = jsonResp(null, new InvalidRequest(), undefined);
        ctx.status = 400;
        ctx.state.status = `${ctx.status} (${INVALID_REQUEST})`;
        return;
      }

      let body: unknown;
      try {
        body = await parse.json(ctx, { limit: this.limit });
      } catch (err: unknown) {
        this.logger.debug(`${requestDetails.formattedLogPrefix} Unable to parse request body: ${String(err)}`);
        ctx.body = jsonResp(null, new ParseError(), undefined);
        ctx.status = 400;
        ctx.state.status = `${ctx.status} (${INVALID_REQUEST})`;
        return;
      }

      //check if body is array or object
      if (Array.isArray(body)) {
        await this.handleMultipleRequest(ctx, body, requestDetails);
      } else {
        await this.handleSingleRequest(ctx, body, requestDetails);
      }
    };
  }

  private async handleSingleRequest(ctx: Koa.Context, body: unknown, requestDetails: RequestDetails): Promise<void> {
    ctx.state.methodName = methodNameOf(body);
    const response = await this.getRequestResult(body, requestDetails);
    ctx.body = response;

    if (response.error) {
      // What HTTP Status code to return for the error
      const { statusErrorCode } = translateRpcErrorToHttpStatus(response.error);
      ctx.status = statusErrorCode;
      ctx.state.status = `${ctx.status} (${response.error.message})`;
    }
  }

  private async handleMultipleRequest(
    ctx: Koa.Context,
    body: unknown[],
    requestDetails: RequestDetails,
  ): Promise<void> {
    // verify that batch requests are enabled
    if (!getBatchRequestsEnabled()) {
      ctx.body = jsonResp(null, predefined.BATCH_REQUESTS_DISABLED, undefined);
      ctx.status = 400;
      ctx.state.status = `${ctx.status} (${INVALID_REQUEST})`;
      return;
    }

    // verify max batch size
    if (body.length > this.batchRequestsMaxSize) {
      ctx.body = jsonResp(
        null,
        predefined.BATCH_REQUESTS_AMOUNT_MAX_EXCEEDED(body.length, this.batchRequestsMaxSize),
        undefined,
      );
      ctx.status = 400;
      ctx.state.status = `${ctx.status} (${INVALID_REQUEST})`;
      return;
    }

    ctx.state.methodName = BATCH_REQUEST_METHOD_NAME;

    // we do the requests in parallel to save time, but we need to keep track of the order of the responses (since the id might be optional)
    const results = await Promise.all(
      body.map(async (item: unknown) => {
        const startTime = Date.now();
        const res = await this.getRequestResult(item, requestDetails);
        const ms = Date.now() - startTime;
        this.methodResponseHistogram
          .labels(methodNameOf(item), `${res.error ? res.error.code : 200}`, 'true')
          .observe(ms);
        return res;
      }),
    );

    // for batch requests, always return 200 http status, this is standard for JSON-RPC 2.0 batch requests
    ctx.body = results;
    ctx.status = 200;
    ctx.state.status = responseSuccessStatusCode;
  }

  async getRequestResult(body: unknown, requestDetails: RequestDetails): Promise<IJsonRpcResponse> {
    // ensure the request aligns with JSON-RPC 2.0 Specification
    const request = this.validateJsonRpcRequest(body, requestDetails);
    if (request === undefined) {
      return jsonResp(idOf(body), new InvalidRequest(), undefined);
    }
    const id = request.id ?? null;

    try {
      // call the public API entry point of the core package to execute the RPC method
      const result = await this.traceApi.executeRpcMethod(request.method, request.params, requestDetails);

      if (result instanceof JsonRpcError) {
        return jsonResp(id, result, undefined);
      }
      return jsonResp(id, null, result ?? null);
    } catch (err: unknown) {
      return jsonResp(id, new InternalError(err instanceof Error ? err.message : String(err)), undefined);
    }
  }

  /**
   * Checks the jsonrpc version, the method, the params and the id of a request.
   *
   * @returns the request, or undefined when it is not a valid JSON-RPC 2.0 request
   */
  validateJsonRpcRequest(body: unknown, requestDetails: RequestDetails): IJsonRpcRequest | undefined {
    if (
      typeof body !== 'object' ||
      body === null ||
      !('jsonrpc' in body) ||
      body.jsonrpc !== '2.0' ||
      !('method' in body) ||
      typeof body.method !== 'string' ||
      ('params' in body && body.params !== undefined && !Array.isArray(body.params))
    ) {
      this.logger.warn(`${requestDetails.formattedLogPrefix} Invalid request, body: ${JSON.stringify(body)}`);
      return undefined;
    }

    const params: unknown[] = 'params' in body && Array.isArray(body.params) ? body.params : [];
    const id = idOf(body);
    if (!hasOwnProperty(body, 'id')) {
      if (!this.requestIdIsOptional) {
        this.logger.warn(`${requestDetails.formattedLogPrefix} Invalid request, missing id`);
        return undefined;
      }
      // If the request has no id, we still want to return a valid JSON-RPC response, default id to 0
      this.logger.warn(
        `${requestDetails.formattedLogPrefix} Optional JSON-RPC 2.0 request id encountered. Will continue and default id to 0 in response`,
      );
      return { jsonrpc: '2.0', method: body.method, params, id: '0' };
    }

    return { jsonrpc: '2.0', method: body.method, params, id };
  }

  getKoaApp(): Koa<Koa.DefaultState, Koa.DefaultContext> {
    return this.koaApp;
  }
}

function idOf(body: unknown): string | number | null {
  if (typeof body === 'object' && body !== null && 'id' in body) {
    const { id } = body;
    if (typeof id === 'string' || typeof id === 'number') {
      return id;
    }
  }
  return null;
}

function methodNameOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'method' in body && typeof body.method === 'string') {
    return body.method;
  }
  return 'unknown';
}
