// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@ton-trace-api/config-service';
import { formatRequestIdMessage, type TraceApi } from '@ton-trace-api/core';
import type Koa from 'koa';
import cors from 'koa-cors';
import type { Logger } from 'pino';
import { collectDefaultMetrics, Histogram, type Registry } from 'prom-client';
import { v4 as uuid } from 'uuid';

import { type AsyncMiddleware, chainMiddlewares, ConnectionType, wrapAsync } from './async/asyncHandler';
import {
  asyncAuthMiddleware,
  asyncLoggingMiddleware,
  asyncMetricsMiddleware,
  isAuthorized,
  requestToken,
} from './async/middlewares';
import KoaJsonRpc from './koaJsonRpc';
import jsonResp from './koaJsonRpc/lib/RpcResponse';
import { Unauthorized } from './koaJsonRpc/lib/RpcError';
import { SseHandler } from './sse/handler';
import { stream, type SubscribeFn } from './sse/stream';

const REQUEST_ID_HEADER_NAME = 'X-Request-Id';

export interface ServerOptions {
  traceApi: TraceApi;
  logger: Logger;
  register: Registry;
}

/**
 * Builds the HTTP application: JSON-RPC on POST /, server-sent events under /v2/sse,
 * health and metrics endpoints.
 */
export function createServer({ traceApi, logger, register }: ServerOptions): Koa {
  const app = new KoaJsonRpc(logger.child({ name: 'koa-rpc' }), register, traceApi, {
    limit: ConfigService.get('INPUT_SIZE_LIMIT') + 'mb',
  });
  const koaApp = app.getKoaApp();
  const apiTokens = ConfigService.get('API_TOKENS');

  collectDefaultMetrics({ register, prefix: 'ton_trace_api_' });

  // clear and create metric in registry
  const metricHistogramName = 'ton_trace_api_method_response';
  register.removeSingleMetric(metricHistogramName);
  const methodResponseHistogram = new Histogram({
    name: metricHistogramName,
    help: 'JSON RPC method statusCode latency histogram',
    labelNames: ['method', 'statusCode'],
    registers: [register],
    buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 30000], // ms (milliseconds)
  });

  // set cors
  koaApp.use(cors());

  /**
   * request id, taken from the X-Request-Id header when the client sends one
   */
  koaApp.use(async (ctx, next) => {
    ctx.state.reqId = ctx.get(REQUEST_ID_HEADER_NAME) || uuid();
    return next();
  });

  /**
   * middleware for request timing
   */
  koaApp.use(async (ctx, next) => {
    const start = Date.now();
    await next();

    const ms = Date.now() - start;
    if (ctx.method !== 'POST') {
      if (!ctx.path.startsWith('/v2/')) {
        logger.info(`[${ctx.method}]: ${ctx.url} ${ctx.status} ${ms} ms`);
      }
    } else {
      // ctx.state.status may carry the request id of a JsonRpcError message
      const contextStatus = ctx.state.status?.replace(`[Request ID: ${ctx.state.reqId}] `, '') || ctx.status;
      const methodName = ctx.state.methodName ?? 'unknown';
      logger.info(
        `${formatRequestIdMessage(ctx.state.reqId)} [${ctx.method}]: ${methodName} ${contextStatus} ${ms} ms`,
      );
      methodResponseHistogram.labels(methodName, `${ctx.status}`).observe(ms);
    }
  });

  /**
   * prometheus metrics exposure
   */
  koaApp.use(async (ctx, next) => {
    if (ctx.path === '/metrics') {
      ctx.status = 200;
      ctx.type = register.contentType;
      ctx.body = await register.metrics();
    } else {
      return next();
    }
  });

  /**
   * liveness and readiness endpoints
   */
  koaApp.use(async (ctx, next) => {
    if (ctx.path === '/health/liveness' || ctx.path === '/health/readiness') {
      ctx.status = 200;
      ctx.body = 'OK';
    } else {
      return next();
    }
  });

  const asyncMiddlewares: AsyncMiddleware[] = [
    asyncAuthMiddleware(apiTokens),
    asyncMetricsMiddleware(register),
    asyncLoggingMiddleware(logger.child({ name: 'async' })),
  ];
  const sseLogger = logger.child({ name: 'sse' });
  const heartbeatInterval = ConfigService.get('SSE_HEARTBEAT_INTERVAL');
  const sseHandler = new SseHandler(traceApi.hub());
  const sseRoutes: [string, SubscribeFn][] = [
    ['/v2/sse/accounts/transactions', sseHandler.subscribeToTransactions],
    ['/v2/sse/accounts/traces', sseHandler.subscribeToTraces],
    ['/v2/sse/blocks', sseHandler.subscribeToBlockHeaders],
    ['/v2/sse/mempool', sseHandler.subscribeToMempool],
  ];
  for (const [path, subscribe] of sseRoutes) {
    koaApp.use(
      wrapAsync(
        path,
        ConnectionType.LongLived,
        true,
        chainMiddlewares(stream(sseLogger, heartbeatInterval, subscribe), ...asyncMiddlewares),
      ),
    );
  }

  /**
   * middleware to end for non POST requests asides health, metrics and streams
   */
  koaApp.use(async (ctx, next) => {
    if (ctx.method === 'POST') {
      await next();
    } else if (ctx.method === 'OPTIONS') {
      // support CORS preflight
      ctx.status = 200;
    } else {
      logger.warn(`skipping HTTP method: [${ctx.method}], url: ${ctx.url}, status: ${ctx.status}`);
    }
  });

  /**
   * JSON-RPC requests need a token when tokens are configured
   */
  koaApp.use(async (ctx, next) => {
    if (!isAuthorized(apiTokens, requestToken(ctx.get('Authorization') || undefined, undefined, false))) {
      ctx.status = 401;
      ctx.body = jsonResp(null, new Unauthorized(), undefined);
      ctx.state.status = `${ctx.status} (Unauthorized)`;
      return;
    }
    await next();
  });

  const rpcApp = app.rpcApp();

  koaApp.use(async (ctx, next) => {
    await rpcApp(ctx, next);
  });

  return koaApp;
}
