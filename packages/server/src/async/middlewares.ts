// SPDX-License-Identifier: Apache-2.0

import type Koa from 'koa';
import type { Logger } from 'pino';
import { Counter, Gauge, type Registry } from 'prom-client';

import { type AsyncMiddleware, ConnectionType } from './asyncHandler';

/**
 * Logs every async request once the handler is done with it.
 */
export function asyncLoggingMiddleware(logger: Logger): AsyncMiddleware {
  return (next) => async (ctx, connectionType, allowTokenInQuery) => {
    const start = Date.now();
    await next(ctx, connectionType, allowTokenInQuery);
    const prefix = ctx.state.reqId ? `[Request ID: ${ctx.state.reqId}] ` : '';
    logger.info(`${prefix}[${ctx.method}]: ${ctx.path} ${ctx.status} ${Date.now() - start} ms`);
  };
}

/**
 * Counts async requests by path and status, and tracks the streams that are still open.
 */
export function asyncMetricsMiddleware(register: Registry): AsyncMiddleware {
  const requestsName = 'ton_trace_api_async_requests';
  const openName = 'ton_trace_api_async_open_connections';
  register.removeSingleMetric(requestsName);
  register.removeSingleMetric(openName);

  const requests = new Counter({
    name: requestsName,
    help: 'Async requests by path and HTTP status',
    labelNames: ['path', 'status'],
    registers: [register],
  });
  const open = new Gauge({
    name: openName,
    help: 'Long-lived connections currently open, by path',
    labelNames: ['path'],
    registers: [register],
  });

  return (next) => async (ctx, connectionType, allowTokenInQuery) => {
    await next(ctx, connectionType, allowTokenInQuery);
    const path = ctx.path;
    requests.labels({ path, status: `${ctx.status}` }).inc();

    if (connectionType === ConnectionType.LongLived && ctx.status === 200 && !ctx.res.writableEnded) {
      open.labels({ path }).inc();
      ctx.res.once('close', () => open.labels({ path }).dec());
    }
  };
}

/**
 * Extracts the token of a request: the bearer token of the Authorization header or,
 * when allowed, the `token` query parameter.
 */
export function requestToken(
  authorization: string | undefined,
  queryToken: string | undefined,
  allowTokenInQuery: boolean,
): string | undefined {
  const BEARER = 'Bearer ';
  if (authorization?.startsWith(BEARER)) {
    return authorization.slice(BEARER.length).trim();
  }
  return allowTokenInQuery ? queryToken : undefined;
}

export function isAuthorized(tokens: readonly string[], token: string | undefined): boolean {
  return tokens.length === 0 || (token !== undefined && tokens.includes(token));
}

/**
 * Rejects requests without one of the configured tokens. With no tokens configured every request passes.
 */
export function asyncAuthMiddleware(tokens: readonly string[]): AsyncMiddleware {
  return (next) => async (ctx, connectionType, allowTokenInQuery) => {
    const token = requestToken(ctx.get('Authorization') || undefined, queryParam(ctx, 'token'), allowTokenInQuery);
    if (!isAuthorized(tokens, token)) {
      ctx.status = 401;
      ctx.body = { error: 'unauthorized' };
      return;
    }
    await next(ctx, connectionType, allowTokenInQuery);
  };
}

/**
 * The first value of a query parameter.
 */
export function queryParam(ctx: Koa.Context, name: string): string | undefined {
  const value = ctx.query[name];
  return Array.isArray(value) ? value[0] : value;
}
