// SPDX-License-Identifier: Apache-2.0

import type Koa from 'koa';

/**
 * Authentication distinguishes between regular requests and long-lived streams.
 */
export enum ConnectionType {
  LongLived = 0,
  Regular = 1,
}

/**
 * Handler of a route that the JSON-RPC layer does not serve, such as a server-sent events stream.
 * It may leave the response open after it resolves.
 */
export type AsyncHandler = (ctx: Koa.Context, connectionType: ConnectionType, allowTokenInQuery: boolean) => Promise<void>;

export type AsyncMiddleware = (handler: AsyncHandler) => AsyncHandler;

/**
 * Wraps the handler so that the last middleware runs first.
 */
export function chainMiddlewares(handler: AsyncHandler, ...middlewares: AsyncMiddleware[]): AsyncHandler {
  return middlewares.reduce((wrapped, middleware) => middleware(wrapped), handler);
}

/**
 * Turns an async handler into a Koa middleware serving exactly one path.
 */
export function wrapAsync(
  path: string,
  connectionType: ConnectionType,
  allowTokenInQuery: boolean,
  handler: AsyncHandler,
): Koa.Middleware {
  return async (ctx, next) => {
    if (ctx.path !== path || ctx.method !== 'GET') {
      return next();
    }
    await handler(ctx, connectionType, allowTokenInQuery);
  };
}
