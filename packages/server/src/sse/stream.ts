// SPDX-License-Identifier: Apache-2.0

import type { CancelFn } from '@ton-trace-api/core';
import type Koa from 'koa';
import type { Logger } from 'pino';
import { PassThrough } from 'stream';

import type { AsyncHandler } from '../async/asyncHandler';

/**
 * A query parameter of a streaming route is missing or malformed.
 * Reported as 400 before the stream is opened.
 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export interface Session {
  sendEvent(data: unknown): void;
}

/**
 * Subscribes a session to a source of events.
 *
 * @throws {BadRequestError} if the request parameters are invalid
 */
export type SubscribeFn = (ctx: Koa.Context, session: Session) => CancelFn;

export const HEARTBEAT_FRAME = 'event: heartbeat\n\n';

export function messageFrame(id: number, data: unknown): string {
  return `event: message\nid: ${id}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Serves a subscription as a server-sent events stream, kept alive with heartbeat frames
 * until the client goes away. A client that stops reading is disconnected once the body
 * buffer is full, instead of queueing events for it.
 */
export function stream(logger: Logger, heartbeatInterval: number, subscribe: SubscribeFn): AsyncHandler {
  return async (ctx) => {
    const body = new PassThrough();
    let eventId = 0;
    let closed = false;
    let heartbeat: NodeJS.Timeout | undefined;
    let cancel: CancelFn | undefined;

    const close = () => {
      if (closed) {
        return;
      }
      closed = true;
      clearInterval(heartbeat);
      cancel?.();
      body.end();
      if (logger.isLevelEnabled('debug')) {
        logger.debug(`${ctx.path} stream closed after ${eventId} events`);
      }
    };

    const write = (frame: string) => {
      if (closed) {
        return;
      }
      if (!body.write(frame)) {
        logger.warn(`${ctx.path} client is not reading, closing the stream after ${eventId} events`);
        close();
      }
    };

    const session: Session = {
      sendEvent(data) {
        eventId += 1;
        write(messageFrame(eventId, data));
      },
    };

    try {
      cancel = subscribe(ctx, session);
    } catch (error: unknown) {
      if (!(error instanceof BadRequestError)) {
        throw error;
      }
      ctx.status = 400;
      ctx.body = { error: error.message };
      return;
    }

    ctx.req.socket.setTimeout(0);
    ctx.req.socket.setNoDelay(true);
    ctx.set('Cache-Control', 'no-cache');
    ctx.set('Connection', 'keep-alive');
    ctx.type = 'text/event-stream';
    ctx.status = 200;
    ctx.body = body;
    ctx.flushHeaders();

    heartbeat = setInterval(() => {
      write(HEARTBEAT_FRAME);
    }, heartbeatInterval);

    ctx.res.once('close', close);
  };
}
