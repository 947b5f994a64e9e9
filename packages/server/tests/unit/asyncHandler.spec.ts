// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';
import { IncomingMessage, ServerResponse } from 'http';
import Koa from 'koa';
import { Socket } from 'net';
import pino from 'pino';
import { PassThrough } from 'stream';

import { type AsyncHandler, type AsyncMiddleware, chainMiddlewares, ConnectionType } from '../../src/async/asyncHandler';
import { isAuthorized, requestToken } from '../../src/async/middlewares';
import { parseAccounts, parseWorkchain } from '../../src/sse/handler';
import { BadRequestError, HEARTBEAT_FRAME, messageFrame, type Session, stream } from '../../src/sse/stream';

describe('Async handlers', () => {
  describe('chainMiddlewares', () => {
    it('should run the last middleware first', async () => {
      const calls: string[] = [];
      const handler: AsyncHandler = async () => {
        calls.push('handler');
      };
      const named =
        (name: string): AsyncMiddleware =>
        (next) =>
        async (ctx, connectionType, allowTokenInQuery) => {
          calls.push(name);
          await next(ctx, connectionType, allowTokenInQuery);
        };

      const chained = chainMiddlewares(handler, named('auth'), named('metrics'), named('logging'));
      const req = new IncomingMessage(new Socket());
      await chained(new Koa().createContext(req, new ServerResponse(req)), ConnectionType.LongLived, true);

      expect(calls).to.deep.equal(['logging', 'metrics', 'auth', 'handler']);
    });
  });

  describe('requestToken', () => {
    it('should take the bearer token of the Authorization header', () => {
      expect(requestToken('Bearer test-secret', 'other', true)).to.equal('test-secret');
    });

    it('should take the query token only when allowed', () => {
      expect(requestToken(undefined, 'test-secret', true)).to.equal('test-secret');
      expect(requestToken(undefined, 'test-secret', false)).to.equal(undefined);
    });

    it('should ignore other authorization schemes', () => {
      expect(requestToken('Basic dXNlcjpwYXNz', undefined, true)).to.equal(undefined);
    });
  });

  describe('isAuthorized', () => {
    it('should let every request through when no tokens are configured', () => {
      expect(isAuthorized([], undefined)).to.be.true;
    });

    it('should require one of the configured tokens', () => {
      expect(isAuthorized(['test-secret'], 'test-secret')).to.be.true;
      expect(isAuthorized(['test-secret'], 'wrong')).to.be.false;
      expect(isAuthorized(['test-secret'], undefined)).to.be.false;
    });
  });
});

describe('SSE parameters', () => {
  const RAW = '0:' + 'ab'.repeat(32);
  const OTHER = '-1:' + '01'.repeat(32);

  describe('parseAccounts', () => {
    it('should accept ALL in any case', () => {
      expect(parseAccounts('all')).to.equal('ALL');
    });

    it('should split the list and drop empty entries', () => {
      expect(parseAccounts(`${RAW}, ${OTHER},`)).to.deep.equal([RAW, OTHER]);
    });

    it('should reject a missing list', () => {
      expect(() => parseAccounts(undefined)).to.throw(BadRequestError, 'accounts parameter is required');
      expect(() => parseAccounts(' ')).to.throw(BadRequestError, 'accounts parameter is required');
    });

    it('should reject an invalid address', () => {
      expect(() => parseAccounts('not-an-address')).to.throw(BadRequestError, 'invalid account: not-an-address');
    });
  });

  describe('parseWorkchain', () => {
    it('should be undefined when absent', () => {
      expect(parseWorkchain(undefined)).to.equal(undefined);
    });

    it('should parse negative workchains', () => {
      expect(parseWorkchain('-1')).to.equal(-1);
    });

    it('should reject non integers', () => {
      expect(() => parseWorkchain('1.5')).to.throw(BadRequestError, 'invalid workchain: 1.5');
    });
  });

  describe('frames', () => {
    it('should render a message frame', () => {
      expect(messageFrame(3, { hash: 'h' })).to.equal('event: message\nid: 3\ndata: {"hash":"h"}\n\n');
    });

    it('should render a heartbeat frame', () => {
      expect(HEARTBEAT_FRAME).to.equal('event: heartbeat\n\n');
    });
  });

  describe('stream', () => {
    it('should close the stream of a client that stops reading', async () => {
      const sessions: Session[] = [];
      let cancelled = 0;
      const handler = stream(pino({ level: 'silent' }), 60_000, (_ctx, session) => {
        sessions.push(session);
        return () => {
          cancelled += 1;
        };
      });
      const req = new IncomingMessage(new Socket());
      const ctx = new Koa().createContext(req, new ServerResponse(req));

      await handler(ctx, ConnectionType.LongLived, true);

      const body = ctx.body;
      expect(ctx.status).to.equal(200);
      expect(body).to.be.instanceOf(PassThrough);
      expect(sessions).to.have.lengthOf(1);
      if (!(body instanceof PassThrough)) {
        return;
      }

      // nothing consumes the body, so the buffer fills up
      const payload = 'x'.repeat(1024);
      for (let i = 0; i < 400; i++) {
        sessions[0].sendEvent({ payload });
      }

      expect(cancelled).to.equal(1);
      expect(body.writableEnded).to.be.true;
    });
  });
});
