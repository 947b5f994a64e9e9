// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@ton-trace-api/config-service';
import { TraceApi } from '@ton-trace-api/core';
import { attachWebSocketServer } from '@ton-trace-api/ws-server';
import fs from 'fs';
import http from 'http';
import pino from 'pino';
import { Registry } from 'prom-client';

import { isAuthorized, requestToken } from './async/middlewares';
import { createServer } from './server';

const mainLogger = pino({
  name: 'ton-trace-api',
  level: ConfigService.get('LOG_LEVEL'),
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: true,
    },
  },
});

const logger = mainLogger.child({ name: 'rpc-server' });
const register = new Registry();
const traceApi = new TraceApi(logger.child({ name: 'trace-api' }), register);
const app = createServer({ traceApi, logger, register });
const httpServer = http.createServer(app.callback());

const apiTokens = ConfigService.get('API_TOKENS');
attachWebSocketServer(httpServer, {
  traceApi,
  logger: logger.child({ name: 'ws-server' }),
  register,
  authorize: (req) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    return isAuthorized(
      apiTokens,
      requestToken(req.headers.authorization, url.searchParams.get('token') ?? undefined, true),
    );
  },
});

const failListener = (description: string) => (error: Error) => {
  logger.fatal(error, `Failed to listen on ${description}`);
  process.exit(1);
};

const port = ConfigService.get('PORT');
httpServer.once('error', failListener(`port ${port}`));
httpServer.listen(port, () => {
  logger.info(`Listening on port ${port}`);
});

for (const socketPath of ConfigService.get('UNIX_SOCKETS')) {
  // a socket file left behind by an earlier run blocks the listener
  if (fs.existsSync(socketPath)) {
    fs.rmSync(socketPath);
  }
  const unixServer = http.createServer(app.callback());
  unixServer.on('upgrade', (req, socket, head) => httpServer.emit('upgrade', req, socket, head));
  unixServer.once('error', failListener(`Unix socket ${socketPath}`));
  unixServer.listen(socketPath, () => {
    try {
      fs.chmodSync(socketPath, 0o777);
    } catch (error: unknown) {
      logger.fatal(error, `Failed to set permissions on Unix socket ${socketPath}`);
      process.exit(1);
    }
    logger.info(`Listening on Unix socket ${socketPath}`);
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection, reason: ${String(reason)}`);
});

process.on('uncaughtException', (err) => {
  logger.error(err, 'Uncaught Exception!');
});
