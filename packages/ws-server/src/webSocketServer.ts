// SPDX-License-Identifier: Apache-2.0

import { RequestDetails, type TraceApi, Utils } from '@ton-trace-api/core';
import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';
import type { Logger } from 'pino';
import { Counter, Gauge, type Registry } from 'prom-client';
import type WebSocket from 'ws';
import { type RawData, WebSocketServer } from 'ws';

import { getRequestResult } from './controllers';
import { SubscriptionService, type WsConnection } from './service/subscriptionService';
import { WS_CONSTANTS } from './utils/constants';

export interface WebSocketServerOptions {
  traceApi: TraceApi;
  logger: Logger;
  register: Registry;
  /**
   * Decides whether an upgrade request may open a socket. Every request is allowed when omitted.
   */
  authorize?: (req: IncomingMessage) => boolean;
}

const rawDataToString = (data: RawData): string => {
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return (Array.isArray(data) ? Buffer.concat(data) : data).toString('utf8');
};

const rejectUpgrade = (socket: Duplex, status: string): void => {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
};

/**
 * Serves JSON-RPC subscriptions on /v2/websocket of an existing HTTP server.
 */
export function attachWebSocketServer(
  httpServer: Server,
  { traceApi, logger, register, authorize = () => true }: WebSocketServerOptions,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });
  const subscriptionService = new SubscriptionService(
    traceApi.hub(),
    logger.child({ name: 'subscription-service' }),
    register,
  );

  const connectionsGaugeName = 'ton_trace_api_ws_connections';
  register.removeSingleMetric(connectionsGaugeName);
  const connectionsGauge = new Gauge({
    name: connectionsGaugeName,
    help: 'Open WebSocket connections',
    registers: [register],
  });
  const messagesCounterName = 'ton_trace_api_ws_messages';
  register.removeSingleMetric(messagesCounterName);
  const messagesCounter = new Counter({
    name: messagesCounterName,
    help: 'WebSocket messages answered, by result',
    labelNames: ['result'],
    registers: [register],
  });

  httpServer.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (path !== WS_CONSTANTS.PATH) {
      rejectUpgrade(socket, '404 Not Found');
      return;
    }
    if (!authorize(req)) {
      rejectUpgrade(socket, '401 Unauthorized');
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit('connection', ws, req);
    });
  });

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    const connection: WsConnection = {
      id: Utils.generateRandomHex(),
      send: (data) => ws.send(data),
    };
    const ipAddress = req.socket.remoteAddress ?? '';
    connectionsGauge.inc();
    logger.info(`New connection ${connection.id} from ${ipAddress}`);

    ws.on('message', (data: RawData) => {
      const message = rawDataToString(data);
      const requestDetails = new RequestDetails({
        requestId: Utils.generateRequestId(),
        ipAddress,
        connectionId: connection.id,
      });
      getRequestResult(message, { connection, subscriptionService, traceApi, logger, requestDetails })
        .then((response) => {
          messagesCounter.labels(response.error === undefined ? 'success' : 'error').inc();
          if (ws.readyState === ws.OPEN) {
            ws.send(JSON.stringify(response));
          }
        })
        .catch((error: unknown) => {
          logger.error(error, `${requestDetails.formattedLogPrefix} Failed to answer a message`);
        });
    });

    ws.on('close', (code: number) => {
      subscriptionService.unsubscribeAll(connection);
      connectionsGauge.dec();
      logger.info(`Closing connection ${connection.id} | code: ${code}`);
    });

    ws.on('error', (error: Error) => {
      logger.error(error, `Connection ${connection.id} failed`);
    });
  });

  return wss;
}
