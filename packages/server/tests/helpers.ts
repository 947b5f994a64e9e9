// SPDX-License-Identifier: Apache-2.0

import { TraceApi } from '@ton-trace-api/core';
import http from 'http';
import type { AddressInfo } from 'net';
import pino from 'pino';
import { Registry } from 'prom-client';
import type { Readable } from 'stream';

import { createServer } from '../src/server';

export interface TestServer {
  traceApi: TraceApi;
  httpServer: http.Server;
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Starts the application on an ephemeral localhost port, without enrichment.
 */
export async function startServer(): Promise<TestServer> {
  const logger = pino({ level: 'silent' });
  const register = new Registry();
  const traceApi = new TraceApi(logger, register, { monitoredAccounts: [], infoSource: null });
  const httpServer = http.createServer(createServer({ traceApi, logger, register }).callback());

  await new Promise<void>((resolve) => httpServer.listen(0, '127.0.0.1', resolve));
  const { port } = addressOf(httpServer);

  return {
    traceApi,
    httpServer,
    baseUrl: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        httpServer.closeAllConnections();
        httpServer.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

function addressOf(server: http.Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return address;
}

/**
 * Resolves with the first complete frame of the stream that starts with the given prefix.
 */
export function nextFrame(stream: Readable, prefix: string): Promise<string> {
  return new Promise((resolve, reject) => {
    let buffer = '';
    const onData = (chunk: Buffer) => {
      buffer += chunk.toString('utf8');
      // the last element is an incomplete frame, if any
      const frames = buffer.split('\n\n').slice(0, -1);
      const frame = frames.find((candidate) => candidate.startsWith(prefix));
      if (frame !== undefined) {
        stream.off('data', onData);
        resolve(`${frame}\n\n`);
      }
    };
    stream.on('data', onData);
    stream.once('error', reject);
  });
}

/**
 * Polls the condition until it holds, failing after the timeout.
 */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
