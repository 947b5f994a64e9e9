// SPDX-License-Identifier: Apache-2.0

import { type AccountsFilter, type CancelFn, type EventHub, toAccountId } from '@ton-trace-api/core';
import type Koa from 'koa';

import { queryParam } from '../async/middlewares';
import { BadRequestError, type Session } from './stream';

const WORKCHAIN_REGEX = /^-?\d+$/;

/**
 * Parses a comma separated list of addresses, or `ALL`, into an accounts filter.
 */
export function parseAccounts(value: string | undefined): AccountsFilter {
  if (value === undefined || value.trim() === '') {
    throw new BadRequestError('accounts parameter is required');
  }
  if (value.trim().toUpperCase() === 'ALL') {
    return 'ALL';
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map((item) => {
      try {
        return toAccountId(item);
      } catch {
        throw new BadRequestError(`invalid account: ${item}`);
      }
    });
}

export function parseWorkchain(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (!WORKCHAIN_REGEX.test(value)) {
    throw new BadRequestError(`invalid workchain: ${value}`);
  }
  return Number(value);
}

/**
 * Subscribe functions of the server-sent events routes.
 */
export class SseHandler {
  constructor(private readonly hub: EventHub) {}

  subscribeToTransactions = (ctx: Koa.Context, session: Session): CancelFn => {
    const accounts = parseAccounts(queryParam(ctx, 'accounts'));
    return this.hub.subscribeToTransactions(accounts, (event) => session.sendEvent(event));
  };

  subscribeToTraces = (ctx: Koa.Context, session: Session): CancelFn => {
    const accounts = parseAccounts(queryParam(ctx, 'accounts'));
    return this.hub.subscribeToTraces(accounts, (event) => session.sendEvent(event));
  };

  subscribeToBlockHeaders = (ctx: Koa.Context, session: Session): CancelFn => {
    const workchain = parseWorkchain(queryParam(ctx, 'workchain'));
    return this.hub.subscribeToBlockHeaders(workchain, (event) => session.sendEvent(event));
  };

  /**
   * Without an accounts parameter every mempool message is streamed.
   */
  subscribeToMempool = (ctx: Koa.Context, session: Session): CancelFn => {
    const value = queryParam(ctx, 'accounts');
    const accounts = value === undefined ? 'ALL' : parseAccounts(value);
    return this.hub.subscribeToMempool(accounts, (event) => session.sendEvent(event));
  };
}
