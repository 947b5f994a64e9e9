// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@ton-trace-api/config-service';
import { type AccountsFilter, type CancelFn, type EventHub, predefined } from '@ton-trace-api/core';
import crypto from 'crypto';
import { LRUCache } from 'lru-cache';
import type { Logger } from 'pino';
import { Counter, Histogram, type Registry } from 'prom-client';

import { WS_CONSTANTS } from '../utils/constants';

export interface WsConnection {
  id: string;
  send(data: string): void;
}

export type AccountChannel = 'account' | 'trace' | 'mempool';

interface AccountSubscription {
  accounts: Set<string>;
  all: boolean;
  cancel: CancelFn;
  endTimer: () => void;
}

interface BlockSubscription {
  cancel: CancelFn;
  endTimer: () => void;
}

interface ConnectionSubscriptions {
  channels: Map<AccountChannel, AccountSubscription>;
  block?: BlockSubscription;
}

/**
 * Keeps the subscriptions of every WebSocket connection and forwards hub events to them.
 *
 * A connection holds at most one hub subscription per channel; changing its accounts
 * replaces that subscription. The same notification is not sent twice to a connection
 * within WS_CACHE_TTL.
 */
export class SubscriptionService {
  private readonly connections = new Map<string, ConnectionSubscriptions>();
  private readonly cache: LRUCache<string, true>;
  private readonly maxSubscriptions: number;
  private readonly activeSubscriptionHistogram: Histogram;
  private readonly resultsSentToSubscribersCounter: Counter;

  constructor(
    private readonly hub: EventHub,
    private readonly logger: Logger,
    register: Registry,
  ) {
    this.cache = new LRUCache({ max: ConfigService.get('WS_CACHE_MAX'), ttl: ConfigService.get('WS_CACHE_TTL') });
    this.maxSubscriptions = ConfigService.get('WS_MAX_SUBSCRIPTIONS');

    const activeSubscriptionHistogramName = 'ton_trace_api_ws_subscription_times';
    register.removeSingleMetric(activeSubscriptionHistogramName);
    this.activeSubscriptionHistogram = new Histogram({
      name: activeSubscriptionHistogramName,
      help: 'WebSocket active subscription timer',
      labelNames: ['channel'],
      registers: [register],
      buckets: [
        0.05, // fraction of a second
        1, // one second
        10, // 10 seconds
        60, // 1 minute
        120, // 2 minute
        300, // 5 minutes
        1200, // 20 minutes
        3600, // 1 hour
        86400, // 24 hours
      ],
    });

    const resultsSentToSubscribersCounterName = 'ton_trace_api_ws_notifications_sent';
    register.removeSingleMetric(resultsSentToSubscribersCounterName);
    this.resultsSentToSubscribersCounter = new Counter({
      name: resultsSentToSubscribersCounterName,
      help: 'WebSocket counter for the unique notifications sent to subscribers',
      registers: [register],
      labelNames: ['method'],
    });
  }

  private createHash(data: string): string {
    return crypto.createHash('sha256').update(data).digest('hex');
  }

  /**
   * Adds accounts to a channel of the connection. An empty list on the mempool channel
   * subscribes to every message.
   *
   * @returns the number of accounts named in the request
   * @throws {JsonRpcError} if the connection would exceed WS_MAX_SUBSCRIPTIONS accounts
   */
  public subscribe(connection: WsConnection, channel: AccountChannel, accounts: readonly string[]): number {
    const subscriptions = this.subscriptionsOf(connection);
    const current = subscriptions.channels.get(channel);
    const next = new Set(current?.accounts);
    accounts.forEach((account) => next.add(account));
    const all = (current?.all ?? false) || (channel === 'mempool' && accounts.length === 0);

    const added = next.size - (current?.accounts.size ?? 0);
    if (this.accountCount(subscriptions) + added > this.maxSubscriptions) {
      throw predefined.MAX_SUBSCRIPTIONS;
    }

    this.replace(connection, subscriptions, channel, next, all, current);
    this.logger.info(`Connection ${connection.id}: subscribed to ${channel}, ${next.size} accounts`);
    return accounts.length;
  }

  /**
   * Removes accounts from a channel of the connection; an empty list removes the whole channel.
   *
   * @returns the number of accounts named in the request
   */
  public unsubscribe(connection: WsConnection, channel: AccountChannel, accounts: readonly string[]): number {
    const subscriptions = this.connections.get(connection.id);
    const current = subscriptions?.channels.get(channel);
    if (subscriptions === undefined || current === undefined) {
      return accounts.length;
    }

    const next = new Set(current.accounts);
    accounts.forEach((account) => next.delete(account));
    const all = current.all && accounts.length > 0;

    if (accounts.length === 0 || (next.size === 0 && !all)) {
      current.cancel();
      current.endTimer();
      subscriptions.channels.delete(channel);
    } else {
      this.replace(connection, subscriptions, channel, next, all, current);
    }
    this.logger.info(`Connection ${connection.id}: unsubscribed from ${channel}`);
    return accounts.length;
  }

  /**
   * Subscribes the connection to block headers, replacing any earlier block subscription.
   */
  public subscribeToBlocks(connection: WsConnection, workchain: number | undefined): void {
    const subscriptions = this.subscriptionsOf(connection);
    this.unsubscribeFromBlocks(connection);
    subscriptions.block = {
      cancel: this.hub.subscribeToBlockHeaders(workchain, (event) =>
        this.notify(connection, WS_CONSTANTS.NOTIFICATIONS.block, event),
      ),
      endTimer: this.activeSubscriptionHistogram.startTimer({ channel: 'block' }),
    };
    this.logger.info(
      `Connection ${connection.id}: subscribed to blocks of ${workchain === undefined ? 'every workchain' : `workchain ${workchain}`}`,
    );
  }

  /**
   * @returns whether the connection had a block subscription
   */
  public unsubscribeFromBlocks(connection: WsConnection): boolean {
    const subscriptions = this.connections.get(connection.id);
    const block = subscriptions?.block;
    if (subscriptions === undefined || block === undefined) {
      return false;
    }
    block.cancel();
    block.endTimer();
    subscriptions.block = undefined;
    return true;
  }

  /**
   * Cancels every subscription of the connection.
   */
  public unsubscribeAll(connection: WsConnection): void {
    const subscriptions = this.connections.get(connection.id);
    if (subscriptions === undefined) {
      return;
    }
    for (const channel of subscriptions.channels.values()) {
      channel.cancel();
      channel.endTimer();
    }
    this.unsubscribeFromBlocks(connection);
    this.connections.delete(connection.id);
    this.logger.info(`Connection ${connection.id}: unsubscribed from all subscriptions`);
  }

  /**
   * The accounts a connection is subscribed to on a channel, or 'ALL'.
   */
  public accountsOf(connection: WsConnection, channel: AccountChannel): AccountsFilter {
    const subscription = this.connections.get(connection.id)?.channels.get(channel);
    if (subscription?.all) {
      return 'ALL';
    }
    return [...(subscription?.accounts ?? [])];
  }

  /**
   * Sends a notification to the connection unless the same one was sent recently.
   */
  public notify(connection: WsConnection, method: string, params: unknown): void {
    const message = JSON.stringify({ jsonrpc: '2.0', method, params });
    const hash = this.createHash(`${connection.id}:${message}`);

    // If the hash exists in the cache then the data has recently been sent to the subscriber
    if (this.cache.has(hash)) {
      return;
    }
    this.cache.set(hash, true);
    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`Sending ${method} to connectionId: ${connection.id}, data: ${message}`);
    }
    this.resultsSentToSubscribersCounter.labels(method).inc();
    connection.send(message);
  }

  private subscriptionsOf(connection: WsConnection): ConnectionSubscriptions {
    let subscriptions = this.connections.get(connection.id);
    if (subscriptions === undefined) {
      subscriptions = { channels: new Map() };
      this.connections.set(connection.id, subscriptions);
    }
    return subscriptions;
  }

  private accountCount(subscriptions: ConnectionSubscriptions): number {
    let count = 0;
    for (const channel of subscriptions.channels.values()) {
      count += channel.accounts.size;
    }
    return count;
  }

  private replace(
    connection: WsConnection,
    subscriptions: ConnectionSubscriptions,
    channel: AccountChannel,
    accounts: Set<string>,
    all: boolean,
    current: AccountSubscription | undefined,
  ): void {
    current?.cancel();
    const filter: AccountsFilter = all ? 'ALL' : [...accounts];
    subscriptions.channels.set(channel, {
      accounts,
      all,
      cancel: this.subscribeToHub(connection, channel, filter),
      endTimer: current?.endTimer ?? this.activeSubscriptionHistogram.startTimer({ channel }),
    });
  }

  private subscribeToHub(connection: WsConnection, channel: AccountChannel, filter: AccountsFilter): CancelFn {
    const method = WS_CONSTANTS.NOTIFICATIONS[channel];
    switch (channel) {
      case 'account':
        return this.hub.subscribeToTransactions(filter, (event) => this.notify(connection, method, event));
      case 'trace':
        return this.hub.subscribeToTraces(filter, (event) => this.notify(connection, method, event));
      case 'mempool':
        return this.hub.subscribeToMempool(filter, (event) => this.notify(connection, method, event));
    }
  }
}
