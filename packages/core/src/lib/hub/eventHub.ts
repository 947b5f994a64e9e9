// SPDX-License-Identifier: Apache-2.0

import EventEmitter from 'events';
import type { Logger } from 'pino';

import type { AccountId } from '../trace';
import type {
  AccountsFilter,
  BlockHeaderEventData,
  CancelFn,
  DeliveryFn,
  MempoolEventData,
  TraceEventData,
  TransactionEventData,
} from '../types';

const EVENTS = {
  TRANSACTION: 'transaction',
  TRACE: 'trace',
  BLOCK: 'block',
  MEMPOOL: 'mempool',
} as const;

/**
 * Fan-out point between the producers of ledger events and the push channels.
 *
 * When the hub is given a non-empty list of monitored accounts, events that involve
 * none of them are dropped before reaching any subscriber.
 */
export class EventHub {
  private readonly eventEmitter = new EventEmitter();
  private readonly monitored: ReadonlySet<AccountId>;

  constructor(
    monitoredAccounts: readonly AccountId[],
    private readonly logger: Logger,
  ) {
    this.monitored = new Set(monitoredAccounts);
    // every push connection adds a listener
    this.eventEmitter.setMaxListeners(0);
  }

  public get monitoredAccounts(): AccountId[] {
    return [...this.monitored];
  }

  public subscribeToTransactions(accounts: AccountsFilter, deliver: DeliveryFn<TransactionEventData>): CancelFn {
    const matches = matcher(accounts);
    return this.on(EVENTS.TRANSACTION, (event: TransactionEventData) => {
      if (matches([event.account_id])) {
        deliver(event);
      }
    });
  }

  public subscribeToTraces(accounts: AccountsFilter, deliver: DeliveryFn<TraceEventData>): CancelFn {
    const matches = matcher(accounts);
    return this.on(EVENTS.TRACE, (event: TraceEventData) => {
      if (matches(event.accounts)) {
        deliver(event);
      }
    });
  }

  /**
   * @param workchain - only headers of this workchain, or every header when undefined
   */
  public subscribeToBlockHeaders(workchain: number | undefined, deliver: DeliveryFn<BlockHeaderEventData>): CancelFn {
    return this.on(EVENTS.BLOCK, (event: BlockHeaderEventData) => {
      if (workchain === undefined || event.workchain === workchain) {
        deliver(event);
      }
    });
  }

  /**
   * A message without a list of involved accounts reaches only 'ALL' subscribers.
   */
  public subscribeToMempool(accounts: AccountsFilter, deliver: DeliveryFn<MempoolEventData>): CancelFn {
    const matches = matcher(accounts);
    return this.on(EVENTS.MEMPOOL, (event: MempoolEventData) => {
      if (matches(event.involved_accounts ?? [])) {
        deliver(event);
      }
    });
  }

  public publishTransaction(event: TransactionEventData): void {
    if (this.isMonitored([event.account_id])) {
      this.eventEmitter.emit(EVENTS.TRANSACTION, event);
    }
  }

  public publishTrace(event: TraceEventData): void {
    if (this.isMonitored(event.accounts)) {
      this.eventEmitter.emit(EVENTS.TRACE, event);
    }
  }

  public publishBlockHeader(event: BlockHeaderEventData): void {
    this.eventEmitter.emit(EVENTS.BLOCK, event);
  }

  public publishMempoolMessage(event: MempoolEventData): void {
    if (event.involved_accounts === undefined || this.isMonitored(event.involved_accounts)) {
      this.eventEmitter.emit(EVENTS.MEMPOOL, event);
    }
  }

  public subscriberCount(): number {
    return Object.values(EVENTS).reduce((count, name) => count + this.eventEmitter.listenerCount(name), 0);
  }

  private isMonitored(accounts: readonly AccountId[]): boolean {
    return this.monitored.size === 0 || accounts.some((account) => this.monitored.has(account));
  }

  private on<T>(event: string, listener: (payload: T) => void): CancelFn {
    const guarded = (payload: T) => {
      try {
        listener(payload);
      } catch (error: unknown) {
        this.logger.error(error, `Subscriber of ${event} events failed`);
      }
    };
    this.eventEmitter.on(event, guarded);
    return () => {
      this.eventEmitter.off(event, guarded);
    };
  }
}

function matcher(filter: AccountsFilter): (accounts: readonly AccountId[]) => boolean {
  if (filter === 'ALL') {
    return () => true;
  }
  const wanted = new Set(filter);
  return (accounts) => accounts.some((account) => wanted.has(account));
}
