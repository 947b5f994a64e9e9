// SPDX-License-Identifier: Apache-2.0

/**
 * Payloads pushed to streaming subscribers. Field names follow the public wire format.
 */
export interface TransactionEventData {
  account_id: string;
  lt: string;
  tx_hash: string;
}

export interface TraceEventData {
  accounts: string[];
  hash: string;
}

export interface BlockHeaderEventData {
  workchain: number;
  shard: string;
  seqno: number;
  root_hash: string;
  file_hash: string;
}

export interface MempoolEventData {
  boc: string;
  involved_accounts?: string[];
}

/**
 * Either an explicit list of raw account ids or every monitored account.
 */
export type AccountsFilter = string[] | 'ALL';

/**
 * Stops a subscription. Calling it more than once has no effect.
 */
export type CancelFn = () => void;

export type DeliveryFn<T> = (event: T) => void;
