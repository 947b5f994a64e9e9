// SPDX-License-Identifier: Apache-2.0

import { LRUCache } from 'lru-cache';
import type { Logger } from 'pino';

import constants from '../constants';
import { predefined } from '../errors/JsonRpcError';
import { type AccountId, type Trace, traceDepth, visit } from '../trace';

export interface TraceStoreOptions {
  max: number;
  ttl: number;
  maxDepth: number;
}

/**
 * In-memory store of root traces, keyed by the lowercase hash of the root transaction,
 * with an index from account to the ids of the traces it took part in.
 */
export class TraceStore {
  private readonly traces: LRUCache<string, Trace>;

  /**
   * Account → trace ids, newest first.
   * @private
   */
  private readonly accountIndex: LRUCache<AccountId, string[]>;

  constructor(
    private readonly options: TraceStoreOptions,
    private readonly logger: Logger,
  ) {
    this.traces = new LRUCache<string, Trace>({ max: options.max, ttl: options.ttl });
    this.accountIndex = new LRUCache<AccountId, string[]>({ max: options.max });
  }

  /**
   * Stores the trace, replacing a previous version with the same root.
   *
   * @throws {JsonRpcError} if the tree is deeper than the configured maximum
   */
  public put(trace: Trace): void {
    const depth = traceDepth(trace);
    if (depth > this.options.maxDepth) {
      throw predefined.INVALID_PARAMETER('trace', `depth ${depth} exceeds the maximum of ${this.options.maxDepth}`);
    }

    const traceId = trace.hash.toLowerCase();
    this.traces.set(traceId, trace);

    const accounts = new Set<AccountId>();
    visit(trace, (node) => {
      accounts.add(node.account);
    });
    for (const account of accounts) {
      const ids = (this.accountIndex.get(account) ?? []).filter((id) => id !== traceId);
      ids.unshift(traceId);
      this.accountIndex.set(account, ids.slice(0, constants.MAX_TRACES_PER_ACCOUNT));
    }

    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`Stored trace ${traceId} of depth ${depth} touching ${accounts.size} accounts`);
    }
  }

  public get(traceId: string): Trace | undefined {
    return this.traces.get(traceId.toLowerCase());
  }

  /**
   * Ids of the stored traces involving the account, newest first.
   * Traces evicted from the store are skipped.
   */
  public idsForAccount(account: AccountId, limit: number = constants.DEFAULT_ACCOUNT_TRACES_LIMIT): string[] {
    const ids = this.accountIndex.get(account) ?? [];
    return ids.filter((id) => this.traces.has(id)).slice(0, limit);
  }

  public get size(): number {
    return this.traces.size;
  }
}
