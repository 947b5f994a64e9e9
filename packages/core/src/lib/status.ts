// SPDX-License-Identifier: Apache-2.0

import type { Status } from '../index';
import { rpcMethod } from './decorators';
import type { EventHub } from './hub';

export class StatusImpl implements Status {
  constructor(private readonly hub: EventHub) {}

  /**
   * Accounts whose events are published. An empty list means every account.
   *
   * @rpcMethod Exposed as status_monitoredAccounts RPC endpoint
   */
  @rpcMethod
  monitoredAccounts(): string[] {
    return this.hub.monitoredAccounts;
  }
}
