// SPDX-License-Identifier: Apache-2.0

import { ContractInterface, JETTON_TRANSFER_MSG_OP } from '../src/lib/constants';
import type { AccountId, InformationSource, Message, NftSaleContract, Trace } from '../src/lib/trace';
import { RequestDetails } from '../src/lib/types';

export const accountId = (n: number): AccountId => `0:${n.toString(16).padStart(64, '0')}`;

export const txHash = (n: number): string => n.toString(16).padStart(64, '0');

export const requestDetails = new RequestDetails({ requestId: 'test-request-id', ipAddress: '127.0.0.1' });

export function message(overrides: Partial<Message> = {}): Message {
  return { hash: 'msg', value: 0n, ...overrides };
}

export function jettonTransferTo(destination: AccountId): Message {
  return message({ destination, decodedBody: { operation: JETTON_TRANSFER_MSG_OP } });
}

/**
 * A trace node of account `account(n)` and transaction `txHash(n)`, without messages or children.
 */
export function traceNode(n: number, overrides: Partial<Trace> = {}): Trace {
  return {
    hash: txHash(n),
    lt: BigInt(n),
    account: accountId(n),
    utime: 1700000000 + n,
    success: true,
    outMsgs: [],
    accountInterfaces: [],
    children: [],
    ...overrides,
  };
}

export function saleNode(n: number, ...interfaces: ContractInterface[]): Trace {
  return traceNode(n, { accountInterfaces: [...interfaces] });
}

/**
 * A chain of `depth` nodes, each the only child of the previous one.
 */
export function chain(depth: number): Trace {
  const root = traceNode(0);
  let current = root;
  for (let i = 1; i < depth; i++) {
    const child = traceNode(i);
    current.children.push(child);
    current = child;
  }
  return root;
}

export interface SourceCall {
  method: 'jettonMasters' | 'marketplaceSales' | 'basicSales';
  addresses: AccountId[];
}

/**
 * Information source answering from fixed maps and recording every call.
 */
export class FakeInformationSource implements InformationSource {
  public readonly calls: SourceCall[] = [];

  constructor(
    private readonly masters = new Map<AccountId, AccountId>(),
    private readonly marketplaceSales = new Map<AccountId, NftSaleContract>(),
    private readonly basicSales = new Map<AccountId, NftSaleContract>(),
  ) {}

  async resolveJettonMasters(wallets: AccountId[]): Promise<Map<AccountId, AccountId>> {
    this.calls.push({ method: 'jettonMasters', addresses: [...wallets] });
    return new Map(this.masters);
  }

  async resolveMarketplaceSaleContracts(accounts: AccountId[]): Promise<Map<AccountId, NftSaleContract>> {
    this.calls.push({ method: 'marketplaceSales', addresses: [...accounts] });
    return new Map(this.marketplaceSales);
  }

  async resolveBasicSaleContracts(accounts: AccountId[]): Promise<Map<AccountId, NftSaleContract>> {
    this.calls.push({ method: 'basicSales', addresses: [...accounts] });
    return new Map(this.basicSales);
  }
}
