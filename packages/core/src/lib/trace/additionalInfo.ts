// SPDX-License-Identifier: Apache-2.0

import { ContractInterface } from '../constants';
import { collectCandidates, hasInterface, isDestinationJettonWallet } from './candidates';
import { type AccountId, type NftSaleContract, type Trace, type TraceAdditionalInfo, visit } from './trace';

/**
 * Batched lookups used to build {@link TraceAdditionalInfo}.
 *
 * Each method receives the addresses found in a trace (possibly with duplicates) and
 * resolves to a map holding an entry for every address it knows something about.
 * A missing entry means "no data"; a rejection aborts the enrichment of the whole trace.
 */
export interface InformationSource {
  resolveJettonMasters(wallets: AccountId[], signal?: AbortSignal): Promise<Map<AccountId, AccountId>>;

  resolveMarketplaceSaleContracts(accounts: AccountId[], signal?: AbortSignal): Promise<Map<AccountId, NftSaleContract>>;

  resolveBasicSaleContracts(accounts: AccountId[], signal?: AbortSignal): Promise<Map<AccountId, NftSaleContract>>;
}

/**
 * Goes over the whole trace and populates `additionalInfo` of every node
 * based on information provided by the source.
 *
 * Three lookups are issued, one per kind, whatever the size of the tree. If any of them fails
 * or the signal is aborted, the promise rejects with that error and no node is annotated.
 * Without a source the trace is left untouched.
 */
export async function collectAdditionalInfo(
  trace: Trace,
  infoSource: InformationSource | undefined,
  signal?: AbortSignal,
): Promise<void> {
  if (infoSource === undefined) {
    return;
  }

  const { jettonWallets, getGemsContracts, basicNftSales } = collectCandidates(trace);

  signal?.throwIfAborted();
  const masters = await infoSource.resolveJettonMasters(jettonWallets, signal);
  signal?.throwIfAborted();
  const getGems = await infoSource.resolveMarketplaceSaleContracts(getGemsContracts, signal);
  signal?.throwIfAborted();
  const basicNftSale = await infoSource.resolveBasicSaleContracts(basicNftSales, signal);
  signal?.throwIfAborted();

  visit(trace, (node) => {
    const additionalInfo: TraceAdditionalInfo = {};
    if (isDestinationJettonWallet(node.inMsg)) {
      const master = masters.get(node.inMsg.destination);
      if (master !== undefined) {
        additionalInfo.jettonMaster = master;
      }
    }
    if (hasInterface(node.accountInterfaces, ContractInterface.NftSaleGetgems)) {
      const sale = getGems.get(node.account);
      if (sale !== undefined) {
        additionalInfo.nftSaleContract = { ...sale };
      }
    }
    // a basic sale resolution takes precedence when an account implements both interfaces
    if (hasInterface(node.accountInterfaces, ContractInterface.NftSale)) {
      const sale = basicNftSale.get(node.account);
      if (sale !== undefined) {
        additionalInfo.nftSaleContract = { ...sale };
      }
    }
    node.additionalInfo = additionalInfo;
  });
}
