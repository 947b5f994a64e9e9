// SPDX-License-Identifier: Apache-2.0

import { ContractInterface, JETTON_TRANSFER_MSG_OP } from '../constants';
import { type AccountId, type Message, type Trace, visit } from './trace';

/**
 * Addresses found by one walk over a trace, one list per kind of lookup.
 * Lists keep the walk order and may contain duplicates.
 */
export interface TraceCandidates {
  jettonWallets: AccountId[];
  getGemsContracts: AccountId[];
  basicNftSales: AccountId[];
}

export function isDestinationJettonWallet(inMsg: Message | undefined): inMsg is Message & { destination: AccountId } {
  if (inMsg === undefined || inMsg.decodedBody === undefined) {
    return false;
  }
  return inMsg.decodedBody.operation === JETTON_TRANSFER_MSG_OP && !!inMsg.destination;
}

export function hasInterface(interfacesList: readonly string[], name: ContractInterface): boolean {
  return interfacesList.includes(name);
}

export function collectCandidates(trace: Trace): TraceCandidates {
  const candidates: TraceCandidates = { jettonWallets: [], getGemsContracts: [], basicNftSales: [] };

  visit(trace, (node) => {
    if (isDestinationJettonWallet(node.inMsg)) {
      candidates.jettonWallets.push(node.inMsg.destination);
    }
    if (hasInterface(node.accountInterfaces, ContractInterface.NftSaleGetgems)) {
      candidates.getGemsContracts.push(node.account);
    }
    if (hasInterface(node.accountInterfaces, ContractInterface.NftSale)) {
      candidates.basicNftSales.push(node.account);
    }
  });

  return candidates;
}
