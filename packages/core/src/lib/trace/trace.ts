// SPDX-License-Identifier: Apache-2.0

/**
 * Account address in raw form: `<workchain>:<64 lowercase hex chars>`.
 */
export type AccountId = string;

/**
 * ABI-decoded message body. Decoding happens before a trace reaches this package.
 */
export interface DecodedBody {
  operation: string;
  value?: unknown;
}

export interface Message {
  hash: string;
  source?: AccountId;
  destination?: AccountId;
  value: bigint;
  opCode?: number;
  decodedBody?: DecodedBody;
}

export interface Transaction {
  hash: string;
  lt: bigint;
  account: AccountId;
  utime: number;
  success: boolean;
  inMsg?: Message;
  /**
   * Outbound messages that were not matched to a child trace.
   * Messages that produced a child are removed by the tree builder.
   */
  outMsgs: Message[];
}

/**
 * Partial result of the `get_sale_data` get-method.
 */
export interface NftSaleContract {
  nftPrice: bigint;
  // owner of the NFT according to the sale contract
  owner?: AccountId;
}

/**
 * Information about a trace node that is not contained in the transaction itself.
 */
export interface TraceAdditionalInfo {
  jettonMaster?: AccountId;
  // set when the account implements one of the nft sale interfaces and the source knows the contract
  nftSaleContract?: NftSaleContract;
}

/**
 * One node of a trace tree. A node owns its children exclusively.
 */
export interface Trace extends Transaction {
  accountInterfaces: string[];
  children: Trace[];
  additionalInfo?: TraceAdditionalInfo;
}

/**
 * Calls `fn` for every node of the tree, parent before children, children in order.
 * Uses an explicit stack so the depth of the tree is not limited by the call stack.
 */
export function visit(trace: Trace, fn: (trace: Trace) => void): void {
  const stack: Trace[] = [trace];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) {
      break;
    }
    fn(current);
    for (let i = current.children.length - 1; i >= 0; i--) {
      stack.push(current.children[i]);
    }
  }
}

/**
 * Number of levels in the tree; a single node has depth 1.
 */
export function traceDepth(trace: Trace): number {
  let maxDepth = 0;
  const stack: Array<[Trace, number]> = [[trace, 1]];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) {
      break;
    }
    const [current, depth] = entry;
    maxDepth = Math.max(maxDepth, depth);
    for (const child of current.children) {
      stack.push([child, depth + 1]);
    }
  }
  return maxDepth;
}
