// SPDX-License-Identifier: Apache-2.0

import { Address } from '@ton/core';

import type { TraceEventData, TransactionEventData } from './lib/types';
import { type Message, type Trace, visit } from './lib/trace';

export interface FormattedMessage {
  hash: string;
  source?: string;
  destination?: string;
  value: string;
  op_code?: number;
  decoded_op_name?: string;
  decoded_body?: unknown;
}

export interface FormattedTrace {
  transaction: {
    hash: string;
    lt: string;
    account: string;
    utime: number;
    success: boolean;
    in_msg?: FormattedMessage;
    out_msgs: FormattedMessage[];
  };
  interfaces: string[];
  additional_info?: {
    jetton_master?: string;
    nft_sale_contract?: {
      nft_price: string;
      owner?: string;
    };
  };
  children: FormattedTrace[];
}

/**
 * Parses a raw or user-friendly address into the raw form used as account id.
 *
 * @throws if the value is not a valid address
 */
const toAccountId = (address: string): string => Address.parse(address).toRawString();

const bigintReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;

/**
 * Copies a decoded message body into plain JSON, with bigint amounts as decimal strings.
 */
const toJsonValue = (value: unknown): unknown => {
  const text = JSON.stringify(value, bigintReplacer);
  return text === undefined ? undefined : JSON.parse(text);
};

const formatMessage = (message: Message): FormattedMessage => {
  const formatted: FormattedMessage = { hash: message.hash, value: message.value.toString() };
  if (message.source !== undefined) formatted.source = message.source;
  if (message.destination !== undefined) formatted.destination = message.destination;
  if (message.opCode !== undefined) formatted.op_code = message.opCode;
  if (message.decodedBody !== undefined) {
    formatted.decoded_op_name = message.decodedBody.operation;
    formatted.decoded_body = toJsonValue(message.decodedBody.value);
  }
  return formatted;
};

const formatNode = (node: Trace): FormattedTrace => {
  const formatted: FormattedTrace = {
    transaction: {
      hash: node.hash,
      lt: node.lt.toString(),
      account: node.account,
      utime: node.utime,
      success: node.success,
      out_msgs: node.outMsgs.map(formatMessage),
    },
    interfaces: [...node.accountInterfaces],
    children: [],
  };
  if (node.inMsg !== undefined) {
    formatted.transaction.in_msg = formatMessage(node.inMsg);
  }

  const info = node.additionalInfo;
  if (info !== undefined) {
    formatted.additional_info = {};
    if (info.jettonMaster !== undefined) {
      formatted.additional_info.jetton_master = info.jettonMaster;
    }
    if (info.nftSaleContract !== undefined) {
      formatted.additional_info.nft_sale_contract = { nft_price: info.nftSaleContract.nftPrice.toString() };
      if (info.nftSaleContract.owner !== undefined) {
        formatted.additional_info.nft_sale_contract.owner = info.nftSaleContract.owner;
      }
    }
  }
  return formatted;
};

/**
 * Renders a trace as the JSON document returned to clients.
 * Built without recursion, like every other walk over a trace.
 */
const formatTrace = (trace: Trace): FormattedTrace => {
  const root = formatNode(trace);
  const stack: Array<[Trace, FormattedTrace]> = [[trace, root]];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) {
      break;
    }
    const [node, formatted] = entry;
    for (const child of node.children) {
      const formattedChild = formatNode(child);
      formatted.children.push(formattedChild);
      stack.push([child, formattedChild]);
    }
  }
  return root;
};

const formatTransactionEvent = (node: Trace): TransactionEventData => ({
  account_id: node.account,
  lt: node.lt.toString(),
  tx_hash: node.hash,
});

/**
 * Trace announcement: the root hash and every distinct account of the tree, in walk order.
 */
const formatTraceEvent = (trace: Trace): TraceEventData => {
  const accounts = new Set<string>();
  visit(trace, (node) => {
    accounts.add(node.account);
  });
  return { accounts: [...accounts], hash: trace.hash };
};

const formatRequestIdMessage = (requestId?: string): string => {
  return requestId ? `[Request ID: ${requestId}]` : '';
};

export { formatRequestIdMessage, formatTrace, formatTraceEvent, formatTransactionEvent, toAccountId };
